/**
 * packs.ts
 *
 * Pack opening and duplicate fusion.
 */

import type {FastifyInstance} from "fastify";
import type {GameService} from "../game/service.js";
import {fuseSchema, openPackSchema} from "../schemas/economy.js";
import {requireCaller} from "./identity.js";
import {sendResult, sendValidationError} from "./respond.js";

export async function registerPackRoutes(app: FastifyInstance, game: GameService) {
    app.post("/api/packs/open", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const parsed = openPackSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        return sendResult(reply, game.openPack(caller, parsed.data.packType), "opening");
    });

    app.post("/api/fusion", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const parsed = fuseSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        return sendResult(reply, game.fuse(caller, parsed.data.cardId), "fusion");
    });
}
