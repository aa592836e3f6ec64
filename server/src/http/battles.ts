/**
 * battles.ts
 *
 * Scripted battles and the PvP matchmaking queue. A PvP request either pairs
 * immediately with a waiting player or leaves the caller searching; a waiting
 * player learns its outcome from `GET /api/battles/pvp`.
 */

import type {FastifyInstance} from "fastify";
import type {GameService} from "../game/service.js";
import {scriptedBattleSchema} from "../schemas/battle.js";
import {requireCaller} from "./identity.js";
import {sendResult, sendValidationError} from "./respond.js";

export async function registerBattleRoutes(app: FastifyInstance, game: GameService) {
    app.post("/api/battles/scripted", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const parsed = scriptedBattleSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        return sendResult(reply, game.battleScripted(caller, parsed.data.level), "battle");
    });

    app.post("/api/battles/pvp", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const result = await game.requestPvp(caller);
        if (result.ok && result.value.status === "paired") {
            app.log.info({accountId: caller.accountId, requesterWon: result.value.outcome.requesterWon}, "pvp resolved");
        }
        return sendResult(reply, result, "match");
    });

    app.delete("/api/battles/pvp", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return reply.send({ok: true, match: await game.cancelPvp(caller)});
    });

    app.get("/api/battles/pvp", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return reply.send({ok: true, match: game.matchStatus(caller)});
    });
}
