/**
 * platform.ts
 *
 * Routes only the platform adapter may call, e.g. crediting a purchase once
 * an external payment has settled. Requests must carry `x-platform-key`
 * matching the configured key; with no key configured the routes refuse
 * every request. Player identity headers grant nothing here.
 */

import type {FastifyInstance, FastifyReply, FastifyRequest} from "fastify";
import type {GameService} from "../game/service.js";
import {grantSchema} from "../schemas/economy.js";
import {sendResult, sendValidationError} from "./respond.js";

function platformAllowed(req: FastifyRequest, reply: FastifyReply, platformKey: string | null): boolean {
    const presented = req.headers["x-platform-key"];
    if (platformKey !== null && presented === platformKey) return true;
    req.log.warn({url: req.url}, "platform route called without a valid key");
    reply.code(403).send({ok: false, error: {code: "FORBIDDEN"}});
    return false;
}

export async function registerPlatformRoutes(app: FastifyInstance, game: GameService, platformKey: string | null) {
    app.post("/api/platform/grant", async (req, reply) => {
        if (!platformAllowed(req, reply, platformKey)) return reply;
        const parsed = grantSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        const {accountId, currency, amount} = parsed.data;
        return sendResult(reply, game.grant({accountId}, currency, amount), "balances");
    });
}
