/**
 * accounts.ts
 *
 * Account routes for the calling player: profile, collection listing and
 * search, free-pack countdown, card media attachment, full reset, plus the
 * public rating leaderboard.
 */

import type {FastifyInstance} from "fastify";
import type {GameService} from "../game/service.js";
import {
    attachMediaSchema,
    cardParamsSchema,
    leaderboardQuerySchema,
    searchQuerySchema,
} from "../schemas/accounts.js";
import {requireCaller} from "./identity.js";
import {sendResult, sendValidationError} from "./respond.js";

export async function registerAccountRoutes(app: FastifyInstance, game: GameService) {
    app.get("/api/me", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return reply.send({ok: true, profile: game.profile(caller)});
    });

    app.get("/api/me/collection", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return reply.send({ok: true, cards: game.collection(caller)});
    });

    app.get("/api/me/collection/search", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const parsed = searchQuerySchema.safeParse(req.query);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        return reply.send({ok: true, cards: game.search(caller, parsed.data.q)});
    });

    app.get("/api/me/free-packs", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return reply.send({ok: true, status: game.freePackStatus(caller)});
    });

    app.post("/api/me/cards/:cardId/media", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const params = cardParamsSchema.safeParse(req.params);
        if (!params.success) return sendValidationError(reply, params.error);
        const body = attachMediaSchema.safeParse(req.body);
        if (!body.success) return sendValidationError(reply, body.error);
        return sendResult(reply, game.attachMedia(caller, params.data.cardId, body.data.mediaRef), "card");
    });

    app.post("/api/me/reset", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return sendResult(reply, game.reset(caller), "profile");
    });

    app.get("/api/leaderboard", async (req, reply) => {
        const parsed = leaderboardQuerySchema.safeParse(req.query);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        return reply.send({ok: true, leaderboard: game.leaderboard(parsed.data.limit)});
    });
}
