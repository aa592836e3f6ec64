/**
 * shop.ts
 *
 * Currency exchange and the dice casino.
 */

import type {FastifyInstance} from "fastify";
import type {GameService} from "../game/service.js";
import {exchangeSchema} from "../schemas/economy.js";
import {requireCaller} from "./identity.js";
import {sendResult, sendValidationError} from "./respond.js";

export async function registerShopRoutes(app: FastifyInstance, game: GameService) {
    app.post("/api/shop/exchange", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        const parsed = exchangeSchema.safeParse(req.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);
        const {from, to, amount} = parsed.data;
        return sendResult(reply, game.exchange(caller, from, to, amount), "balances");
    });

    app.post("/api/shop/dice", async (req, reply) => {
        const caller = requireCaller(req, reply);
        if (!caller) return reply;
        return sendResult(reply, game.rollDice(caller), "dice");
    });
}
