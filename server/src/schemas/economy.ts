/**
 * economy.ts
 *
 * Request bodies for pack opening, fusion and the shop.
 */

import {z} from "zod";
import {CURRENCIES} from "../../../shared/protocol/types/account.js";
import {PACK_TYPES} from "../draw/packs.js";

const cardId = z.coerce.number().int().positive();

// whole units only; sign and zero checks happen in the ledger
const amount = z.number().int().safe();

export const openPackSchema = z.object({
    packType: z.enum(PACK_TYPES),
});

export const fuseSchema = z.object({
    cardId,
});

export const exchangeSchema = z.object({
    from: z.enum(CURRENCIES),
    to: z.enum(CURRENCIES),
    amount,
});

export const grantSchema = z.object({
    accountId: z.number().int().positive(),
    currency: z.enum(CURRENCIES),
    amount,
});
