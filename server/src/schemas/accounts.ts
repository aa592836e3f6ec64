/**
 * accounts.ts
 *
 * Query, path and body schemas for the account routes.
 */

import {z} from "zod";

export const searchQuerySchema = z.object({
    q: z.string().trim().min(1).max(100),
});

export const leaderboardQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const cardParamsSchema = z.object({
    cardId: z.coerce.number().int().positive(),
});

export const attachMediaSchema = z.object({
    mediaRef: z.string().trim().min(1).max(512),
});
