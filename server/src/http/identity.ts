/**
 * identity.ts
 *
 * Resolves the calling account from request headers. The messaging platform
 * in front of this server has already authenticated the user and forwards
 * its numeric user id as `x-account-id` and, optionally, the current display
 * name as `x-display-name`.
 */

import type {FastifyReply, FastifyRequest} from "fastify";
import {z} from "zod";
import type {CallerIdentity} from "../accounts/store.js";

const identityHeadersSchema = z.object({
    "x-account-id": z.string().regex(/^\d{1,15}$/).transform(Number).pipe(z.number().int().positive()),
    "x-display-name": z.string().trim().min(1).max(64).optional(),
});

export function callerOf(req: FastifyRequest): CallerIdentity | null {
    const parsed = identityHeadersSchema.safeParse(req.headers);
    if (!parsed.success) return null;
    return {
        accountId: parsed.data["x-account-id"],
        displayName: parsed.data["x-display-name"] ?? null,
    };
}

/**
 * Like `callerOf`, but answers 401 itself when the headers are missing or
 * malformed. Handlers return `reply` when this yields null.
 */
export function requireCaller(req: FastifyRequest, reply: FastifyReply): CallerIdentity | null {
    const caller = callerOf(req);
    if (!caller) {
        req.log.debug({headers: Object.keys(req.headers)}, "request without caller identity");
        reply.code(401).send({ok: false, error: {code: "UNIDENTIFIED"}});
    }
    return caller;
}
