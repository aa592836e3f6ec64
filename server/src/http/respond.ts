/**
 * respond.ts
 *
 * Maps core results onto HTTP responses. Success bodies are
 * `{ok: true, <key>: value}`; refusals are `{ok: false, error}` with 404 for
 * `NOT_FOUND` and 409 for every other game error.
 */

import type {FastifyReply} from "fastify";
import type {ZodError} from "zod";
import type {GameError, Result} from "../errors.js";

export function statusOf(error: GameError): number {
    return error.code === "NOT_FOUND" ? 404 : 409;
}

export function sendResult<T>(reply: FastifyReply, result: Result<T>, key: string) {
    if (!result.ok) {
        reply.log.debug({error: result.error}, "game operation refused");
        return reply.code(statusOf(result.error)).send({ok: false, error: result.error});
    }
    return reply.code(200).send({ok: true, [key]: result.value});
}

export function sendValidationError(reply: FastifyReply, err: ZodError) {
    reply.log.debug({issues: err.issues}, "validation error");
    return reply.code(400).send({
        ok: false,
        error: {code: "VALIDATION_ERROR", issues: err.issues},
    });
}
