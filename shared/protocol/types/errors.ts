/**
 * errors.ts
 *
 * Typed per-request failures. Every core operation that can be refused
 * returns a `Result`; the HTTP layer maps `code` onto a status code.
 */

import type {Currency} from './account.js';
import type {Rarity, Role} from './cards.js';

export type GameError =
    | { code: 'INSUFFICIENT_FUNDS'; currency: Currency; required: number; available: number }
    | { code: 'INSUFFICIENT_DUPLICATES'; required: number; available: number }
    | { code: 'MAX_RARITY'; rarity: Rarity }
    | { code: 'NOT_FOUND'; cardId: number }
    | { code: 'INCOMPLETE_ROSTER'; missing: Role[] }
    | { code: 'NO_FREE_PACKS'; msUntilRefill: number }
    | { code: 'INVALID_AMOUNT'; amount: number }
    | { code: 'UNKNOWN_EXCHANGE'; from: Currency; to: Currency };

export type GameErrorCode = GameError['code'];

export type Result<T> = { ok: true; value: T } | { ok: false; error: GameError };
