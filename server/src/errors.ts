/**
 * errors.ts
 *
 * Helpers for building typed results plus the start-up error raised when the
 * card catalog cannot be used. Per-request refusals never throw; they travel
 * as `Result` values defined in the shared protocol types.
 */

import type {GameError, Result} from '../../shared/protocol/types/errors.js';

export type {GameError, Result};

export function ok<T>(value: T): Result<T> {
    return {ok: true, value};
}

export function fail<T = never>(error: GameError): Result<T> {
    return {ok: false, error};
}

export class CatalogError extends Error {
    constructor(message: string, readonly issues: unknown[] = []) {
        super(message);
        this.name = 'CatalogError';
    }
}
