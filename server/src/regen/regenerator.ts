/**
 * regenerator.ts
 *
 * Free-pack regeneration. There is no background timer: every account access
 * asks `checkRefill` whether the window has elapsed, so the refill is a pure
 * function of the stored timestamp and the current wall-clock time.
 */

import type {Account} from '../../../shared/protocol/types/account.js';

export const FREE_PACKS_MAX = 5;
export const REFILL_INTERVAL_MS = 4 * 60 * 60 * 1000;

type RegenState = Pick<Account, 'freePacks' | 'lastRefillAt'>;

export function checkRefill(account: RegenState, now: number = Date.now()): boolean {
    if (now - account.lastRefillAt >= REFILL_INTERVAL_MS) {
        account.freePacks = FREE_PACKS_MAX;
        account.lastRefillAt = now;
        return true;
    }
    return false;
}

export function timeUntilRefill(account: RegenState, now: number = Date.now()): number {
    return Math.max(0, REFILL_INTERVAL_MS - (now - account.lastRefillAt));
}

/**
 * Consume one free pack. Returns false (and leaves the count alone) when none
 * are left.
 */
export function consumeFreePack(account: RegenState): boolean {
    if (account.freePacks <= 0) return false;
    account.freePacks -= 1;
    return true;
}

export function formatCountdown(ms: number): { hours: number; minutes: number } {
    const totalMinutes = Math.floor(ms / 60_000);
    return {hours: Math.floor(totalMinutes / 60), minutes: totalMinutes % 60};
}
