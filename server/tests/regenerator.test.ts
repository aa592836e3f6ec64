/**
 * regenerator.test.ts
 *
 * Tests for lazy free-pack regeneration against an injected clock.
 */

import {describe, it, expect} from 'vitest';
import {
    checkRefill,
    consumeFreePack,
    formatCountdown,
    FREE_PACKS_MAX,
    timeUntilRefill,
} from '../src/regen/regenerator.js';
import {HOUR, T0} from './fixtures.js';

describe('checkRefill', () => {
    it('refills after four hours and one second', () => {
        const state = {freePacks: 0, lastRefillAt: T0};
        const now = T0 + 4 * HOUR + 1000;
        expect(checkRefill(state, now)).toBe(true);
        expect(state).toEqual({freePacks: FREE_PACKS_MAX, lastRefillAt: now});
    });

    it('refills exactly at the four hour mark', () => {
        const state = {freePacks: 2, lastRefillAt: T0};
        expect(checkRefill(state, T0 + 4 * HOUR)).toBe(true);
        expect(state.freePacks).toBe(5);
    });

    it('does nothing before the window elapses', () => {
        const state = {freePacks: 0, lastRefillAt: T0};
        expect(checkRefill(state, T0 + 3 * HOUR)).toBe(false);
        expect(state).toEqual({freePacks: 0, lastRefillAt: T0});
        expect(timeUntilRefill(state, T0 + 3 * HOUR)).toBe(HOUR);
    });
});

describe('consumeFreePack', () => {
    it('decrements until empty', () => {
        const state = {freePacks: 1, lastRefillAt: T0};
        expect(consumeFreePack(state)).toBe(true);
        expect(consumeFreePack(state)).toBe(false);
        expect(state.freePacks).toBe(0);
    });
});

describe('formatCountdown', () => {
    it('splits milliseconds into hours and minutes', () => {
        expect(formatCountdown(3 * HOUR + 25 * 60_000 + 40_000)).toEqual({hours: 3, minutes: 25});
    });
});
