/**
 * matchmaking.test.ts
 *
 * Tests for the serialized PvP queue: pairing, concurrent requests, stale
 * tickets, cancellation and resolver failures.
 */

import {describe, it, expect, vi} from 'vitest';
import type {BattleOutcome} from '../../shared/protocol/types/battle.js';
import {bestLineup} from '../src/battle/lineup.js';
import {MatchmakingCoordinator, type Ticket} from '../src/battle/matchmaking.js';
import {rosterAccount, T0} from './fixtures.js';

function ticket(accountId: number): Omit<Ticket, 'enqueuedAt'> {
    const assembled = bestLineup(rosterAccount(accountId).collection);
    if (!assembled.ok) throw new Error('fixture roster is incomplete');
    return {accountId, displayName: `player-${accountId}`, ...assembled.value};
}

function fakeOutcome(requester: Ticket, opponent: Ticket): BattleOutcome {
    const side = (t: Ticket) => ({accountId: t.accountId, displayName: t.displayName, power: t.power, lineup: t.lineup});
    return {
        mode: 'pvp',
        requester: side(requester),
        opponent: side(opponent),
        requesterWon: true,
        winChance: 0.16,
        coinsWon: 100,
        coinsLost: 50,
        ratingGain: 30,
        ratingLoss: 0,
        resolvedAt: T0,
    };
}

describe('MatchmakingCoordinator', () => {
    it('queues the first request and pairs the second', async () => {
        const resolve = vi.fn(fakeOutcome);
        const mm = new MatchmakingCoordinator(resolve);

        expect(await mm.requestMatch(ticket(1), T0)).toEqual({status: 'searching', since: T0});
        expect(mm.depth).toBe(1);
        expect(mm.status(1)).toEqual({state: 'queued', since: T0, power: 212});

        const second = await mm.requestMatch(ticket(2), T0 + 1);
        expect(second.status).toBe('paired');
        expect(mm.depth).toBe(0);
        expect(resolve).toHaveBeenCalledTimes(1);
        expect(resolve.mock.calls[0][0].accountId).toBe(2);
        expect(resolve.mock.calls[0][1].accountId).toBe(1);
        expect(mm.status(1).state).toBe('paired');
        expect(mm.status(2).state).toBe('paired');
    });

    it('pairs two concurrent requests exactly once', async () => {
        const resolve = vi.fn(fakeOutcome);
        const mm = new MatchmakingCoordinator(resolve);

        const [a, b] = await Promise.all([mm.requestMatch(ticket(1), T0), mm.requestMatch(ticket(2), T0)]);

        expect(a.status).toBe('searching');
        expect(b.status).toBe('paired');
        expect(resolve).toHaveBeenCalledTimes(1);
        expect(mm.depth).toBe(0);
    });

    it('leaves the third of three concurrent requests waiting', async () => {
        const mm = new MatchmakingCoordinator(fakeOutcome);
        const results = await Promise.all([1, 2, 3].map((id) => mm.requestMatch(ticket(id), T0)));
        expect(results.map((r) => r.status)).toEqual(['searching', 'paired', 'searching']);
        expect(mm.depth).toBe(1);
        expect(mm.status(3).state).toBe('queued');
    });

    it('never pairs an account with itself', async () => {
        const resolve = vi.fn(fakeOutcome);
        const mm = new MatchmakingCoordinator(resolve);
        await mm.requestMatch(ticket(1), T0);
        const again = await mm.requestMatch(ticket(1), T0 + 5);
        expect(again).toEqual({status: 'searching', since: T0 + 5});
        expect(mm.depth).toBe(1);
        expect(resolve).not.toHaveBeenCalled();
    });

    it('cancels once and then reports not_queued', async () => {
        const mm = new MatchmakingCoordinator(fakeOutcome);
        await mm.requestMatch(ticket(1), T0);

        expect(await mm.cancel(1, T0 + 10)).toEqual({status: 'cancelled'});
        expect(await mm.cancel(1, T0 + 20)).toEqual({status: 'not_queued'});
        expect(mm.status(1)).toEqual({state: 'cancelled', at: T0 + 10});
        expect(mm.depth).toBe(0);
    });

    it('does not cancel a ticket that was already paired', async () => {
        const mm = new MatchmakingCoordinator(fakeOutcome);
        await mm.requestMatch(ticket(1), T0);

        const [paired, cancelled] = await Promise.all([mm.requestMatch(ticket(2), T0), mm.cancel(1, T0)]);

        expect(paired.status).toBe('paired');
        expect(cancelled).toEqual({status: 'not_queued'});
        expect(mm.status(1).state).toBe('paired');
    });

    it('keeps the waiting ticket when resolution fails', async () => {
        const mm = new MatchmakingCoordinator(() => {
            throw new Error('storage unavailable');
        });
        await mm.requestMatch(ticket(1), T0);

        await expect(mm.requestMatch(ticket(2), T0)).rejects.toThrow('storage unavailable');
        expect(mm.depth).toBe(1);
        expect(mm.status(1).state).toBe('queued');
        expect(mm.status(2)).toEqual({state: 'idle'});
    });
});
