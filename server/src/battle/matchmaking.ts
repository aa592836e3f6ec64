/**
 * matchmaking.ts
 *
 * PvP matchmaking queue. The queue is owned by `MatchmakingCoordinator` and is
 * only touched inside its `SerialLock`: stale-ticket removal, the scan for an
 * opponent, pairing, enqueue and cancel all run as one serialized step, so no
 * ticket can be paired twice or paired and cancelled at the same time.
 *
 * Tickets live in memory only and wait until paired or cancelled.
 */

import type {
    BattleOutcome,
    CancelResult,
    Lineup,
    MatchRequestResult,
    MatchStatus,
} from '../../../shared/protocol/types/battle.js';
import {debug, info} from '../logging.js';
import {queueDepthGauge} from '../observability/metrics.js';
import {SerialLock} from './lock.js';

export type Ticket = {
    accountId: number;
    displayName: string | null;
    lineup: Lineup;
    power: number;
    enqueuedAt: number;
};

export type PairResolver = (requester: Ticket, opponent: Ticket) => Promise<BattleOutcome> | BattleOutcome;

export class MatchmakingCoordinator {
    private readonly queue: Ticket[] = [];
    private readonly lock = new SerialLock();
    private readonly states = new Map<number, MatchStatus>();

    constructor(private readonly resolvePair: PairResolver) {
    }

    get depth(): number {
        return this.queue.length;
    }

    status(accountId: number): MatchStatus {
        return this.states.get(accountId) ?? {state: 'idle'};
    }

    requestMatch(ticket: Omit<Ticket, 'enqueuedAt'>, now: number = Date.now()): Promise<MatchRequestResult> {
        return this.lock.run<MatchRequestResult>(async () => {
            const stale = this.removeTicketsOf(ticket.accountId);
            if (stale > 0) {
                debug('[matchmaking] replaced stale ticket', {accountId: ticket.accountId});
            }

            const idx = this.queue.findIndex((t) => t.accountId !== ticket.accountId);
            const requester: Ticket = {...ticket, enqueuedAt: now};
            if (idx === -1) {
                this.queue.push(requester);
                this.states.set(requester.accountId, {state: 'queued', since: now, power: requester.power});
                queueDepthGauge.set(this.queue.length);
                debug('[matchmaking] searching', {accountId: requester.accountId, depth: this.queue.length});
                return {status: 'searching', since: now};
            }

            const [opponent] = this.queue.splice(idx, 1);
            queueDepthGauge.set(this.queue.length);
            let outcome: BattleOutcome;
            try {
                outcome = await this.resolvePair(requester, opponent);
            } catch (e) {
                // nothing was committed; the opponent keeps its place in the queue
                this.queue.splice(idx, 0, opponent);
                queueDepthGauge.set(this.queue.length);
                throw e;
            }
            this.states.set(requester.accountId, {state: 'paired', outcome});
            this.states.set(opponent.accountId, {state: 'paired', outcome});
            info('[matchmaking] paired', {
                requester: requester.accountId,
                opponent: opponent.accountId,
                requesterWon: outcome.requesterWon,
            });
            return {status: 'paired', outcome};
        });
    }

    cancel(accountId: number, now: number = Date.now()): Promise<CancelResult> {
        return this.lock.run<CancelResult>(() => {
            if (this.removeTicketsOf(accountId) === 0) {
                return {status: 'not_queued'};
            }
            this.states.set(accountId, {state: 'cancelled', at: now});
            debug('[matchmaking] cancelled', {accountId});
            return {status: 'cancelled'};
        });
    }

    private removeTicketsOf(accountId: number): number {
        let removed = 0;
        for (let i = this.queue.length - 1; i >= 0; i--) {
            if (this.queue[i].accountId === accountId) {
                this.queue.splice(i, 1);
                removed += 1;
            }
        }
        if (removed > 0) queueDepthGauge.set(this.queue.length);
        return removed;
    }
}
