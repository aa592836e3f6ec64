/**
 * service.ts
 *
 * Entry point of the game core for the platform adapter. Each method takes
 * the caller's identity, resolves (or lazily creates) the account and runs
 * one operation through the account store so that it commits atomically.
 * Refusals come back as `Result` values; nothing here is retried.
 */

import {trace} from '@opentelemetry/api';
import type {AccountProfile, Balances, Currency, LeaderboardEntry} from '../../../shared/protocol/types/account.js';
import type {
    BattleOutcome,
    BattleSide,
    CancelResult,
    MatchRequestResult,
    MatchStatus,
} from '../../../shared/protocol/types/battle.js';
import type {OwnedCard} from '../../../shared/protocol/types/cards.js';
import type {DiceResult, FreePackStatus, FusionResult, PackOpening} from '../../../shared/protocol/types/economy.js';
import {buildProfile, findCard, resetAccount, sortedCollection} from '../accounts/account.js';
import type {AccountStore, CallerIdentity} from '../accounts/store.js';
import {bestLineup} from '../battle/lineup.js';
import {MatchmakingCoordinator, type Ticket} from '../battle/matchmaking.js';
import {PVP_REWARDS, resolveBattle, SCRIPTED_OPPONENTS, type ScriptedLevel} from '../battle/resolver.js';
import type {CardCatalog} from '../catalog/catalog.js';
import type {Rng} from '../draw/drawEngine.js';
import type {PackType} from '../draw/packs.js';
import {credit, exchange} from '../economy/ledger.js';
import {openPack, rollDice} from '../economy/shop.js';
import {fail, ok, type Result} from '../errors.js';
import {fuse} from '../fusion/fusionEngine.js';
import {info} from '../logging.js';
import {battlesCounter, fusionsCounter, packsOpenedCounter} from '../observability/metrics.js';
import {formatCountdown, FREE_PACKS_MAX, timeUntilRefill} from '../regen/regenerator.js';

export const SEARCH_LIMIT = 50;

export type GameServiceOptions = {
    rng?: Rng;
    clock?: () => number;
};

const tracer = trace.getTracer('game');

export class GameService {
    readonly matchmaking: MatchmakingCoordinator;
    private readonly rng: Rng;
    private readonly clock: () => number;

    constructor(
        private readonly store: AccountStore,
        readonly catalog: CardCatalog,
        options: GameServiceOptions = {},
    ) {
        this.rng = options.rng ?? Math.random;
        this.clock = options.clock ?? Date.now;
        this.matchmaking = new MatchmakingCoordinator((requester, opponent) => this.resolvePvp(requester, opponent));
    }

    profile(identity: CallerIdentity): AccountProfile {
        const now = this.clock();
        return buildProfile(this.store.touch(identity, now), now);
    }

    collection(identity: CallerIdentity): OwnedCard[] {
        return sortedCollection(this.store.touch(identity, this.clock()).collection);
    }

    search(identity: CallerIdentity, query: string): OwnedCard[] {
        const q = query.trim().toLowerCase();
        const account = this.store.touch(identity, this.clock());
        return sortedCollection(account.collection)
            .filter((card) => {
                if (card.name.toLowerCase().includes(q)) return true;
                const def = this.catalog.get(card.definitionId);
                return !!def && Object.values(def.text).some((t) => !!t.name && t.name.toLowerCase().includes(q));
            })
            .slice(0, SEARCH_LIMIT);
    }

    freePackStatus(identity: CallerIdentity): FreePackStatus {
        const now = this.clock();
        const account = this.store.touch(identity, now);
        const msUntilRefill = timeUntilRefill(account, now);
        return {
            freePacks: account.freePacks,
            maxFreePacks: FREE_PACKS_MAX,
            msUntilRefill,
            countdown: formatCountdown(msUntilRefill),
        };
    }

    openPack(identity: CallerIdentity, packType: PackType): Result<PackOpening> {
        const now = this.clock();
        this.store.touch(identity, now);
        const result = this.store.mutate(identity.accountId, now, (draft) =>
            openPack(draft, packType, this.catalog, this.rng, now));
        if (result.ok) {
            packsOpenedCounter.inc({pack_type: packType, rarity: result.value.card.rarity});
            info('[shop] pack opened', {
                accountId: identity.accountId,
                packType,
                cardId: result.value.card.id,
                rarity: result.value.card.rarity,
            });
        }
        return result;
    }

    fuse(identity: CallerIdentity, cardId: number): Result<FusionResult> {
        const now = this.clock();
        this.store.touch(identity, now);
        const span = tracer.startSpan('fusion', {attributes: {'account.id': identity.accountId, 'card.id': cardId}});
        try {
            const result = this.store.mutate(identity.accountId, now, (draft) =>
                fuse(draft, cardId, this.catalog, this.rng, now));
            if (result.ok) {
                fusionsCounter.inc({from_rarity: result.value.from.rarity});
                info('[fusion] fused', {
                    accountId: identity.accountId,
                    from: result.value.from,
                    cardId: result.value.card.id,
                    rarity: result.value.card.rarity,
                    reward: result.value.reward,
                });
            }
            span.setAttribute('fusion.ok', result.ok);
            return result;
        } finally {
            span.end();
        }
    }

    exchange(identity: CallerIdentity, from: Currency, to: Currency, amount: number): Result<Balances> {
        const now = this.clock();
        this.store.touch(identity, now);
        const result = this.store.mutate(identity.accountId, now, (draft) => exchange(draft.balances, from, to, amount));
        if (result.ok) {
            info('[ledger] exchange', {accountId: identity.accountId, from, to, amount});
            return ok({...result.value});
        }
        return result;
    }

    /**
     * Platform-side credit, e.g. after an external payment has settled.
     */
    grant(identity: CallerIdentity, currency: Currency, amount: number): Result<Balances> {
        const now = this.clock();
        this.store.touch(identity, now);
        const result = this.store.mutate(identity.accountId, now, (draft) => credit(draft.balances, currency, amount));
        if (result.ok) {
            info('[ledger] grant', {accountId: identity.accountId, currency, amount});
            return ok({...result.value});
        }
        return result;
    }

    rollDice(identity: CallerIdentity): Result<DiceResult> {
        const now = this.clock();
        this.store.touch(identity, now);
        return this.store.mutate(identity.accountId, now, (draft) => rollDice(draft, this.rng));
    }

    attachMedia(identity: CallerIdentity, cardId: number, mediaRef: string): Result<OwnedCard> {
        const now = this.clock();
        this.store.touch(identity, now);
        return this.store.mutate(identity.accountId, now, (draft) => {
            const card = findCard(draft, cardId);
            if (!card) return fail({code: 'NOT_FOUND', cardId});
            card.mediaRef = mediaRef;
            return ok({...card});
        });
    }

    reset(identity: CallerIdentity): Result<AccountProfile> {
        const now = this.clock();
        this.store.touch(identity, now);
        const result = this.store.mutate(identity.accountId, now, (draft) => ok(buildProfile(resetAccount(draft, now), now)));
        if (result.ok) info('[accounts] reset', {accountId: identity.accountId});
        return result;
    }

    leaderboard(limit?: number): LeaderboardEntry[] {
        return this.store.leaderboard(limit);
    }

    battleScripted(identity: CallerIdentity, level: ScriptedLevel): Result<BattleOutcome> {
        const now = this.clock();
        const opponentDef = SCRIPTED_OPPONENTS[level];
        this.store.touch(identity, now);
        const span = tracer.startSpan('battle.scripted', {attributes: {'account.id': identity.accountId, 'battle.level': level}});
        try {
            const result = this.store.mutate(identity.accountId, now, (draft) => {
                const assembled = bestLineup(draft.collection);
                if (!assembled.ok) return assembled;
                const requester: BattleSide = {
                    accountId: draft.id,
                    displayName: draft.displayName,
                    power: assembled.value.power,
                    lineup: assembled.value.lineup,
                };
                const opponent: BattleSide = {accountId: null, displayName: level, power: opponentDef.power, lineup: null};
                return ok(resolveBattle('scripted', requester, opponent, {requester: draft, opponent: null},
                    opponentDef.rewards, this.rng, now));
            });
            if (result.ok) {
                battlesCounter.inc({mode: 'scripted', result: result.value.requesterWon ? 'win' : 'loss'});
                info('[battle] scripted', {
                    accountId: identity.accountId,
                    level,
                    power: result.value.requester.power,
                    requesterWon: result.value.requesterWon,
                });
            }
            return result;
        } finally {
            span.end();
        }
    }

    /**
     * Queue for a PvP battle, or fight the first waiting opponent right away.
     * The lineup is assembled from the caller's collection at request time.
     */
    async requestPvp(identity: CallerIdentity): Promise<Result<MatchRequestResult>> {
        const now = this.clock();
        const account = this.store.touch(identity, now);
        const assembled = bestLineup(account.collection);
        if (!assembled.ok) return assembled;
        const result = await this.matchmaking.requestMatch({
            accountId: account.id,
            displayName: account.displayName,
            lineup: assembled.value.lineup,
            power: assembled.value.power,
        }, now);
        return ok(result);
    }

    cancelPvp(identity: CallerIdentity): Promise<CancelResult> {
        return this.matchmaking.cancel(identity.accountId, this.clock());
    }

    matchStatus(identity: CallerIdentity): MatchStatus {
        return this.matchmaking.status(identity.accountId);
    }

    private resolvePvp(requester: Ticket, opponent: Ticket): BattleOutcome {
        const now = this.clock();
        const span = tracer.startSpan('battle.pvp', {
            attributes: {'battle.requester': requester.accountId, 'battle.opponent': opponent.accountId},
        });
        try {
            const result = this.store.transact([requester.accountId, opponent.accountId], now, ([a, b]) => ok(resolveBattle(
                'pvp',
                {accountId: a.id, displayName: a.displayName, power: requester.power, lineup: requester.lineup},
                {accountId: b.id, displayName: b.displayName, power: opponent.power, lineup: opponent.lineup},
                {requester: a, opponent: b},
                PVP_REWARDS,
                this.rng,
                now,
            )));
            if (!result.ok) {
                throw new Error(`pvp battle refused: ${result.error.code}`);
            }
            battlesCounter.inc({mode: 'pvp', result: result.value.requesterWon ? 'win' : 'loss'});
            return result.value;
        } finally {
            span.end();
        }
    }
}
