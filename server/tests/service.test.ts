/**
 * service.test.ts
 *
 * Scenario tests for the game service: pack purchases, fusion, free packs,
 * currency flows, battles and account queries over an in-memory repository.
 */

import {describe, it, expect} from 'vitest';
import {InMemoryAccountRepository} from '../src/accounts/repository.js';
import {AccountStore} from '../src/accounts/store.js';
import {ok} from '../src/errors.js';
import {GameService} from '../src/game/service.js';
import {giveCards, HOUR, T0, testCatalog} from './fixtures.js';

const catalog = testCatalog();
const alice = {accountId: 1, displayName: 'Alice'};
const bob = {accountId: 2, displayName: 'Bob'};

function setup() {
    const repo = new InMemoryAccountRepository();
    const store = new AccountStore(repo);
    const rng = {value: 0};
    const clock = {now: T0};
    const game = new GameService(store, catalog, {rng: () => rng.value, clock: () => clock.now});
    const giveRoster = (accountId: number) => store.mutate(accountId, clock.now, (draft) => {
        giveCards(draft, catalog, 1, 2, 3, 4);
        return ok(null);
    });
    return {repo, store, game, rng, clock, giveRoster};
}

describe('packs and fusion', () => {
    it('refuses a fusion with four copies and accepts it after the fifth', () => {
        const {game} = setup();
        // rng 0 always draws a common, and the first common is Keeper One
        for (let i = 0; i < 4; i++) {
            expect(game.openPack(alice, 'basic').ok).toBe(true);
        }
        expect(game.fuse(alice, 1)).toEqual({
            ok: false,
            error: {code: 'INSUFFICIENT_DUPLICATES', required: 5, available: 4},
        });
        expect(game.profile(alice)).toMatchObject({collectionSize: 4, balances: {coins: 600}});

        const fifth = game.openPack(alice, 'basic');
        if (!fifth.ok) throw new Error(`pack refused: ${fifth.error.code}`);
        expect(fifth.value.card).toMatchObject({id: 5, name: 'Keeper One'});

        const fused = game.fuse(alice, 5);
        if (!fused.ok) throw new Error(`fusion refused: ${fused.error.code}`);
        expect(fused.value.card).toMatchObject({id: 6, name: 'Rare Keeper', rarity: 'rare'});
        expect(game.collection(alice).map((c) => c.id)).toEqual([6]);
        expect(game.profile(alice).balances).toEqual({coins: 500, gems: 0, candies: 5, stars: 0});
    });

    it('charges gems for premium packs', () => {
        const {game} = setup();
        expect(game.openPack(alice, 'premium')).toEqual({
            ok: false,
            error: {code: 'INSUFFICIENT_FUNDS', currency: 'gems', required: 50, available: 0},
        });
        expect(game.grant(alice, 'gems', 50).ok).toBe(true);

        const res = game.openPack(alice, 'premium');
        if (!res.ok) throw new Error(`pack refused: ${res.error.code}`);
        expect(res.value.card.rarity).toBe('rare');
        expect(res.value.balances.gems).toBe(0);
    });

    it('hands out five free packs per window', () => {
        const {game, clock} = setup();
        for (let i = 0; i < 5; i++) {
            expect(game.openPack(alice, 'free').ok).toBe(true);
        }
        expect(game.openPack(alice, 'free')).toEqual({
            ok: false,
            error: {code: 'NO_FREE_PACKS', msUntilRefill: 4 * HOUR},
        });
        expect(game.profile(alice).balances.coins).toBe(1000);

        clock.now = T0 + 4 * HOUR + 1000;
        expect(game.freePackStatus(alice)).toEqual({
            freePacks: 5,
            maxFreePacks: 5,
            msUntilRefill: 4 * HOUR,
            countdown: {hours: 4, minutes: 0},
        });
        expect(game.openPack(alice, 'free').ok).toBe(true);
    });
});

describe('currency', () => {
    it('exchanges at the fixed rates', () => {
        const {game} = setup();
        game.grant(alice, 'stars', 2);
        expect(game.exchange(alice, 'stars', 'gems', 2)).toEqual({
            ok: true,
            value: {coins: 1000, gems: 20, candies: 0, stars: 0},
        });
        expect(game.exchange(alice, 'gems', 'stars', 1)).toEqual({
            ok: false,
            error: {code: 'UNKNOWN_EXCHANGE', from: 'gems', to: 'stars'},
        });
    });

    it('rolls dice for a 100 coin stake', () => {
        const {game, rng} = setup();
        const lost = game.rollDice(alice);
        expect(lost).toMatchObject({ok: true, value: {roll: 1, won: false, prize: {}}});

        rng.value = 0.5;
        const won = game.rollDice(alice);
        expect(won).toMatchObject({ok: true, value: {roll: 4, won: true, prize: {coins: 500, gems: 10}}});
        expect(game.profile(alice)).toMatchObject({
            balances: {coins: 1300, gems: 10},
            dice: {wins: 1, losses: 1, total: 2},
        });
    });
});

describe('battles', () => {
    it('refuses a battle without a full roster', () => {
        const {game} = setup();
        expect(game.battleScripted(alice, 'novice')).toEqual({
            ok: false,
            error: {code: 'INCOMPLETE_ROSTER', missing: ['goalkeeper', 'defender', 'midfielder', 'forward']},
        });
    });

    it('pays out a scripted win', () => {
        const {game, giveRoster} = setup();
        game.profile(alice);
        giveRoster(alice.accountId);

        const res = game.battleScripted(alice, 'novice');
        if (!res.ok) throw new Error(`battle refused: ${res.error.code}`);
        expect(res.value).toMatchObject({mode: 'scripted', requesterWon: true, winChance: 0.84, coinsWon: 25});
        expect(game.profile(alice)).toMatchObject({balances: {coins: 1025}, rating: 0});
    });

    it('pairs two players and settles both accounts', async () => {
        const {game, giveRoster} = setup();
        game.profile(alice);
        game.profile(bob);
        giveRoster(alice.accountId);
        giveRoster(bob.accountId);

        expect(await game.requestPvp(alice)).toEqual({ok: true, value: {status: 'searching', since: T0}});
        expect(game.matchStatus(alice).state).toBe('queued');

        const paired = await game.requestPvp(bob);
        if (!paired.ok || paired.value.status !== 'paired') throw new Error('expected a pairing');
        // equal power: bob is the underdog and rng 0 wins
        expect(paired.value.outcome.requesterWon).toBe(true);

        expect(game.profile(bob)).toMatchObject({balances: {coins: 1100}, rating: 30});
        expect(game.profile(alice)).toMatchObject({balances: {coins: 950}, rating: 0});
        expect(game.matchStatus(alice)).toEqual({state: 'paired', outcome: paired.value.outcome});
        expect(game.leaderboard()[0]).toEqual({rank: 1, accountId: 2, displayName: 'Bob', rating: 30});
    });

    it('does not queue an incomplete roster', async () => {
        const {game} = setup();
        const res = await game.requestPvp(alice);
        expect(res.ok).toBe(false);
        expect(game.matchmaking.depth).toBe(0);
        expect(await game.cancelPvp(alice)).toEqual({status: 'not_queued'});
    });
});

describe('account queries', () => {
    it('searches display and localized names, newest first', () => {
        const {game, store} = setup();
        game.profile(alice);
        store.mutate(alice.accountId, T0, (draft) => {
            giveCards(draft, catalog, 1, 5, 2);
            return ok(null);
        });

        expect(game.search(alice, 'KEEPER').map((c) => c.id)).toEqual([2, 1]);
        expect(game.search(alice, 'вратарь').map((c) => c.definitionId)).toEqual([5]);
        expect(game.search(alice, 'nobody')).toEqual([]);
    });

    it('attaches media to an owned card only', () => {
        const {game} = setup();
        game.openPack(alice, 'basic');
        expect(game.attachMedia(alice, 99, 'file-1')).toEqual({ok: false, error: {code: 'NOT_FOUND', cardId: 99}});
        expect(game.attachMedia(alice, 1, 'file-1')).toMatchObject({ok: true, value: {id: 1, mediaRef: 'file-1'}});
        expect(game.collection(alice)[0].mediaRef).toBe('file-1');
    });

    it('resets everything but the identity', () => {
        const {game, giveRoster} = setup();
        game.openPack(alice, 'basic');
        giveRoster(alice.accountId);
        game.grant(alice, 'gems', 7);

        const res = game.reset(alice);
        if (!res.ok) throw new Error('reset refused');
        expect(res.value).toMatchObject({
            id: 1,
            displayName: 'Alice',
            balances: {coins: 1000, gems: 0, candies: 0, stars: 0},
            collectionSize: 0,
            freePacks: 5,
            rating: 0,
        });
        // ids 1-5 were handed out before the reset
        game.openPack(alice, 'basic');
        expect(game.collection(alice).map((c) => c.id)).toEqual([6]);
    });
});
