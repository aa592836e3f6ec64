/**
 * fixtures.ts
 *
 * Shared helpers for the test suites: a small catalog with one card per role
 * and no legendary tier, seeded randomness, and account builders.
 */

import type {Account} from '../../shared/protocol/types/account.js';
import type {OwnedCard} from '../../shared/protocol/types/cards.js';
import {addCard, createAccount} from '../src/accounts/account.js';
import {CardCatalog} from '../src/catalog/catalog.js';
import {toInstance, type Rng} from '../src/draw/drawEngine.js';

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);
export const HOUR = 60 * 60 * 1000;

export const TEST_CATALOG_DOCUMENT = {
    '1': {name: 'Keeper One', rarity: 'common', ovr: 50, position: 'goalkeeper'},
    '2': {name: 'Back One', rarity: 'common', ovr: 52, position: 'defender'},
    '3': {name: 'Mid One', rarity: 'common', ovr: 54, position: 'midfielder'},
    '4': {name: 'Striker One', rarity: 'common', ovr: 56, position: 'forward'},
    '5': {
        name: 'Rare Keeper',
        rarity: 'rare',
        ovr: 70,
        position: 'goalkeeper',
        text: {ru: {name: 'Редкий вратарь'}},
    },
    '6': {name: 'Epic Mid', rarity: 'epic', ovr: 80, position: 'midfielder'},
    '7': {name: 'Mythic Forward', rarity: 'mythic', ovr: 95, position: 'forward'},
};

export function testCatalog(): CardCatalog {
    return CardCatalog.fromDocument(TEST_CATALOG_DOCUMENT);
}

/**
 * Deterministic generator (mulberry32) for statistical assertions.
 */
export function seededRng(seed: number): Rng {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6d2b79f5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Returns the given values in order, repeating the last one once exhausted.
 */
export function sequenceRng(...values: number[]): Rng {
    let i = 0;
    return () => {
        const value = values[Math.min(i, values.length - 1)];
        i += 1;
        return value;
    };
}

export function giveCards(account: Account, catalog: CardCatalog, ...definitionIds: number[]): OwnedCard[] {
    return definitionIds.map((id) => {
        const def = catalog.get(id);
        if (!def) throw new Error(`no card ${id} in test catalog`);
        return addCard(account, toInstance(def, T0));
    });
}

/** Account owning one common card per role (power 212). */
export function rosterAccount(id: number, catalog: CardCatalog = testCatalog()): Account {
    const account = createAccount(id, `player-${id}`, T0);
    giveCards(account, catalog, 1, 2, 3, 4);
    return account;
}
