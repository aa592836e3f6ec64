/**
 * account.ts
 *
 * Account defaults and collection helpers. Functions here mutate the account
 * they are given; the store only ever hands them a draft copy, so a refused
 * operation leaves the committed account untouched.
 */

import type {Account, AccountProfile} from '../../../shared/protocol/types/account.js';
import type {CardInstance, OwnedCard, Rarity} from '../../../shared/protocol/types/cards.js';
import {DEFAULT_BALANCES} from '../economy/ledger.js';
import {FREE_PACKS_MAX, timeUntilRefill} from '../regen/regenerator.js';

export const DEFAULT_RATING = 0;

export function createAccount(id: number, displayName: string | null, now: number = Date.now()): Account {
    return {
        id,
        displayName,
        balances: {...DEFAULT_BALANCES},
        collection: [],
        freePacks: FREE_PACKS_MAX,
        lastRefillAt: now,
        rating: DEFAULT_RATING,
        nextCardId: 1,
        diceWins: 0,
        diceLosses: 0,
        diceTotal: 0,
        createdAt: now,
    };
}

/**
 * Full reset to defaults. Keeps the account id, display name, creation time
 * and the card id counter, so ids handed out before the reset are never
 * reused; everything else, including the collection, is discarded.
 */
export function resetAccount(account: Account, now: number = Date.now()): Account {
    const fresh = createAccount(account.id, account.displayName, now);
    fresh.createdAt = account.createdAt;
    fresh.nextCardId = account.nextCardId;
    return Object.assign(account, fresh);
}

export function cloneAccount(account: Account): Account {
    return structuredClone(account);
}

/**
 * Insert a drawn card, assigning the next per-account id.
 */
export function addCard(account: Account, card: CardInstance): OwnedCard {
    const owned: OwnedCard = {...card, id: account.nextCardId};
    account.nextCardId += 1;
    account.collection.push(owned);
    return owned;
}

export function identityKey(card: Pick<CardInstance, 'name' | 'rarity'>): string {
    return `${card.name.trim().toLowerCase()}|${card.rarity}`;
}

export function countDuplicates(collection: readonly OwnedCard[], target: Pick<CardInstance, 'name' | 'rarity'>): number {
    const key = identityKey(target);
    return collection.filter((c) => identityKey(c) === key).length;
}

export function findCard(account: Account, cardId: number): OwnedCard | undefined {
    return account.collection.find((c) => c.id === cardId);
}

/** Newest first. */
export function sortedCollection(collection: readonly OwnedCard[]): OwnedCard[] {
    return [...collection].sort((a, b) => b.id - a.id);
}

export function countByRarity(collection: readonly OwnedCard[]): Record<Rarity, number> {
    const counts: Record<Rarity, number> = {common: 0, rare: 0, epic: 0, legendary: 0, mythic: 0};
    for (const card of collection) {
        counts[card.rarity] += 1;
    }
    return counts;
}

export function buildProfile(account: Account, now: number = Date.now()): AccountProfile {
    return {
        id: account.id,
        displayName: account.displayName,
        balances: {...account.balances},
        rating: account.rating,
        collectionSize: account.collection.length,
        byRarity: countByRarity(account.collection),
        freePacks: account.freePacks,
        msUntilRefill: timeUntilRefill(account, now),
        dice: {wins: account.diceWins, losses: account.diceLosses, total: account.diceTotal},
    };
}
