/**
 * account.ts
 *
 * Account, balance and profile shapes returned by the account APIs.
 */

import type {OwnedCard, Rarity} from './cards.js';

export const CURRENCIES = ['coins', 'gems', 'candies', 'stars'] as const;
export type Currency = typeof CURRENCIES[number];

export type Balances = Record<Currency, number>;

export type Account = {
    id: number;
    displayName: string | null;
    balances: Balances;
    collection: OwnedCard[];
    freePacks: number;
    lastRefillAt: number;
    rating: number;
    nextCardId: number;
    diceWins: number;
    diceLosses: number;
    diceTotal: number;
    createdAt: number;
};

export type AccountProfile = {
    id: number;
    displayName: string | null;
    balances: Balances;
    rating: number;
    collectionSize: number;
    byRarity: Record<Rarity, number>;
    freePacks: number;
    msUntilRefill: number;
    dice: { wins: number; losses: number; total: number };
};

export type LeaderboardEntry = {
    rank: number;
    accountId: number;
    displayName: string | null;
    rating: number;
};
