/**
 * economy.ts
 *
 * Result payloads of the shop, fusion and casino operations.
 */

import type {Balances, Currency} from './account.js';
import type {OwnedCard, Rarity} from './cards.js';

export type PackOpening = {
    packType: string;
    card: OwnedCard;
    balances: Balances;
    freePacks: number;
};

export type FusionResult = {
    from: { name: string; rarity: Rarity };
    consumed: OwnedCard[];
    card: OwnedCard;
    reward: { currency: Currency; amount: number };
};

export type DiceResult = {
    roll: number;
    won: boolean;
    stake: number;
    prize: Partial<Balances>;
    balances: Balances;
};

export type FreePackStatus = {
    freePacks: number;
    maxFreePacks: number;
    msUntilRefill: number;
    countdown: { hours: number; minutes: number };
};
