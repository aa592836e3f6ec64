/**
 * packs.ts
 *
 * Pack definitions: an ordered list of rarity weights per pack type plus the
 * pack's price. Weights need not sum to 100; the declared order decides which
 * rarity wins a roll and must not be re-sorted.
 */

import type {Currency} from '../../../shared/protocol/types/account.js';
import type {Rarity} from '../../../shared/protocol/types/cards.js';

export type RarityWeight = { rarity: Rarity; weight: number };

export const PACK_TYPES = ['basic', 'premium', 'free'] as const;
export type PackType = typeof PACK_TYPES[number];

export type PackPrice = { currency: Currency; amount: number } | { freePack: true };

export type PackDefinition = {
    weights: readonly RarityWeight[];
    price: PackPrice;
};

const BASIC_WEIGHTS: readonly RarityWeight[] = [
    {rarity: 'common', weight: 60},
    {rarity: 'rare', weight: 35},
    {rarity: 'epic', weight: 4},
    {rarity: 'legendary', weight: 0.9},
    {rarity: 'mythic', weight: 0.1},
];

export const PACKS: Record<PackType, PackDefinition> = {
    basic: {
        weights: BASIC_WEIGHTS,
        price: {currency: 'coins', amount: 100},
    },
    premium: {
        weights: [
            {rarity: 'rare', weight: 55},
            {rarity: 'epic', weight: 30},
            {rarity: 'legendary', weight: 13},
            {rarity: 'mythic', weight: 2},
        ],
        price: {currency: 'gems', amount: 50},
    },
    free: {
        weights: BASIC_WEIGHTS,
        price: {freePack: true},
    },
};
