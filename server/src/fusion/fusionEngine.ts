/**
 * fusionEngine.ts
 *
 * Duplicate fusion: five copies sharing an identity key (case-insensitive
 * name + rarity) become one card of the next rarity plus a currency reward.
 * `fuse` edits the account it is given; callers pass a store draft so the
 * whole upgrade commits as one unit.
 */

import type {Account, Currency} from '../../../shared/protocol/types/account.js';
import type {OwnedCard, Rarity} from '../../../shared/protocol/types/cards.js';
import type {FusionResult} from '../../../shared/protocol/types/economy.js';
import {addCard, countDuplicates, findCard, identityKey} from '../accounts/account.js';
import type {CardCatalog} from '../catalog/catalog.js';
import {upgradeOf} from '../catalog/rarity.js';
import {pickFromLadder, toInstance, type Rng} from '../draw/drawEngine.js';
import {credit} from '../economy/ledger.js';
import {fail, ok, type Result} from '../errors.js';

export const FUSION_COST = 5;
export const FUSION_REWARD_CURRENCY: Currency = 'candies';
export const FUSION_REWARD_MAX = 100;

export type RewardRange = { min: number; max: number };

export const FUSION_REWARD_RANGES: Record<Rarity, RewardRange | null> = {
    common: {min: 5, max: 15},
    rare: {min: 10, max: 30},
    epic: {min: 25, max: 60},
    legendary: {min: 60, max: 150},
    mythic: null,
};

/**
 * Uniform integer in the rarity's range, clamped to `FUSION_REWARD_MAX`.
 */
export function rollReward(range: RewardRange, rng: Rng = Math.random): number {
    const span = range.max - range.min + 1;
    const roll = range.min + Math.min(span - 1, Math.floor(rng() * span));
    return Math.min(roll, FUSION_REWARD_MAX);
}

export function fuse(
    account: Account,
    targetCardId: number,
    catalog: CardCatalog,
    rng: Rng = Math.random,
    now: number = Date.now(),
): Result<FusionResult> {
    const target = findCard(account, targetCardId);
    if (!target) {
        return fail({code: 'NOT_FOUND', cardId: targetCardId});
    }
    const nextRarity = upgradeOf(target.rarity);
    const range = FUSION_REWARD_RANGES[target.rarity];
    if (!nextRarity || !range) {
        return fail({code: 'MAX_RARITY', rarity: target.rarity});
    }
    const available = countDuplicates(account.collection, target);
    if (available < FUSION_COST) {
        return fail({code: 'INSUFFICIENT_DUPLICATES', required: FUSION_COST, available});
    }

    const key = identityKey(target);
    const consumed: OwnedCard[] = [];
    account.collection = account.collection.filter((card) => {
        if (consumed.length < FUSION_COST && identityKey(card) === key) {
            consumed.push(card);
            return false;
        }
        return true;
    });

    const amount = rollReward(range, rng);
    const card = addCard(account, toInstance(pickFromLadder(catalog, nextRarity, rng), now));
    const credited = credit(account.balances, FUSION_REWARD_CURRENCY, amount);
    if (!credited.ok) return credited;

    return ok({
        from: {name: target.name, rarity: target.rarity},
        consumed,
        card,
        reward: {currency: FUSION_REWARD_CURRENCY, amount},
    });
}
