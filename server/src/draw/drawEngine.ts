/**
 * drawEngine.ts
 *
 * Weighted rarity sampling with rarity fallback. A roll in [0, 100) walks the
 * pack's weights in declared order; the chosen rarity is then looked up in the
 * catalog, stepping down the fallback ladder while a tier is empty.
 */

import type {CardDefinition, CardInstance, Rarity} from '../../../shared/protocol/types/cards.js';
import type {CardCatalog} from '../catalog/catalog.js';
import {FALLBACK_LADDER, LOWEST_RARITY} from '../catalog/rarity.js';
import {PACKS, type PackType, type RarityWeight} from './packs.js';

export type Rng = () => number;

/**
 * Pick a rarity from an ordered weight list. The first entry whose running
 * sum exceeds the roll wins; when none does the lowest tier is returned.
 */
export function pickRarity(weights: readonly RarityWeight[], rng: Rng = Math.random): Rarity {
    const roll = rng() * 100;
    let acc = 0;
    for (const w of weights) {
        acc += w.weight;
        if (roll < acc) return w.rarity;
    }
    return LOWEST_RARITY;
}

function pickUniform<T>(items: readonly T[], rng: Rng): T {
    return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}

/**
 * Pick a catalog entry starting at `rarity` and walking down the fallback
 * ladder. A catalog with no entry on the remaining ladder falls back to the
 * whole catalog.
 */
export function pickFromLadder(catalog: CardCatalog, rarity: Rarity, rng: Rng = Math.random): CardDefinition {
    const start = FALLBACK_LADDER.indexOf(rarity);
    for (const tier of FALLBACK_LADDER.slice(start)) {
        const pool = catalog.ofRarity(tier);
        if (pool.length > 0) return pickUniform(pool, rng);
    }
    return pickUniform(catalog.cards, rng);
}

export function toInstance(def: CardDefinition, now: number = Date.now()): CardInstance {
    return {
        id: null,
        definitionId: def.id,
        name: def.name,
        rarity: def.rarity,
        ovr: def.ovr,
        role: def.role,
        acquiredAt: new Date(now).toISOString(),
    };
}

export function drawWithWeights(
    catalog: CardCatalog,
    weights: readonly RarityWeight[],
    rng: Rng = Math.random,
    now: number = Date.now(),
): CardInstance {
    const selected = pickRarity(weights, rng);
    return toInstance(pickFromLadder(catalog, selected, rng), now);
}

/**
 * Draw one card for a pack type. The returned instance has no per-account id;
 * the caller assigns one when inserting it into a collection.
 */
export function draw(catalog: CardCatalog, packType: PackType, rng: Rng = Math.random, now: number = Date.now()): CardInstance {
    return drawWithWeights(catalog, PACKS[packType].weights, rng, now);
}
