/**
 * rarity.ts
 *
 * The rarity ladder and the alias tables used to normalize catalog input.
 * `FALLBACK_LADDER` is walked from a selected rarity towards `common` when a
 * tier has no catalog entries.
 */

import type {Rarity, Role} from '../../../shared/protocol/types/cards.js';

export const FALLBACK_LADDER: readonly Rarity[] = ['mythic', 'legendary', 'epic', 'rare', 'common'];

export const LOWEST_RARITY: Rarity = 'common';

const UPGRADES: Record<Rarity, Rarity | null> = {
    common: 'rare',
    rare: 'epic',
    epic: 'legendary',
    legendary: 'mythic',
    mythic: null,
};

export function upgradeOf(rarity: Rarity): Rarity | null {
    return UPGRADES[rarity];
}

const RARITY_ALIASES: Record<string, Rarity> = {
    common: 'common', 'обычная': 'common', 'обыкновенная': 'common', 'обычный': 'common',
    rare: 'rare', 'редкая': 'rare', 'редкий': 'rare',
    epic: 'epic', 'эпическая': 'epic', 'эпик': 'epic',
    legendary: 'legendary', 'легендарная': 'legendary', 'лега': 'legendary',
    mythic: 'mythic', 'мифическая': 'mythic', 'мифик': 'mythic',
};

// rarity badges sometimes pasted into the name of the tier
const RARITY_DECORATIONS = /[\u{1F7E2}\u{1F535}\u{1F7E3}\u{1F451}\u{1F90D}\u{1F48E}]+/gu;

export function normalizeRarity(value: string): Rarity | null {
    const v = value.replace(RARITY_DECORATIONS, '').trim().toLowerCase();
    return RARITY_ALIASES[v] ?? null;
}

const ROLE_ALIASES: Record<string, Role> = {
    goalkeeper: 'goalkeeper', 'вратарь': 'goalkeeper',
    defender: 'defender', 'защитник': 'defender',
    midfielder: 'midfielder', 'полузащитник': 'midfielder',
    forward: 'forward', 'нападающий': 'forward',
};

export function roleOf(position: string): Role | null {
    return ROLE_ALIASES[position.trim().toLowerCase()] ?? null;
}
