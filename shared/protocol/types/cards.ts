/**
 * cards.ts
 *
 * Card shapes shared between the game server and any presentation client:
 * the rarity ladder, battle roles and the owned-copy (`CardInstance`) record
 * stored in an account's collection.
 */

export const RARITIES = ['common', 'rare', 'epic', 'legendary', 'mythic'] as const;
export type Rarity = typeof RARITIES[number];

export const ROLES = ['goalkeeper', 'defender', 'midfielder', 'forward'] as const;
export type Role = typeof ROLES[number];

export type LocaleText = {
    name?: string;
    description?: string;
};

export type CardDefinition = {
    id: number;
    name: string;
    rarity: Rarity;
    ovr: number;
    position: string;
    role: Role | null;
    country?: string;
    image?: string;
    text: Record<string, LocaleText>;
};

export type CardInstance = {
    // per-account sequential id; null until the card is inserted into a collection
    id: number | null;
    definitionId: number;
    name: string;
    rarity: Rarity;
    ovr: number;
    role: Role | null;
    acquiredAt: string;
    mediaRef?: string;
};

export type OwnedCard = CardInstance & { id: number };
