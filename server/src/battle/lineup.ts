/**
 * lineup.ts
 *
 * Team assembly: the highest-rated owned card for each of the four roles.
 * Ties keep the card seen first in collection order.
 */

import type {Lineup} from '../../../shared/protocol/types/battle.js';
import {ROLES, type OwnedCard, type Role} from '../../../shared/protocol/types/cards.js';
import {fail, ok, type Result} from '../errors.js';

export type AssembledLineup = {
    lineup: Lineup;
    power: number;
};

export function lineupPower(lineup: Lineup): number {
    return ROLES.reduce((sum, role) => sum + lineup[role].ovr, 0);
}

export function bestLineup(collection: readonly OwnedCard[]): Result<AssembledLineup> {
    const best = new Map<Role, OwnedCard>();
    for (const card of collection) {
        if (!card.role) continue;
        const current = best.get(card.role);
        if (!current || card.ovr > current.ovr) {
            best.set(card.role, card);
        }
    }

    const missing = ROLES.filter((role) => !best.has(role));
    const goalkeeper = best.get('goalkeeper');
    const defender = best.get('defender');
    const midfielder = best.get('midfielder');
    const forward = best.get('forward');
    if (!goalkeeper || !defender || !midfielder || !forward) {
        return fail({code: 'INCOMPLETE_ROSTER', missing});
    }

    const lineup: Lineup = {goalkeeper, defender, midfielder, forward};
    return ok({lineup, power: lineupPower(lineup)});
}
