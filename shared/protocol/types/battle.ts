/**
 * battle.ts
 *
 * Battle and matchmaking result shapes. A lineup is the best card per role
 * chosen from a collection; outcomes carry both sides' power so a client can
 * render the comparison.
 */

import type {OwnedCard, Role} from './cards.js';

export type Lineup = Record<Role, OwnedCard>;

export type BattleSide = {
    accountId: number | null;
    displayName: string | null;
    power: number;
    lineup: Lineup | null;
};

export type BattleMode = 'pvp' | 'scripted';

export type BattleOutcome = {
    mode: BattleMode;
    requester: BattleSide;
    opponent: BattleSide;
    requesterWon: boolean;
    winChance: number;
    coinsWon: number;
    coinsLost: number;
    ratingGain: number;
    ratingLoss: number;
    resolvedAt: number;
};

export type MatchStatus =
    | { state: 'idle' }
    | { state: 'queued'; since: number; power: number }
    | { state: 'paired'; outcome: BattleOutcome }
    | { state: 'cancelled'; at: number };

export type MatchRequestResult =
    | { status: 'searching'; since: number }
    | { status: 'paired'; outcome: BattleOutcome };

export type CancelResult = { status: 'cancelled' } | { status: 'not_queued' };
