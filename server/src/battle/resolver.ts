/**
 * resolver.ts
 *
 * Battle outcome shared by PvP and scripted opponents. The side with the
 * strictly higher lineup power wins 84% of the time; otherwise the requester
 * wins 16% of the time, so every battle can end in an upset.
 */

import type {Account} from '../../../shared/protocol/types/account.js';
import type {BattleMode, BattleOutcome, BattleSide} from '../../../shared/protocol/types/battle.js';
import type {Rng} from '../draw/drawEngine.js';
import {credit, debitFloored} from '../economy/ledger.js';

export const FAVOURED_WIN_CHANCE = 0.84;
export const UNDERDOG_WIN_CHANCE = 0.16;

export type BattleRewards = {
    winCoins: number;
    loseCoins: number;
    ratingGain: number;
    ratingLoss: number;
};

export const PVP_REWARDS: BattleRewards = {
    winCoins: 100,
    loseCoins: 50,
    ratingGain: 30,
    ratingLoss: 25,
};

export const SCRIPTED_LEVELS = ['novice', 'amateur', 'pro', 'star'] as const;
export type ScriptedLevel = typeof SCRIPTED_LEVELS[number];

export const SCRIPTED_OPPONENTS: Record<ScriptedLevel, { power: number; rewards: BattleRewards }> = {
    novice: {power: 200, rewards: {winCoins: 25, loseCoins: 10, ratingGain: 0, ratingLoss: 0}},
    amateur: {power: 250, rewards: {winCoins: 50, loseCoins: 15, ratingGain: 0, ratingLoss: 0}},
    pro: {power: 300, rewards: {winCoins: 75, loseCoins: 25, ratingGain: 0, ratingLoss: 0}},
    star: {power: 350, rewards: {winCoins: 100, loseCoins: 50, ratingGain: 0, ratingLoss: 0}},
};

export function winChance(requesterPower: number, opponentPower: number): number {
    return requesterPower > opponentPower ? FAVOURED_WIN_CHANCE : UNDERDOG_WIN_CHANCE;
}

export function rollBattle(requesterPower: number, opponentPower: number, rng: Rng = Math.random) {
    const chance = winChance(requesterPower, opponentPower);
    return {requesterWon: rng() < chance, winChance: chance};
}

/**
 * Credit the winner and penalize the loser. Either side may be absent (a
 * scripted opponent has no account). Penalties stop at zero; the outcome
 * reports what was actually taken.
 */
export function applyRewards(
    winner: Account | null,
    loser: Account | null,
    rewards: BattleRewards,
): { coinsLost: number; ratingLoss: number } {
    if (winner) {
        credit(winner.balances, 'coins', rewards.winCoins);
        winner.rating += rewards.ratingGain;
    }
    let coinsLost = 0;
    let ratingLoss = 0;
    if (loser) {
        coinsLost = debitFloored(loser.balances, 'coins', rewards.loseCoins);
        ratingLoss = Math.min(loser.rating, rewards.ratingLoss);
        loser.rating -= ratingLoss;
    }
    return {coinsLost, ratingLoss};
}

export function resolveBattle(
    mode: BattleMode,
    requester: BattleSide,
    opponent: BattleSide,
    accounts: { requester: Account; opponent: Account | null },
    rewards: BattleRewards,
    rng: Rng = Math.random,
    now: number = Date.now(),
): BattleOutcome {
    const {requesterWon, winChance: chance} = rollBattle(requester.power, opponent.power, rng);
    const winner = requesterWon ? accounts.requester : accounts.opponent;
    const loser = requesterWon ? accounts.opponent : accounts.requester;
    const {coinsLost, ratingLoss} = applyRewards(winner, loser, rewards);
    return {
        mode,
        requester,
        opponent,
        requesterWon,
        winChance: chance,
        coinsWon: rewards.winCoins,
        coinsLost,
        ratingGain: rewards.ratingGain,
        ratingLoss,
        resolvedAt: now,
    };
}
