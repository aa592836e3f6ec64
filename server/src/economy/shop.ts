/**
 * shop.ts
 *
 * Pack purchases, free packs and the dice mini-game. Each function edits the
 * account draft it is given and checks the paying side before changing
 * anything.
 */

import type {Account} from '../../../shared/protocol/types/account.js';
import type {DiceResult, PackOpening} from '../../../shared/protocol/types/economy.js';
import {addCard} from '../accounts/account.js';
import type {CardCatalog} from '../catalog/catalog.js';
import {draw, type Rng} from '../draw/drawEngine.js';
import {PACKS, type PackType} from '../draw/packs.js';
import {fail, ok, type Result} from '../errors.js';
import {checkRefill, consumeFreePack, timeUntilRefill} from '../regen/regenerator.js';
import {credit, debit} from './ledger.js';

export function openPack(
    account: Account,
    packType: PackType,
    catalog: CardCatalog,
    rng: Rng = Math.random,
    now: number = Date.now(),
): Result<PackOpening> {
    const {price} = PACKS[packType];
    if ('freePack' in price) {
        checkRefill(account, now);
        if (!consumeFreePack(account)) {
            return fail({code: 'NO_FREE_PACKS', msUntilRefill: timeUntilRefill(account, now)});
        }
    } else {
        const paid = debit(account.balances, price.currency, price.amount);
        if (!paid.ok) return paid;
    }

    const card = addCard(account, draw(catalog, packType, rng, now));
    return ok({packType, card, balances: {...account.balances}, freePacks: account.freePacks});
}

export const DICE_STAKE = 100;
export const DICE_WIN_THRESHOLD = 4;
export const DICE_PRIZE = {coins: 500, gems: 10} as const;

export function rollDice(account: Account, rng: Rng = Math.random): Result<DiceResult> {
    const stake = debit(account.balances, 'coins', DICE_STAKE);
    if (!stake.ok) return stake;

    const roll = 1 + Math.min(5, Math.floor(rng() * 6));
    const won = roll >= DICE_WIN_THRESHOLD;
    if (won) {
        credit(account.balances, 'coins', DICE_PRIZE.coins);
        credit(account.balances, 'gems', DICE_PRIZE.gems);
        account.diceWins += 1;
    } else {
        account.diceLosses += 1;
    }
    account.diceTotal += 1;
    return ok({
        roll,
        won,
        stake: DICE_STAKE,
        prize: won ? {...DICE_PRIZE} : {},
        balances: {...account.balances},
    });
}
