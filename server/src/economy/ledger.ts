/**
 * ledger.ts
 *
 * Currency ledger over an account's four independent balances. Debits never
 * take a balance below zero; conversions check the paying side before either
 * balance changes.
 */

import type {Balances, Currency} from '../../../shared/protocol/types/account.js';
import {fail, ok, type Result} from '../errors.js';
import {ledgerRejectionsCounter} from '../observability/metrics.js';

export const DEFAULT_BALANCES: Readonly<Balances> = {
    coins: 1000,
    gems: 0,
    candies: 0,
    stars: 0,
};

function validAmount(amount: number): boolean {
    return Number.isSafeInteger(amount) && amount >= 0;
}

export function credit(balances: Balances, currency: Currency, amount: number): Result<Balances> {
    if (!validAmount(amount)) {
        return fail({code: 'INVALID_AMOUNT', amount});
    }
    balances[currency] += amount;
    return ok(balances);
}

export function canAfford(balances: Balances, currency: Currency, amount: number): Result<Balances> {
    if (!validAmount(amount)) {
        return fail({code: 'INVALID_AMOUNT', amount});
    }
    if (balances[currency] < amount) {
        ledgerRejectionsCounter.inc({currency});
        return fail({code: 'INSUFFICIENT_FUNDS', currency, required: amount, available: balances[currency]});
    }
    return ok(balances);
}

export function debit(balances: Balances, currency: Currency, amount: number): Result<Balances> {
    const check = canAfford(balances, currency, amount);
    if (!check.ok) return check;
    balances[currency] -= amount;
    return ok(balances);
}

/**
 * Subtract up to `amount`, stopping at zero. Used for battle penalties, which
 * are applied regardless of the loser's balance. Returns the amount taken.
 */
export function debitFloored(balances: Balances, currency: Currency, amount: number): number {
    const taken = Math.min(balances[currency], Math.max(0, amount));
    balances[currency] -= taken;
    return taken;
}

/**
 * Spend `cost` of one currency to gain `gain` of another. Both sides are
 * validated before anything is written.
 */
export function convert(
    balances: Balances,
    cost: { currency: Currency; amount: number },
    gain: { currency: Currency; amount: number },
): Result<Balances> {
    const check = canAfford(balances, cost.currency, cost.amount);
    if (!check.ok) return check;
    if (!validAmount(gain.amount)) {
        return fail({code: 'INVALID_AMOUNT', amount: gain.amount});
    }
    balances[cost.currency] -= cost.amount;
    balances[gain.currency] += gain.amount;
    return ok(balances);
}

export type ExchangeRate = { from: Currency; to: Currency; rate: number };

export const EXCHANGE_RATES: readonly ExchangeRate[] = [
    {from: 'gems', to: 'coins', rate: 100},
    {from: 'stars', to: 'gems', rate: 10},
    {from: 'candies', to: 'coins', rate: 5},
];

export function exchange(balances: Balances, from: Currency, to: Currency, amount: number): Result<Balances> {
    const rate = EXCHANGE_RATES.find((r) => r.from === from && r.to === to);
    if (!rate) {
        return fail({code: 'UNKNOWN_EXCHANGE', from, to});
    }
    if (!validAmount(amount) || amount === 0) {
        return fail({code: 'INVALID_AMOUNT', amount});
    }
    return convert(balances, {currency: from, amount}, {currency: to, amount: amount * rate.rate});
}
