/**
 * store.ts
 *
 * In-memory account table with write-through persistence. Every mutation goes
 * through `transact`: the callback edits deep copies, and only a successful
 * result is written to the repository and then swapped into memory. A refused
 * operation (or a failed write) leaves the committed accounts untouched.
 *
 * Accounts are created lazily on first contact and the free-pack refill is
 * evaluated on every access.
 */

import type {Account, LeaderboardEntry} from '../../../shared/protocol/types/account.js';
import type {Result} from '../errors.js';
import {debug, info} from '../logging.js';
import {checkRefill} from '../regen/regenerator.js';
import {cloneAccount, createAccount} from './account.js';
import type {AccountRepository} from './repository.js';

export type CallerIdentity = {
    accountId: number;
    displayName?: string | null;
};

export class AccountStore {
    private readonly accounts = new Map<number, Account>();

    constructor(private readonly repository: AccountRepository) {
        for (const account of repository.loadAll()) {
            this.accounts.set(account.id, account);
        }
        info(`[accounts] loaded ${this.accounts.size} accounts`);
    }

    get size(): number {
        return this.accounts.size;
    }

    /**
     * Resolve the caller's account, creating it on first contact. Also picks up
     * a changed display name and applies a due free-pack refill.
     */
    touch(identity: CallerIdentity, now: number = Date.now()): Account {
        const existing = this.accounts.get(identity.accountId);
        if (!existing) {
            const created = createAccount(identity.accountId, identity.displayName ?? null, now);
            this.commit([created]);
            info('[accounts] created', {accountId: created.id});
            return cloneAccount(created);
        }

        const draft = cloneAccount(existing);
        let changed = false;
        if (identity.displayName && identity.displayName !== draft.displayName) {
            draft.displayName = identity.displayName;
            changed = true;
        }
        if (checkRefill(draft, now)) {
            debug('[accounts] free packs refilled', {accountId: draft.id});
            changed = true;
        }
        if (changed) this.commit([draft]);
        return cloneAccount(draft);
    }

    peek(accountId: number): Account | undefined {
        const account = this.accounts.get(accountId);
        return account ? cloneAccount(account) : undefined;
    }

    mutate<T>(accountId: number, now: number, fn: (draft: Account) => Result<T>): Result<T> {
        return this.transact([accountId], now, ([draft]) => fn(draft));
    }

    /**
     * Run `fn` against drafts of the given accounts and commit them together
     * when it succeeds.
     */
    transact<T>(accountIds: readonly number[], now: number, fn: (drafts: Account[]) => Result<T>): Result<T> {
        const drafts = accountIds.map((id) => this.touch({accountId: id}, now));
        const result = fn(drafts);
        if (!result.ok) {
            debug('[accounts] mutation refused', {accountIds, code: result.error.code});
            return result;
        }
        this.commit(drafts);
        return result;
    }

    leaderboard(limit = 20): LeaderboardEntry[] {
        return [...this.accounts.values()]
            .sort((a, b) => b.rating - a.rating || a.id - b.id)
            .slice(0, limit)
            .map((a, i) => ({rank: i + 1, accountId: a.id, displayName: a.displayName, rating: a.rating}));
    }

    private commit(accounts: Account[]): void {
        this.repository.save(...accounts);
        for (const account of accounts) {
            this.accounts.set(account.id, account);
        }
    }
}
