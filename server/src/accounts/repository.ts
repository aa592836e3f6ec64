/**
 * repository.ts
 *
 * Storage seam for the account store. The server uses the SQLite-backed
 * implementation in `db/accountRepository.ts`; `InMemoryAccountRepository`
 * keeps copies in a Map and backs tests and throwaway runs.
 */

import type {Account} from '../../../shared/protocol/types/account.js';
import {cloneAccount} from './account.js';

export interface AccountRepository {
    loadAll(): Account[];
    // all accounts passed to one call are written together or not at all
    save(...accounts: Account[]): void;
    ping(): boolean;
    close(): void;
}

export class InMemoryAccountRepository implements AccountRepository {
    readonly rows = new Map<number, Account>();
    saves = 0;

    loadAll(): Account[] {
        return [...this.rows.values()].map(cloneAccount);
    }

    save(...accounts: Account[]): void {
        for (const account of accounts) {
            this.rows.set(account.id, cloneAccount(account));
        }
        this.saves += 1;
    }

    ping(): boolean {
        return true;
    }

    close(): void {
    }
}
