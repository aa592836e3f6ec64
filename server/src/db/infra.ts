/**
 * infra.ts
 *
 * Initializes and tears down infrastructure dependencies used by the server:
 * - opens the SQLite database and wraps it in the account repository
 * - verifies the database answers a trivial query before routes are served
 */

import type {FastifyBaseLogger} from 'fastify';
import type {AccountRepository} from '../accounts/repository.js';
import {SqliteAccountRepository} from './accountRepository.js';
import {openDatabase} from './sqlite.js';

export function initInfra(dbFile: string, log: FastifyBaseLogger): AccountRepository {
    const repository = new SqliteAccountRepository(openDatabase(dbFile));
    if (!repository.ping()) {
        throw new Error(`sqlite database ${dbFile} is not responding`);
    }
    log.info({dbFile}, 'sqlite ready');
    return repository;
}

export function closeInfra(repository: AccountRepository, log: FastifyBaseLogger) {
    log.info('closing infra…');
    try {
        repository.close();
    } catch (e) {
        log.error({e}, 'sqlite close failed');
    }
}
