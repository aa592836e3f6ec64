/**
 * index.ts
 *
 * Server entrypoint. Responsibilities:
 * - Parse configuration (OpenTelemetry is started by `instrument.ts`, which
 *   must load before fastify)
 * - Load the card catalog and open the account database
 * - Configure the Fastify HTTP server and register routes
 * - Provide graceful shutdown handlers for SIGINT / SIGTERM
 *
 * The application logic is delegated to the game service and route modules.
 */

import {telemetry} from './instrument.js';
import Fastify from 'fastify';
import {AccountStore} from './accounts/store.js';
import {CardCatalog} from './catalog/catalog.js';
import {loadConfig} from './config.js';
import {closeInfra, initInfra} from './db/infra.js';
import {GameService} from './game/service.js';
import {registerHttpRoutes} from './http/routes.js';

const config = loadConfig();

// Create the Fastify instance. Keep logger level configurable via env.
const app = Fastify({
    logger: {
        level: config.logLevel,
    },
});

// A bad catalog or an unreachable database aborts start-up
const catalog = CardCatalog.loadFile(config.catalogFile);
const repository = initInfra(config.dbFile, app.log);
const store = new AccountStore(repository);
const game = new GameService(store, catalog);

await registerHttpRoutes(app, {game, repository, platformKey: config.platformKey});

// Graceful shutdown: stop accepting requests, then close the database and telemetry
const shutdown = async () => {
    app.log.info('shutting down...');
    try {
        await app.close();
    } catch (err) {
        app.log.error({err}, 'fastify close failed');
    }
    closeInfra(repository, app.log);
    if (telemetry) {
        await telemetry.shutdown().catch((err: unknown) => app.log.error({err}, 'telemetry shutdown failed'));
    }
    process.exit(0);
};
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

// Start listening on configured port/address
try {
    await app.listen({port: config.port, host: config.host});
} catch (err) {
    app.log.error({err}, 'listen failed');
    process.exit(1);
}
