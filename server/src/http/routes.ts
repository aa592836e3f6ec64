/**
 * routes.ts
 *
 * Central HTTP route registration. Composes the individual route modules so
 * the server entrypoint can simply call `registerHttpRoutes(app, deps)`, and
 * installs the fallback error handler.
 */

import type {FastifyInstance} from 'fastify';
import type {AccountRepository} from '../accounts/repository.js';
import type {GameService} from '../game/service.js';
import {registerAccountRoutes} from './accounts.js';
import {registerBattleRoutes} from './battles.js';
import {registerCardRoutes} from './cards.js';
import {registerHealthRoutes, registerMetricsRoute} from './health.js';
import {registerPackRoutes} from './packs.js';
import {registerPlatformRoutes} from './platform.js';
import {registerShopRoutes} from './shop.js';

export type HttpDeps = {
    game: GameService;
    repository: AccountRepository;
    platformKey: string | null;
};

export async function registerHttpRoutes(app: FastifyInstance, deps: HttpDeps) {
    app.setErrorHandler((err, _req, reply) => {
        // malformed JSON and similar parser failures
        if (err.statusCode !== undefined && err.statusCode < 500) {
            return reply.code(err.statusCode).send({ok: false, error: {code: 'VALIDATION_ERROR', message: err.message}});
        }
        app.log.error({err}, 'request failed');
        return reply.code(500).send({ok: false, error: {code: 'INTERNAL_ERROR'}});
    });

    await registerHealthRoutes(app, deps.repository);
    await registerMetricsRoute(app, () => deps.game.matchmaking.depth);
    await registerCardRoutes(app, deps.game.catalog);
    await registerAccountRoutes(app, deps.game);
    await registerPackRoutes(app, deps.game);
    await registerShopRoutes(app, deps.game);
    await registerBattleRoutes(app, deps.game);
    await registerPlatformRoutes(app, deps.game, deps.platformKey);
}
