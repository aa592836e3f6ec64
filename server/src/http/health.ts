/**
 * health.ts
 *
 * Operational endpoints: `/api/health` checks that the account database
 * answers a trivial query, `/metrics` serves the Prometheus scrape.
 */

import type {FastifyInstance} from 'fastify';
import type {AccountRepository} from '../accounts/repository.js';
import {queueDepthGauge, register} from '../observability/metrics.js';

export async function registerHealthRoutes(app: FastifyInstance, repository: AccountRepository) {
    app.get('/api/health', async () => {
        const services = {sqlite: false};
        try {
            services.sqlite = repository.ping();
        } catch (err) {
            app.log.warn({err}, 'sqlite ping failed');
        }
        const allHealthy = Object.values(services).every(Boolean);
        app.log.debug({allHealthy, services});
        return {ok: allHealthy, healthy: allHealthy, services};
    });
}

export async function registerMetricsRoute(app: FastifyInstance, queueDepth: () => number) {
    app.get('/metrics', async (_req, reply) => {
        queueDepthGauge.set(queueDepth());
        try {
            const body = await register.metrics();
            return reply.type(register.contentType).send(body);
        } catch (err) {
            app.log.error({err}, 'metrics scrape failed');
            return reply.code(500).send('metrics error');
        }
    });
}
