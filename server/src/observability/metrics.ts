/**
 * metrics.ts
 *
 * Prometheus metrics registry and the game economy metrics.
 * - `register` is the central `prom-client` Registry used by the `/metrics`
 *   endpoint.
 * - Default process metrics are collected automatically.
 * - Application-specific counters/gauges are defined below and registered on
 *   the central registry.
 */

import client from 'prom-client';

export const register = new client.Registry();
// Collect default Node.js process metrics (CPU, memory, event loop, etc.)
client.collectDefaultMetrics({register});

// Counter: packs opened, labelled by pack type and the rarity that dropped
export const packsOpenedCounter = new client.Counter({
    name: 'packs_opened_total',
    help: 'Total number of packs opened',
    labelNames: ['pack_type', 'rarity'] as const,
    registers: [register],
});

// Counter: successful fusions by source rarity
export const fusionsCounter = new client.Counter({
    name: 'fusions_total',
    help: 'Total number of successful duplicate fusions',
    labelNames: ['from_rarity'] as const,
    registers: [register],
});

// Counter: resolved battles by mode and requester result
export const battlesCounter = new client.Counter({
    name: 'battles_total',
    help: 'Total number of resolved battles',
    labelNames: ['mode', 'result'] as const,
    registers: [register],
});

// Gauge: tickets currently waiting in the matchmaking queue
export const queueDepthGauge = new client.Gauge({
    name: 'matchmaking_queue_depth',
    help: 'Number of tickets waiting in the matchmaking queue',
    registers: [register],
});

// Counter: debits refused for lack of funds
export const ledgerRejectionsCounter = new client.Counter({
    name: 'ledger_rejections_total',
    help: 'Debits refused because the balance was too low',
    labelNames: ['currency'] as const,
    registers: [register],
});
