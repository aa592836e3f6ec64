/**
 * config.ts
 *
 * Environment-configurable settings, read once near startup and validated
 * with zod. Invalid values abort start-up.
 */

import path from 'node:path';
import {z} from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    HOST: z.string().default('0.0.0.0'),
    FASTIFY_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
    DATA_DIR: z.string().default(path.join(process.cwd(), 'server', 'data')),
    DB_FILE: z.string().optional(),
    CATALOG_FILE: z.string().default(path.join(process.cwd(), 'server', 'config', 'catalog.json')),
    PLATFORM_KEY: z.string().min(1).optional(),
    OTEL_ENABLED: booleanFlag.default('false'),
    OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: z.string().url().default('http://otel-collector:4318/v1/traces'),
    OTEL_EXPORTER_OTLP_METRICS_ENDPOINT: z.string().url().default('http://otel-collector:4318/v1/metrics'),
});

export type AppConfig = {
    port: number;
    host: string;
    logLevel: z.infer<typeof envSchema>['FASTIFY_LOG_LEVEL'];
    dataDir: string;
    dbFile: string;
    catalogFile: string;
    // shared secret for platform-only routes; those routes are disabled without it
    platformKey: string | null;
    otel: {
        enabled: boolean;
        tracesEndpoint: string;
        metricsEndpoint: string;
    };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);
    return {
        port: parsed.PORT,
        host: parsed.HOST,
        logLevel: parsed.FASTIFY_LOG_LEVEL,
        dataDir: parsed.DATA_DIR,
        dbFile: parsed.DB_FILE ?? path.join(parsed.DATA_DIR, 'game.sqlite'),
        catalogFile: parsed.CATALOG_FILE,
        platformKey: parsed.PLATFORM_KEY ?? null,
        otel: {
            enabled: parsed.OTEL_ENABLED,
            tracesEndpoint: parsed.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
            metricsEndpoint: parsed.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT,
        },
    };
}
