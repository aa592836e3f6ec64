/**
 * logging.ts
 *
 * Console logging for the game core; the HTTP layer logs through Fastify's
 * logger instead. Lines carry an ISO timestamp and level tag. `LOG_DEBUG=1`
 * (or `true`) enables debug lines.
 */

type Level = 'debug' | 'info';

function debugEnabled(): boolean {
    return process.env.LOG_DEBUG === '1' || process.env.LOG_DEBUG === 'true';
}

function write(level: Level, args: unknown[]) {
    console.log(new Date().toISOString(), level.toUpperCase(), ...args);
}

export function debug(...args: unknown[]) {
    if (debugEnabled()) {
        write('debug', args);
    }
}

export function info(...args: unknown[]) {
    write('info', args);
}
