/**
 * Connection pool configuration.
 *
 * Environment-driven settings for the postgres.js client, with production
 * defaults when NODE_ENV is `production`.
 */

export interface DbConfig {
    /** Max pool connections (default: 20 for production, 5 otherwise). */
    maxConnections: number;
    /** Close idle connections after this many seconds (default: 30). */
    idleTimeoutSeconds: number;
    /** Connection timeout in seconds (default: 5). */
    connectTimeoutSeconds: number;
    /** Recycle connections after this many seconds (default: 30 min). */
    maxLifetimeSeconds: number;
    /** Use named prepared statements (off behind transaction poolers). */
    prepareStatements: boolean;
    /** Statement timeout in ms (default: 30s). */
    statementTimeoutMs: number;
}

function numberFromEnv(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
    const isProd = (env.NODE_ENV ?? 'development') === 'production';

    return {
        maxConnections: numberFromEnv(env.DB_POOL_MAX, isProd ? 20 : 5),
        idleTimeoutSeconds: numberFromEnv(env.DB_IDLE_TIMEOUT_SECONDS, 30),
        connectTimeoutSeconds: numberFromEnv(env.DB_CONNECT_TIMEOUT_SECONDS, 5),
        maxLifetimeSeconds: numberFromEnv(env.DB_MAX_LIFETIME_SECONDS, 30 * 60),
        prepareStatements: env.DB_PREPARE_STATEMENTS !== 'false',
        statementTimeoutMs: numberFromEnv(env.DB_STATEMENT_TIMEOUT_MS, 30_000)
    };
}
