/**
 * Service-scoped structured logger.
 *
 * Wraps the base JSON logger with a service name, an optional correlation
 * id, a minimum level and recursive redaction of secret-looking keys.
 * Upstream FX credentials travel as `access_key`, so that key is redacted
 * alongside the usual token and password fields.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export type ExtendedLogLevel = LogLevel | 'debug';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: ExtendedLogLevel;
    /** Key fragments to redact from metadata. */
    redactFields?: string[];
    /** Sink for emitted entries, the base JSON logger unless overridden. */
    sink?: (level: LogLevel, message: string, metadata: Record<string, unknown>) => void;
}

export interface ServiceLogger {
    setCorrelationId(id: string | undefined): void;
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
}

const LOG_LEVEL_ORDER: Record<ExtendedLogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

const DEFAULT_REDACT_FIELDS = [
    'password',
    'token',
    'secret',
    'authorization',
    'cookie',
    'apiKey',
    'api_key',
    'access_key',
    'accessKey',
    'privateKey',
    'private_key'
];

export function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[] = DEFAULT_REDACT_FIELDS
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (isPlainRecord(value)) {
            result[key] = redactMetadata(value, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;
    const sink = config.sink ?? baseLog;

    let currentCorrelationId: string | undefined;

    const emit = (level: ExtendedLogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched: Record<string, unknown> = {
            service: config.service,
            ...(level === 'debug' ? { debug: true } : {}),
            ...(currentCorrelationId ? { correlationId: currentCorrelationId } : {}),
            ...(metadata ? redactMetadata(metadata, redactFields) : {})
        };

        // The base logger has no debug channel.
        sink(level === 'debug' ? 'info' : level, message, enriched);
    };

    return {
        setCorrelationId(id: string | undefined): void {
            currentCorrelationId = id;
        },
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata)
    };
}
