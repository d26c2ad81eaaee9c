/**
 * Structured logger bound to one service.
 *
 * Adds the service name to every line, filters by minimum level and redacts
 * credential-like metadata keys before anything is written.
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: LogLevel;
    /** Fields to redact from metadata (default: password, token, secret, etc.). */
    redactFields?: string[];
}

export interface ServiceLogger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
    child(scope: string): ServiceLogger;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
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
    'refreshToken',
    'refresh_token',
    'idToken',
    'id_token',
    'clientSecret',
    'client_secret'
];

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[]
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (value instanceof Error) {
            result[key] = { name: value.name, message: value.message };
        } else if (isPlainRecord(value)) {
            result[key] = redactMetadata(value, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;

    const emit = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched: Record<string, unknown> = {
            service: config.service,
            ...(metadata ? redactMetadata(metadata, redactFields) : {})
        };

        baseLog(level, message, enriched);
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata),
        child: (scope) =>
            createServiceLogger({
                ...config,
                service: `${config.service}:${scope}`,
                minLevel,
                redactFields
            })
    };
}
