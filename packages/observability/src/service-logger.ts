/**
 * Structured logger bound to one component.
 *
 * Adds to the base logger:
 * - the component name on every line
 * - a minimum level (debug lines are dropped in production by default)
 * - redaction of credential fields, including `access_key` query values
 *   embedded in URLs
 */

import { log as baseLog, type LogLevel } from './logger.js';

export interface ServiceLoggerConfig {
    /** Component name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: LogLevel;
    /** Metadata keys to redact (default: access keys, tokens, secrets). */
    redactFields?: string[];
    /** Send every line to stderr (for CLIs whose stdout is data). */
    stderr?: boolean;
}

export interface Logger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
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
    'accessKey',
    'access_key',
    'apiKey',
    'api_key'
];

const ACCESS_KEY_IN_URL = /(access_key=)[^&\s"]+/g;

export function redactUrl(value: string): string {
    return value.replace(ACCESS_KEY_IN_URL, '$1[REDACTED]');
}

function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[]
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string') {
            result[key] = redactUrl(value);
        } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
            result[key] = redactMetadata(value as Record<string, unknown>, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig): Logger {
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

        baseLog(level, message, enriched, { stderr: config.stderr });
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata)
    };
}
