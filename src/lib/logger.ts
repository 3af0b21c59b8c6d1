// src/lib/logger.ts

import pino, { type Logger, type LoggerOptions } from 'pino';

// Patient names never reach the logs
const REDACTED_PATHS = ['name', '*.name', 'patientName', '*.patientName'];

export interface CreateLoggerOptions {
    name: string;
    level?: string;
}

/**
 * Create a structured logger with patient-name redaction
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { name, level = process.env.LOG_LEVEL ?? 'info' } = options;

    const loggerOptions: LoggerOptions = {
        name,
        level,
        redact: {
            paths: REDACTED_PATHS,
            censor: '[REDACTED]'
        },
        formatters: {
            level: (label) => ({ level: label })
        },
        base: null,
        serializers: {
            err: pino.stdSerializers.err
        }
    };

    return pino(loggerOptions);
}

export type { Logger };
