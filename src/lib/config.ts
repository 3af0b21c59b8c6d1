// src/lib/config.ts

import { z } from 'zod';
import { ValidationError } from './errors';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    QUEUE_CAPACITY: z.coerce.number().int().positive().default(500),
    TOKEN_ID_START: z.coerce.number().int().nonnegative().default(1000),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
    port: number;
    queueCapacity: number;
    tokenIdStart: number;
    logLevel: LogLevel;
}

/**
 * Read runtime configuration from the environment.
 * Empty strings count as unset so that `.env` placeholders fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const raw = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );

    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ValidationError('Invalid configuration', parsed.error.flatten().fieldErrors);
    }

    return {
        port: parsed.data.PORT,
        queueCapacity: parsed.data.QUEUE_CAPACITY,
        tokenIdStart: parsed.data.TOKEN_ID_START,
        logLevel: parsed.data.LOG_LEVEL
    };
}
