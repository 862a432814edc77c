/**
 * @fileoverview Configuration
 * Reads the service configuration from environment variables, applying the
 * defaults from `constants.ts`. Invalid values are rejected, not coerced.
 */

import { CONSTANTS, ENV_KEYS, SENTRY_DSN, ERROR_TYPES } from './constants.js';
import { LogLevel, resolveLogLevel } from './logger.js';
import { AppError } from './utils.js';
import type { TieBreakPolicy } from './types.js';

/**
 * Resolved service configuration.
 */
export interface AppConfig {
    tieBreak: TieBreakPolicy;
    logLevel: LogLevel;
    sentry: {
        dsn: string;
        environment: string;
        release: string;
    };
}

function parseTieBreak(value: string | undefined): TieBreakPolicy {
    if (value === undefined || value.trim() === '') return CONSTANTS.DEFAULT_TIE_BREAK;

    const normalized = value.trim().toLowerCase();
    if (normalized === 'specificity' || normalized === 'source-order') {
        return normalized;
    }
    throw new AppError(
        `${ENV_KEYS.TIE_BREAK} must be "specificity" or "source-order", got "${value}"`,
        ERROR_TYPES.VALIDATION
    );
}

/**
 * Builds the configuration from an environment.
 *
 * @param env - Variables to read; defaults to `process.env`.
 * @throws AppError with VALIDATION type for malformed values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        tieBreak: parseTieBreak(env[ENV_KEYS.TIE_BREAK]),
        logLevel: resolveLogLevel(env),
        sentry: {
            dsn: env[ENV_KEYS.SENTRY_DSN]?.trim() || SENTRY_DSN,
            environment: env[ENV_KEYS.SENTRY_ENVIRONMENT] || env.NODE_ENV || 'development',
            release: env[ENV_KEYS.SENTRY_RELEASE] || CONSTANTS.DEFAULT_RELEASE,
        },
    };
}
