/**
 * @fileoverview Application Constants
 * Calendar labels, configuration defaults, and the error taxonomy shared
 * across the calendar builder, the store, and the service layer.
 */

import type { PollutionLevel } from './types.js';

// ==================== ERROR TRACKING ====================

/**
 * Sentry DSN used when `SENTRY_DSN` is not set.
 * Placeholder values disable error reporting.
 */
export const SENTRY_DSN = '__SENTRY_DSN__';

/**
 * Environment variable names read by `loadConfig()`.
 */
export const ENV_KEYS = {
    TIE_BREAK: 'TIMELOG_TIE_BREAK',
    /** Debug flag. */
    DEBUG: 'TIMELOG_DEBUG',
    LOG_LEVEL: 'LOG_LEVEL',
    SENTRY_DSN: 'SENTRY_DSN',
    SENTRY_ENVIRONMENT: 'SENTRY_ENVIRONMENT',
    SENTRY_RELEASE: 'SENTRY_RELEASE',
} as const;

/**
 * Global application constants.
 */
export const CONSTANTS = {
    DEFAULT_TIE_BREAK: 'specificity',
    DEFAULT_RELEASE: 'timelog-calendar@1.0.0',
} as const;

// ==================== CALENDAR CONSTANTS ====================

/** Month names for calendar titles, January first. */
export const MONTH_NAMES = [
    'Januar',
    'Februar',
    'März',
    'April',
    'Mai',
    'Juni',
    'Juli',
    'August',
    'September',
    'Oktober',
    'November',
    'Dezember',
] as const;

/** Weekday names, Monday = 0. */
export const WEEKDAY_NAMES = [
    'Montag',
    'Dienstag',
    'Mittwoch',
    'Donnerstag',
    'Freitag',
    'Samstag',
    'Sonntag',
] as const;

/** Calendar years a date key can name. */
export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

export const SATURDAY = 5;
export const SUNDAY = 6;

export const POLLUTION_LABELS: Record<PollutionLevel, string> = {
    1: 'Niedrig',
    2: 'Mittel',
    3: 'Hoch',
};

/**
 * Rank of each non-working pattern under the `specificity` tie-break.
 * Lower ranks win.
 */
export const PATTERN_PRECEDENCE = {
    specific: 0,
    weekly: 1,
    monthly: 2,
} as const;

/** Overnight shifts start at or after this hour... */
export const OVERNIGHT_START_HOUR = 18;
/** ...and end at or before this one. */
export const OVERNIGHT_END_HOUR = 12;

export const MINUTES_PER_DAY = 24 * 60;

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    NETWORK: 'NETWORK_ERROR',
    AUTH: 'AUTH_ERROR',
    VALIDATION: 'VALIDATION_ERROR',
    API: 'API_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: 'retry' | 'reload' | 'none';
}

/**
 * User-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.NETWORK]: {
        title: 'Network Error',
        message: 'Unable to reach the data source. Please try again.',
        action: 'retry',
    },
    [ERROR_TYPES.AUTH]: {
        title: 'Authentication Error',
        message: 'The data source refused access to this employee.',
        action: 'reload',
    },
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'Invalid calendar data was received or configured.',
        action: 'none',
    },
    [ERROR_TYPES.API]: {
        title: 'API Error',
        message: 'The data source returned an error. It may be temporarily unavailable.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred while building the calendar.',
        action: 'none',
    },
};
