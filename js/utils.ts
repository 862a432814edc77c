/**
 * @fileoverview Utility Functions
 * Generic helper functions for calendar date arithmetic, record validation,
 * error handling, and formatting. These functions are pure and stateless.
 */

import {
    ERROR_MESSAGES,
    ERROR_TYPES,
    MAX_YEAR,
    MIN_YEAR,
    SATURDAY,
    SUNDAY,
    type ErrorType,
} from './constants.js';
import type { DateKey, DateRange, FriendlyError, Weekday } from './types.js';

// ==================== ERRORS ====================

/**
 * Error carrying its classification and, for HTTP failures, the status code.
 */
export class AppError extends Error {
    readonly type: ErrorType;
    readonly status?: number;

    constructor(message: string, type: ErrorType, status?: number) {
        super(message);
        this.name = 'AppError';
        this.type = type;
        this.status = status;
    }
}

/**
 * Creates a validation error.
 * @param message - The error message.
 */
function createValidationError(message: string): AppError {
    return new AppError(message, ERROR_TYPES.VALIDATION);
}

// ==================== TYPE VALIDATION ====================

/**
 * Narrows an unknown value to a plain record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a valid number.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The validated number.
 * @throws AppError with VALIDATION type if invalid.
 */
export function validateNumber(value: unknown, field: string): number {
    if (value === null || value === undefined || value === '') {
        throw createValidationError(`${field} is required`);
    }
    const num = Number(value);
    if (isNaN(num)) {
        throw createValidationError(`${field} must be a number`);
    }
    return num;
}

/**
 * Narrows a number to a Monday-first weekday index.
 */
export function isWeekday(value: number): value is Weekday {
    return Number.isInteger(value) && value >= 0 && value <= 6;
}

/**
 * Validates that a value is an integer within `[min, max]`.
 */
export function validateInteger(value: unknown, field: string, min: number, max: number): number {
    const num = validateNumber(value, field);
    if (!Number.isInteger(num) || num < min || num > max) {
        throw createValidationError(`${field} must be an integer between ${min} and ${max}`);
    }
    return num;
}

/**
 * Validates that a value is a valid string.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The validated, trimmed string.
 * @throws AppError with VALIDATION type if invalid.
 */
export function validateString(value: unknown, field: string): string {
    if (value === null || value === undefined || typeof value !== 'string') {
        throw createValidationError(`${field} must be a non-empty string`);
    }
    const trimmed = value.trim();
    if (trimmed === '') {
        throw createValidationError(`${field} cannot be empty`);
    }
    return trimmed;
}

/**
 * Validates that a value is a real calendar date in `YYYY-MM-DD` form.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The validated date key.
 * @throws AppError with VALIDATION type if invalid.
 */
export function validateISODateString(value: unknown, field: string): DateKey {
    const str = validateString(value, field);

    if (!IsoUtils.parseDate(str)) {
        throw createValidationError(`${field} must be a valid date in ISO format (YYYY-MM-DD)`);
    }

    return str;
}

/**
 * Validates a wall-clock time in `HH:mm` (seconds are accepted and dropped).
 * @returns The time as `HH:mm`.
 */
export function validateTimeString(value: unknown, field: string): string {
    const str = validateString(value, field);
    const match = str.match(/^(\d{2}):(\d{2})(?::\d{2}(?:\.\d+)?)?$/);
    if (!match || Number(match[1]) > 23 || Number(match[2]) > 59) {
        throw createValidationError(`${field} must be a time in HH:mm format`);
    }
    return `${match[1]}:${match[2]}`;
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Classifies an error object into a predefined category.
 * Used to determine retry logic and user-facing error messages.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (!error) return ERROR_TYPES.UNKNOWN;

    if (error instanceof AppError) {
        return error.type;
    }

    if (!(error instanceof Error)) return ERROR_TYPES.UNKNOWN;

    // Network errors (fetch failures, timeouts)
    if (error.name === 'TypeError' && error.message.includes('fetch')) {
        return ERROR_TYPES.NETWORK;
    }
    if (error.name === 'AbortError') {
        return ERROR_TYPES.NETWORK;
    }

    const status = 'status' in error ? error.status : undefined;
    if (typeof status === 'number') {
        if (status === 401 || status === 403) return ERROR_TYPES.AUTH;
        if (status >= 400 && status < 500) return ERROR_TYPES.VALIDATION;
        if (status >= 500) return ERROR_TYPES.API;
    }

    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured, user-friendly error object from a raw error.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 * @returns Structured error object.
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const errorType = type || classifyError(error);
    const errorMessage = ERROR_MESSAGES[errorType];
    const err = typeof error === 'string' ? new Error(error) : error;

    return {
        type: errorType,
        title: errorMessage.title,
        message: errorMessage.message,
        action: errorMessage.action,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

// ==================== GENERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 * @returns The rounded number.
 */
export function round(num: number, decimals = 4): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Formats decimal hours into a fixed-decimal string (e.g., "8.50").
 *
 * @param hours - Decimal hours.
 * @param decimals - Decimal places.
 * @returns Formatted decimal string.
 */
export function formatHoursDecimal(hours: number | null | undefined, decimals = 2): string {
    if (hours == null || isNaN(hours)) return (0).toFixed(decimals);
    return round(hours, decimals).toFixed(decimals);
}

// ==================== CALENDAR DATES ====================

/** `Date.getUTCDay()` (Sunday = 0) to Monday-first weekday. */
const WEEKDAY_FROM_UTC_DAY: readonly Weekday[] = [6, 0, 1, 2, 3, 4, 5];

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Date keys are interpreted at UTC midnight so the host time zone never
 * moves a calendar date.
 */
export const IsoUtils = {
    /**
     * Converts a Date object to a date key using its UTC fields.
     */
    toISODate(date: Date): DateKey {
        const y = String(date.getUTCFullYear()).padStart(4, '0');
        const m = String(date.getUTCMonth() + 1).padStart(2, '0');
        const d = String(date.getUTCDate()).padStart(2, '0');
        return `${y}-${m}-${d}`;
    },

    /**
     * Parses a date key into a Date at UTC midnight.
     *
     * @returns Date object or null if the key is malformed or names no real date.
     */
    parseDate(dateStr: string | null | undefined): Date | null {
        if (!dateStr) return null;
        const match = dateStr.match(DATE_KEY_PATTERN);
        if (!match) return null;

        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);
        if (year < MIN_YEAR || month < 1 || month > 12 || day < 1 || day > this.daysInMonth(year, month)) {
            return null;
        }

        const date = new Date(0);
        date.setUTCFullYear(year, month - 1, day);
        return date;
    },

    /**
     * Splits a date key into numeric parts. The key is assumed valid.
     */
    splitDateKey(dateKey: DateKey): { year: number; month: number; day: number } {
        const [year, month, day] = dateKey.split('-').map(Number);
        return { year, month, day };
    },

    /**
     * Number of days in a month, leap years included.
     *
     * @throws RangeError for a year outside 1-9999 or a month outside 1-12.
     */
    daysInMonth(year: number, month: number): number {
        if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
            throw new RangeError(`year must be in ${MIN_YEAR}..${MAX_YEAR}, got ${year}`);
        }
        if (!Number.isInteger(month) || month < 1 || month > 12) {
            throw new RangeError(`month must be in 1..12, got ${month}`);
        }
        const date = new Date(0);
        // Day 0 of the following month is the last day of this one
        date.setUTCFullYear(year, month, 0);
        return date.getUTCDate();
    },

    /**
     * Builds a date key from its parts.
     *
     * @throws RangeError when the parts name no real date.
     */
    fromParts(year: number, month: number, day: number): DateKey {
        const lastDay = this.daysInMonth(year, month);
        if (!Number.isInteger(day) || day < 1 || day > lastDay) {
            throw new RangeError(`day is out of range for month: ${year}-${month}-${day}`);
        }
        const date = new Date(0);
        date.setUTCFullYear(year, month - 1, day);
        return this.toISODate(date);
    },

    /**
     * First and last date of a month.
     */
    monthRange(year: number, month: number): DateRange {
        const lastDay = this.daysInMonth(year, month);
        return {
            start: this.fromParts(year, month, 1),
            end: this.fromParts(year, month, lastDay),
        };
    },

    /**
     * Shifts a date key by a number of days (negative moves backwards).
     */
    addDays(dateKey: DateKey, days: number): DateKey {
        const date = this.parseDate(dateKey);
        if (!date) {
            throw new RangeError(`invalid date key: ${dateKey}`);
        }
        date.setUTCDate(date.getUTCDate() + days);
        return this.toISODate(date);
    },

    /**
     * Weekday of a date key, Monday = 0 ... Sunday = 6.
     */
    getWeekday(dateKey: DateKey): Weekday {
        const date = this.parseDate(dateKey);
        if (!date) {
            throw new RangeError(`invalid date key: ${dateKey}`);
        }
        return WEEKDAY_FROM_UTC_DAY[date.getUTCDay()];
    },

    /**
     * Checks if a date falls on a weekend (Sat/Sun).
     */
    isWeekend(dateKey: DateKey): boolean {
        const weekday = this.getWeekday(dateKey);
        return weekday === SATURDAY || weekday === SUNDAY;
    },

    /**
     * Checks whether a date key lies inside an inclusive range.
     * Zero-padded keys order lexically the same as chronologically.
     */
    isWithin(dateKey: DateKey, range: DateRange): boolean {
        return dateKey >= range.start && dateKey <= range.end;
    },

    /**
     * Generates an array of date keys between start and end (inclusive).
     */
    generateDateRange(startIso: DateKey, endIso: DateKey): DateKey[] {
        const dates: DateKey[] = [];
        const current = this.parseDate(startIso);
        const end = this.parseDate(endIso);
        if (!current || !end) return [];

        while (current <= end) {
            dates.push(this.toISODate(current));
            current.setUTCDate(current.getUTCDate() + 1);
        }
        return dates;
    },

    /**
     * Today's date key in the host's local calendar.
     */
    today(now: Date = new Date()): DateKey {
        return this.fromParts(now.getFullYear(), now.getMonth() + 1, now.getDate());
    },
};
