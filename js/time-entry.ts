/**
 * @fileoverview Work Session Arithmetic & Record Rules
 * Net work time of a session and the integrity rules applied to time entries
 * and non-working-day rules before they are stored.
 *
 * Sessions are attributed entirely to their start date: a shift from 22:00
 * to 06:00 counts as 8 hours on the day it began.
 */

import {
    ERROR_TYPES,
    MINUTES_PER_DAY,
    OVERNIGHT_END_HOUR,
    OVERNIGHT_START_HOUR,
} from './constants.js';
import {
    AppError,
    isWeekday,
    round,
    validateISODateString,
    validateInteger,
    validateTimeString,
} from './utils.js';
import type { DateKey, NonWorkingDayRule, TimeEntry } from './types.js';

/**
 * Minutes since midnight of an `HH:mm` time.
 */
export function parseTimeToMinutes(time: string): number {
    const [hours, minutes] = time.split(':').map(Number);
    return hours * 60 + minutes;
}

/**
 * Whether a start/end pair reads as a night shift ending the next morning.
 */
export function isOvernightShift(startTime: string, endTime: string): boolean {
    const startHour = Math.floor(parseTimeToMinutes(startTime) / 60);
    const endHour = Math.floor(parseTimeToMinutes(endTime) / 60);
    return startHour >= OVERNIGHT_START_HOUR && endHour <= OVERNIGHT_END_HOUR;
}

/**
 * Net work minutes: end - start - lunch break, never negative.
 * An end at or before the start is read as the next day.
 */
export function totalWorkMinutes(entry: Pick<TimeEntry, 'startTime' | 'endTime' | 'lunchBreakMinutes'>): number {
    const start = parseTimeToMinutes(entry.startTime);
    let end = parseTimeToMinutes(entry.endTime);

    if (end <= start) {
        end += MINUTES_PER_DAY;
    }

    return Math.max(0, end - start - entry.lunchBreakMinutes);
}

export function totalWorkHours(entry: Pick<TimeEntry, 'startTime' | 'endTime' | 'lunchBreakMinutes'>): number {
    return round(totalWorkMinutes(entry) / 60, 4);
}

/**
 * Checks a session before it is stored.
 *
 * @param today - Latest acceptable date.
 * @throws AppError with VALIDATION type naming the offending field.
 */
export function validateTimeEntryRecord(entry: TimeEntry, today: DateKey): void {
    validateISODateString(entry.date, 'date');
    validateTimeString(entry.startTime, 'startTime');
    validateTimeString(entry.endTime, 'endTime');
    validateInteger(entry.pollutionLevel, 'pollutionLevel', 1, 3);

    const start = parseTimeToMinutes(entry.startTime);
    const end = parseTimeToMinutes(entry.endTime);

    if (start >= end && !isOvernightShift(entry.startTime, entry.endTime)) {
        throw new AppError('endTime must be after startTime', ERROR_TYPES.VALIDATION);
    }

    if (entry.lunchBreakMinutes < 0) {
        throw new AppError('lunchBreakMinutes cannot be negative', ERROR_TYPES.VALIDATION);
    }

    if (entry.date > today) {
        throw new AppError('date cannot be in the future', ERROR_TYPES.VALIDATION);
    }
}

/**
 * Checks a non-working-day rule before it is stored.
 *
 * @throws AppError with VALIDATION type naming the offending field.
 */
export function validateNonWorkingDayRule(rule: NonWorkingDayRule): void {
    if (rule.pattern === 'specific') {
        validateISODateString(rule.date, 'date');
    }
    if (rule.validFrom) validateISODateString(rule.validFrom, 'validFrom');
    if (rule.validUntil) validateISODateString(rule.validUntil, 'validUntil');

    if (rule.pattern === 'monthly' && (!Number.isInteger(rule.dayOfMonth) || rule.dayOfMonth < 1 || rule.dayOfMonth > 31)) {
        throw new AppError('dayOfMonth must be between 1 and 31', ERROR_TYPES.VALIDATION);
    }

    if (rule.pattern === 'weekly' && !isWeekday(rule.weekday)) {
        throw new AppError('weekday must be between 0 (Monday) and 6 (Sunday)', ERROR_TYPES.VALIDATION);
    }

    if (rule.validFrom && rule.validUntil && rule.validFrom > rule.validUntil) {
        throw new AppError('validUntil must not be before validFrom', ERROR_TYPES.VALIDATION);
    }
}
