/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the calendar builder, the
 * data sources, and the service layer.
 */

// ==================== DATE TYPES ====================

/**
 * Timezone-naive calendar date in `YYYY-MM-DD` form.
 */
export type DateKey = string;

/**
 * Weekday index, Monday = 0 ... Sunday = 6.
 */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Inclusive date range.
 */
export interface DateRange {
    start: DateKey;
    end: DateKey;
}

/**
 * A `[year, month]` pair, month 1-12.
 */
export type YearMonth = readonly [year: number, month: number];

// ==================== USER TYPES ====================

export type UserRole = 'employee' | 'backoffice';

/**
 * An employee or backoffice account. Only its identity matters to the calendar.
 */
export interface User {
    /** User ID */
    id: string;
    /** Display name */
    name: string;
    role?: UserRole;
}

// ==================== RECORD TYPES ====================

/**
 * Qualitative workplace pollution: 1 low, 2 medium, 3 high.
 */
export type PollutionLevel = 1 | 2 | 3;

/**
 * A recorded work session. Unique per (userId, date).
 */
export interface TimeEntry {
    id: string;
    userId: string;
    date: DateKey;
    /** `HH:mm` */
    startTime: string;
    /** `HH:mm`; at or before `startTime` for overnight shifts */
    endTime: string;
    lunchBreakMinutes: number;
    pollutionLevel: PollutionLevel;
    notes?: string | null;
}

/**
 * A public holiday. Recurring holidays apply every year on the same month/day.
 */
export interface PublicHoliday {
    id: string;
    name: string;
    date: DateKey;
    isRecurring: boolean;
    description?: string | null;
}

export type NonWorkingPattern = 'specific' | 'weekly' | 'monthly';

interface NonWorkingDayBase {
    id: string;
    employeeId: string;
    /** Inclusive lower bound; open when absent */
    validFrom?: DateKey | null;
    /** Inclusive upper bound; open when absent */
    validUntil?: DateKey | null;
    reason?: string | null;
    /** ISO timestamp of creation */
    createdAt?: string;
}

export interface SpecificNonWorkingDay extends NonWorkingDayBase {
    pattern: 'specific';
    date: DateKey;
}

export interface WeeklyNonWorkingDay extends NonWorkingDayBase {
    pattern: 'weekly';
    weekday: Weekday;
}

export interface MonthlyNonWorkingDay extends NonWorkingDayBase {
    pattern: 'monthly';
    /** 1-31 */
    dayOfMonth: number;
}

/**
 * A per-employee rule marking days the employee is not expected to work.
 */
export type NonWorkingDayRule = SpecificNonWorkingDay | WeeklyNonWorkingDay | MonthlyNonWorkingDay;

// ==================== CALENDAR TYPES ====================

/**
 * Where a calendar day sits relative to the month it was built for.
 */
export enum DayOrigin {
    InMonth = 'in-month',
    PaddingBefore = 'padding-before',
    PaddingAfter = 'padding-after',
}

/**
 * Primary display status of a day.
 */
export type DayStatus =
    | 'weekend'
    | 'public-holiday'
    | 'employee-non-working'
    | 'has-entry'
    | 'missing-entry';

/**
 * How to pick between several non-working rules matching the same date.
 * - `specificity`: specific date > weekly > monthly, ties kept in source order
 * - `source-order`: first rule as returned by the data source
 */
export type TieBreakPolicy = 'specificity' | 'source-order';

export interface CalendarOptions {
    tieBreak?: TieBreakPolicy;
}

/**
 * Aggregate counters over the days of one month.
 */
export interface CalendarStats {
    totalDays: number;
    workdays: number;
    entriesCount: number;
    missingEntries: number;
    weekends: number;
    holidays: number;
    nonWorkingDays: number;
    /** Net work minutes of all entries in the month */
    workMinutes: number;
}

/**
 * Records loaded for one (owner, month) request.
 */
export interface CalendarRecords {
    timeEntries: TimeEntry[];
    holidays: PublicHoliday[];
    nonWorkingDays: NonWorkingDayRule[];
}

// ==================== DATA SOURCE TYPES ====================

/**
 * Read queries the calendar needs from the storage layer.
 */
export interface CalendarDataSource {
    /** Work sessions of one user inside the range */
    fetchTimeEntries(userId: string, range: DateRange): Promise<TimeEntry[]>;
    /** Holidays dated in `year` plus every recurring holiday */
    fetchHolidays(year: number): Promise<PublicHoliday[]>;
    /** Specific rules inside the range plus weekly/monthly rules whose validity overlaps it */
    fetchNonWorkingDays(userId: string, range: DateRange): Promise<NonWorkingDayRule[]>;
}

// ==================== ERROR TYPES ====================

/**
 * Structured error for display
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    /** User-friendly error title */
    title: string;
    /** User-friendly error message */
    message: string;
    /** Suggested action ('retry', 'reload', 'none') */
    action: 'retry' | 'reload' | 'none';
    /** Original error object */
    originalError?: Error | string;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
