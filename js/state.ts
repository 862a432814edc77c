/**
 * @fileoverview In-Memory Calendar Store
 *
 * Holds work sessions, public holidays, and non-working-day rules in memory
 * and answers the three calendar queries with the same filters the storage
 * layer of the time-tracking back end applies:
 *
 * - **Time entries**: one user's sessions dated inside the range
 * - **Holidays**: every holiday dated in the requested year, plus all
 *   recurring holidays regardless of their stored year
 * - **Non-working days**: one employee's specific rules dated inside the
 *   range, plus weekly/monthly rules whose validity window overlaps it
 *
 * ## Invariants
 * - At most one time entry per (userId, date)
 * - At most one holiday per (name, date)
 * - Sessions and rules are validated on insert (see time-entry.ts)
 *
 * Query results are returned in insertion order, which is the "source order"
 * seen by the calendar's tie-break policy.
 */

import { ERROR_TYPES } from './constants.js';
import { createLogger } from './logger.js';
import { ruleOverlapsRange } from './rules.js';
import { validateNonWorkingDayRule, validateTimeEntryRecord } from './time-entry.js';
import { AppError, IsoUtils } from './utils.js';
import type {
    CalendarDataSource,
    DateKey,
    DateRange,
    NonWorkingDayRule,
    PublicHoliday,
    TimeEntry,
} from './types.js';

const log = createLogger('Store');

/**
 * Initial contents of a store.
 */
export interface StoreSeed {
    timeEntries?: TimeEntry[];
    holidays?: PublicHoliday[];
    nonWorkingDays?: NonWorkingDayRule[];
}

/**
 * @class CalendarStore
 */
class CalendarStore implements CalendarDataSource {
    /** Sessions keyed by `${userId}|${date}` */
    private timeEntries: Map<string, TimeEntry> = new Map();
    /** Holidays keyed by `${name}|${date}` */
    private holidays: Map<string, PublicHoliday> = new Map();
    private nonWorkingDays: NonWorkingDayRule[] = [];

    constructor(seed: StoreSeed = {}) {
        seed.timeEntries?.forEach((entry) => this.addTimeEntry(entry));
        seed.holidays?.forEach((holiday) => this.addHoliday(holiday));
        seed.nonWorkingDays?.forEach((rule) => this.addNonWorkingDay(rule));
    }

    // ==================== WRITES ====================

    /**
     * @param today - Latest acceptable entry date; the local date by default.
     * @throws AppError with VALIDATION type for an invalid session or if the
     *   user already has an entry that day.
     */
    addTimeEntry(entry: TimeEntry, today: DateKey = IsoUtils.today()): void {
        validateTimeEntryRecord(entry, today);
        const key = `${entry.userId}|${entry.date}`;
        if (this.timeEntries.has(key)) {
            throw new AppError(
                `User ${entry.userId} already has a time entry on ${entry.date}`,
                ERROR_TYPES.VALIDATION
            );
        }
        this.timeEntries.set(key, entry);
    }

    /**
     * @throws AppError with VALIDATION type for a duplicate (name, date).
     */
    addHoliday(holiday: PublicHoliday): void {
        const key = `${holiday.name}|${holiday.date}`;
        if (this.holidays.has(key)) {
            throw new AppError(
                `Holiday "${holiday.name}" on ${holiday.date} already exists`,
                ERROR_TYPES.VALIDATION
            );
        }
        this.holidays.set(key, holiday);
    }

    addNonWorkingDay(rule: NonWorkingDayRule): void {
        validateNonWorkingDayRule(rule);
        this.nonWorkingDays.push(rule);
    }

    /**
     * Removes a record of any kind by ID.
     * @returns Whether a record was removed.
     */
    remove(id: string): boolean {
        for (const [key, entry] of this.timeEntries) {
            if (entry.id === id) return this.timeEntries.delete(key);
        }
        for (const [key, holiday] of this.holidays) {
            if (holiday.id === id) return this.holidays.delete(key);
        }
        const before = this.nonWorkingDays.length;
        this.nonWorkingDays = this.nonWorkingDays.filter((rule) => rule.id !== id);
        return this.nonWorkingDays.length < before;
    }

    clear(): void {
        this.timeEntries.clear();
        this.holidays.clear();
        this.nonWorkingDays = [];
    }

    // ==================== QUERIES ====================

    async fetchTimeEntries(userId: string, range: DateRange): Promise<TimeEntry[]> {
        const entries = [...this.timeEntries.values()].filter(
            (entry) => entry.userId === userId && IsoUtils.isWithin(entry.date, range)
        );
        log.debug(`${entries.length} time entries for ${userId} in ${range.start}..${range.end}`);
        return entries;
    }

    async fetchHolidays(year: number): Promise<PublicHoliday[]> {
        return [...this.holidays.values()].filter(
            (holiday) => holiday.isRecurring || IsoUtils.splitDateKey(holiday.date).year === year
        );
    }

    async fetchNonWorkingDays(userId: string, range: DateRange): Promise<NonWorkingDayRule[]> {
        return this.nonWorkingDays.filter(
            (rule) => rule.employeeId === userId && ruleOverlapsRange(rule, range)
        );
    }
}

export { CalendarStore };
