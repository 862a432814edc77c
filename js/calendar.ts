/**
 * @fileoverview Monthly Attendance Calendar
 *
 * Builds one resolved day per date of a month for one employee by overlaying
 * four independent sources: recorded work sessions, public holidays,
 * the employee's non-working-day rules, and weekday/weekend inference.
 *
 * ## Data Flow
 * 1. Compute the month window (throws RangeError for an invalid month)
 * 2. Query sessions, holidays, and non-working rules, one after the other
 * 3. Turn each source into a `(date) => record | null` lookup (see rules.ts)
 * 4. Construct every CalendarDay with all overlays resolved
 *
 * Days never change after construction. Padding days for the week grid are
 * separate instances tagged with their DayOrigin and carry no overlay.
 *
 * ## Status Priority
 * `isWorkday` excludes weekends, holidays, and non-working days alike; the
 * single display status picks weekend > public holiday > employee
 * non-working > has entry > missing entry.
 */

import { CONSTANTS, MONTH_NAMES, POLLUTION_LABELS, WEEKDAY_NAMES } from './constants.js';
import { createLogger } from './logger.js';
import { createEntryLookup, createHolidayLookup, createNonWorkingLookup } from './rules.js';
import { totalWorkHours, totalWorkMinutes } from './time-entry.js';
import { IsoUtils, formatHoursDecimal } from './utils.js';
import {
    DayOrigin,
    type CalendarDataSource,
    type CalendarOptions,
    type CalendarRecords,
    type CalendarStats,
    type DateKey,
    type DateRange,
    type DayStatus,
    type NonWorkingDayRule,
    type PublicHoliday,
    type TieBreakPolicy,
    type TimeEntry,
    type User,
    type Weekday,
    type YearMonth,
} from './types.js';

const log = createLogger('Calendar');

// ==================== CALENDAR DAY ====================

/**
 * Overlays attached to a day at construction.
 */
export interface CalendarDayInit {
    origin?: DayOrigin;
    timeEntry?: TimeEntry | null;
    holiday?: PublicHoliday | null;
    nonWorkingDay?: NonWorkingDayRule | null;
}

/**
 * One calendar date's resolved status for one user.
 */
export class CalendarDay {
    readonly date: DateKey;
    readonly owner: User;
    readonly origin: DayOrigin;
    readonly timeEntry: TimeEntry | null;
    readonly weekday: Weekday;
    readonly isWeekend: boolean;
    readonly isPublicHoliday: boolean;
    readonly holidayName: string;
    readonly isEmployeeNonWorkingDay: boolean;
    readonly nonWorkingReason: string;

    constructor(date: DateKey, owner: User, init: CalendarDayInit = {}) {
        this.date = date;
        this.owner = owner;
        this.origin = init.origin ?? DayOrigin.InMonth;
        this.timeEntry = init.timeEntry ?? null;
        this.weekday = IsoUtils.getWeekday(date);
        this.isWeekend = IsoUtils.isWeekend(date);
        this.isPublicHoliday = Boolean(init.holiday);
        this.holidayName = init.holiday?.name ?? '';
        this.isEmployeeNonWorkingDay = Boolean(init.nonWorkingDay);
        this.nonWorkingReason = init.nonWorkingDay?.reason ?? '';
        Object.freeze(this);
    }

    get dayOfMonth(): number {
        return IsoUtils.splitDateKey(this.date).day;
    }

    get isWorkday(): boolean {
        return !(this.isWeekend || this.isPublicHoliday || this.isEmployeeNonWorkingDay);
    }

    get hasTimeEntry(): boolean {
        return this.timeEntry !== null;
    }

    get isMissingEntry(): boolean {
        return this.isWorkday && !this.hasTimeEntry;
    }

    /** True for week-grid padding from a neighbouring month */
    get isOtherMonth(): boolean {
        return this.origin !== DayOrigin.InMonth;
    }

    /** Net work minutes of the attached session, 0 without one */
    get workMinutes(): number {
        return this.timeEntry ? totalWorkMinutes(this.timeEntry) : 0;
    }

    get status(): DayStatus {
        if (this.isWeekend) return 'weekend';
        if (this.isPublicHoliday) return 'public-holiday';
        if (this.isEmployeeNonWorkingDay) return 'employee-non-working';
        if (this.hasTimeEntry) return 'has-entry';
        return 'missing-entry';
    }

    get cssClasses(): string[] {
        const classes = ['calendar-day', this.status];
        if (this.isOtherMonth) {
            classes.push('other-month');
        }
        return classes;
    }

    /**
     * Short cell label: holiday name, non-working reason, or worked hours.
     */
    get displayInfo(): string {
        if (this.isPublicHoliday) {
            return this.holidayName;
        }
        if (this.isEmployeeNonWorkingDay && this.nonWorkingReason) {
            return this.nonWorkingReason;
        }
        if (this.timeEntry) {
            return `${formatHoursDecimal(totalWorkHours(this.timeEntry), 1)}h`;
        }
        return '';
    }

    get tooltipText(): string {
        if (this.isPublicHoliday) {
            return `Feiertag: ${this.holidayName}`;
        }
        if (this.isEmployeeNonWorkingDay) {
            return `Nicht-Arbeitstag: ${this.nonWorkingReason || 'Nicht-Arbeitstag'}`;
        }
        if (this.timeEntry) {
            const entry = this.timeEntry;
            return (
                `Arbeitszeit: ${entry.startTime} - ${entry.endTime} ` +
                `(${formatHoursDecimal(totalWorkHours(entry), 1)}h)\n` +
                `Pause: ${entry.lunchBreakMinutes} Min\n` +
                `Verschmutzung: ${POLLUTION_LABELS[entry.pollutionLevel]}`
            );
        }
        if (this.isWeekend) {
            return `Wochenende: ${WEEKDAY_NAMES[this.weekday]}`;
        }
        return 'Fehlender Zeiteintrag';
    }
}

// ==================== MONTHLY CALENDAR ====================

/**
 * A month's resolved view for one user. Read-only once constructed.
 */
export class MonthlyCalendar {
    readonly year: number;
    readonly month: number;
    readonly owner: User;
    readonly range: DateRange;
    readonly tieBreak: TieBreakPolicy;
    readonly days: readonly CalendarDay[];

    /**
     * Resolves already-loaded records into days. Use `build()` to load them
     * from a data source.
     *
     * @throws RangeError for a month outside 1-12 or a non-integer year.
     */
    constructor(
        year: number,
        month: number,
        owner: User,
        records: CalendarRecords,
        options: CalendarOptions = {}
    ) {
        this.year = year;
        this.month = month;
        this.owner = owner;
        this.range = IsoUtils.monthRange(year, month);
        this.tieBreak = options.tieBreak ?? CONSTANTS.DEFAULT_TIE_BREAK;

        const entryFor = createEntryLookup(records.timeEntries, owner.id, this.range);
        const holidayFor = createHolidayLookup(records.holidays, year, month, this.range);
        const nonWorkingFor = createNonWorkingLookup(
            records.nonWorkingDays,
            owner.id,
            this.range,
            this.tieBreak
        );

        this.days = Object.freeze(
            IsoUtils.generateDateRange(this.range.start, this.range.end).map(
                (date) =>
                    new CalendarDay(date, owner, {
                        timeEntry: entryFor(date),
                        holiday: holidayFor(date),
                        nonWorkingDay: nonWorkingFor(date),
                    })
            )
        );
    }

    /**
     * Loads the month's records for the owner and builds the calendar.
     * Queries run sequentially; any failure rejects the whole build.
     *
     * @throws RangeError before any query when the month is invalid.
     */
    static async build(
        year: number,
        month: number,
        owner: User,
        source: CalendarDataSource,
        options: CalendarOptions = {}
    ): Promise<MonthlyCalendar> {
        const range = IsoUtils.monthRange(year, month);
        log.debug(`Loading ${range.start}..${range.end} for user ${owner.id}`);

        const timeEntries = await source.fetchTimeEntries(owner.id, range);
        const holidays = await source.fetchHolidays(year);
        const nonWorkingDays = await source.fetchNonWorkingDays(owner.id, range);

        log.debug(
            `Loaded ${timeEntries.length} entries, ${holidays.length} holidays, ` +
                `${nonWorkingDays.length} non-working rules`
        );

        return new MonthlyCalendar(year, month, owner, { timeEntries, holidays, nonWorkingDays }, options);
    }

    get monthName(): string {
        return MONTH_NAMES[this.month - 1];
    }

    get title(): string {
        return `${this.monthName} ${this.year}`;
    }

    get prevMonth(): YearMonth {
        return this.month === 1 ? [this.year - 1, 12] : [this.year, this.month - 1];
    }

    get nextMonth(): YearMonth {
        return this.month === 12 ? [this.year + 1, 1] : [this.year, this.month + 1];
    }

    get stats(): CalendarStats {
        const count = (predicate: (day: CalendarDay) => boolean): number =>
            this.days.filter(predicate).length;

        return {
            totalDays: this.days.length,
            workdays: count((d) => d.isWorkday),
            entriesCount: count((d) => d.hasTimeEntry),
            missingEntries: count((d) => d.isMissingEntry),
            weekends: count((d) => d.isWeekend),
            holidays: count((d) => d.isPublicHoliday),
            nonWorkingDays: count((d) => d.isEmployeeNonWorkingDay),
            workMinutes: this.days.reduce((sum, d) => sum + d.workMinutes, 0),
        };
    }

    /**
     * Looks up the day for a date of this month.
     */
    getDay(date: DateKey): CalendarDay | null {
        return this.days.find((day) => day.date === date) ?? null;
    }

    /**
     * Days grouped into Monday-first weeks of seven. The first week is padded
     * with the previous month's last days and the last week with the next
     * month's first days; padding carries no overlay.
     */
    getWeeks(): CalendarDay[][] {
        const first = this.days[0];
        const last = this.days[this.days.length - 1];

        const leading: CalendarDay[] = [];
        for (let offset = first.weekday; offset > 0; offset--) {
            leading.push(
                new CalendarDay(IsoUtils.addDays(first.date, -offset), this.owner, {
                    origin: DayOrigin.PaddingBefore,
                })
            );
        }

        const trailing: CalendarDay[] = [];
        for (let offset = 1; offset <= 6 - last.weekday; offset++) {
            trailing.push(
                new CalendarDay(IsoUtils.addDays(last.date, offset), this.owner, {
                    origin: DayOrigin.PaddingAfter,
                })
            );
        }

        const grid = [...leading, ...this.days, ...trailing];
        const weeks: CalendarDay[][] = [];
        for (let i = 0; i < grid.length; i += 7) {
            weeks.push(grid.slice(i, i + 7));
        }
        return weeks;
    }
}
