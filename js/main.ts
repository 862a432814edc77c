/**
 * @fileoverview Main Entry Point
 * Wires configuration, logging, error reporting, and a data source into the
 * calendar service, and re-exports the public API. The host application
 * supplies its own `CalendarDataSource`; an empty in-memory store stands in
 * when it passes none.
 *
 * ## Data Flow
 *
 * ```
 * loadConfig() ──► setLogLevel() ──► initErrorReporting()
 *                                        │
 *                                        ▼
 * getMonthCalendar(year, month, owner)
 *   └─► MonthlyCalendar.build()
 *         ├─ source.fetchTimeEntries(owner, month window)
 *         ├─ source.fetchHolidays(year)
 *         └─ source.fetchNonWorkingDays(owner, month window)
 *                                        │
 *                                        ▼
 *                          days, weeks, stats, navigation
 * ```
 *
 * Failures are reported (Sentry when configured, always logged) and rethrown
 * unchanged to the caller.
 */

import { MonthlyCalendar } from './calendar.js';
import { loadConfig, type AppConfig } from './config.js';
import { addBreadcrumb, initErrorReporting, reportError, setUserContext } from './error-reporting.js';
import { createLogger, setLogLevel } from './logger.js';
import { CalendarStore } from './state.js';
import { IsoUtils } from './utils.js';
import type { CalendarDataSource, DateKey, User } from './types.js';

const log = createLogger('Main');

/**
 * Month calendars for users of one back end.
 */
export interface CalendarService {
    readonly config: AppConfig;
    readonly source: CalendarDataSource;
    /**
     * Builds the calendar of a month for one user.
     * @throws RangeError for an invalid month, AppError when loading fails.
     */
    getMonthCalendar(year: number, month: number, owner: User): Promise<MonthlyCalendar>;
    /**
     * Builds the calendar of the month containing `today` (the local date by default).
     */
    getCurrentMonthCalendar(owner: User, today?: DateKey): Promise<MonthlyCalendar>;
}

/**
 * Creates the calendar service.
 *
 * @param config - Defaults to the configuration read from `process.env`.
 * @param source - Defaults to an empty `CalendarStore`.
 */
export function createCalendarService(
    config: AppConfig = loadConfig(),
    source: CalendarDataSource = new CalendarStore()
): CalendarService {
    setLogLevel(config.logLevel);
    initErrorReporting(config.sentry);

    async function getMonthCalendar(year: number, month: number, owner: User): Promise<MonthlyCalendar> {
        setUserContext(owner.id);
        addBreadcrumb('calendar', `Building ${year}-${month}`, { userId: owner.id });
        try {
            const calendar = await MonthlyCalendar.build(year, month, owner, source, {
                tieBreak: config.tieBreak,
            });
            log.info(`Built ${calendar.title} for user ${owner.id}`);
            return calendar;
        } catch (error) {
            reportError(error instanceof Error ? error : String(error), {
                module: 'main',
                operation: 'getMonthCalendar',
                metadata: { year, month, userId: owner.id },
            });
            throw error;
        }
    }

    return {
        config,
        source,
        getMonthCalendar,
        getCurrentMonthCalendar(owner: User, today: DateKey = IsoUtils.today()): Promise<MonthlyCalendar> {
            const { year, month } = IsoUtils.splitDateKey(today);
            return getMonthCalendar(year, month, owner);
        },
    };
}

export { CalendarDay, MonthlyCalendar, type CalendarDayInit } from './calendar.js';
export { CalendarStore, type StoreSeed } from './state.js';
export {
    appliesToDate,
    holidayAppliesTo,
    orderRules,
    resolveHolidays,
    type OverlayLookup,
} from './rules.js';
export {
    isOvernightShift,
    totalWorkHours,
    totalWorkMinutes,
    validateNonWorkingDayRule,
    validateTimeEntryRecord,
} from './time-entry.js';
export { loadConfig, type AppConfig } from './config.js';
export { flushErrorReports } from './error-reporting.js';
export { LogLevel, configureLogger, createLogger } from './logger.js';
export { AppError, IsoUtils, classifyError, createUserFriendlyError } from './utils.js';
export * from './types.js';
