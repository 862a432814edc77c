/**
 * @fileoverview Record factories and a mock data source for unit tests
 */

import { jest } from '@jest/globals';
import type {
    CalendarDataSource,
    DateKey,
    NonWorkingDayRule,
    PublicHoliday,
    TimeEntry,
    User,
    Weekday,
} from '../../js/types.js';

export const employee: User = { id: 'u1', name: 'Erika Muster', role: 'employee' };
export const colleague: User = { id: 'u2', name: 'Max Beispiel', role: 'employee' };

export function timeEntry(date: DateKey, overrides: Partial<TimeEntry> = {}): TimeEntry {
    return {
        id: `te-${date}`,
        userId: employee.id,
        date,
        startTime: '07:00',
        endTime: '15:30',
        lunchBreakMinutes: 30,
        pollutionLevel: 1,
        ...overrides,
    };
}

export function holiday(name: string, date: DateKey, isRecurring = false): PublicHoliday {
    return { id: `h-${name}-${date}`, name, date, isRecurring };
}

export function specificRule(date: DateKey, reason: string | null = null, employeeId = employee.id): NonWorkingDayRule {
    return { id: `nw-s-${date}`, employeeId, pattern: 'specific', date, reason };
}

export function weeklyRule(
    weekday: Weekday,
    reason: string | null = null,
    validity: { validFrom?: DateKey; validUntil?: DateKey } = {}
): NonWorkingDayRule {
    return { id: `nw-w-${weekday}`, employeeId: employee.id, pattern: 'weekly', weekday, reason, ...validity };
}

export function monthlyRule(dayOfMonth: number, reason: string | null = null): NonWorkingDayRule {
    return { id: `nw-m-${dayOfMonth}`, employeeId: employee.id, pattern: 'monthly', dayOfMonth, reason };
}

/**
 * Data source whose queries are jest mocks resolving to empty lists.
 */
export function createMockSource() {
    return {
        fetchTimeEntries: jest.fn<CalendarDataSource['fetchTimeEntries']>().mockResolvedValue([]),
        fetchHolidays: jest.fn<CalendarDataSource['fetchHolidays']>().mockResolvedValue([]),
        fetchNonWorkingDays: jest.fn<CalendarDataSource['fetchNonWorkingDays']>().mockResolvedValue([]),
    } satisfies CalendarDataSource;
}
