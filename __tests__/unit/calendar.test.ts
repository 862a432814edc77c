/**
 * @fileoverview Unit tests for calendar.ts
 */

import { beforeAll, describe, expect, it } from '@jest/globals';
import { CalendarDay, MonthlyCalendar } from '../../js/calendar.js';
import { LogLevel, setLogLevel } from '../../js/logger.js';
import { DayOrigin, type CalendarRecords } from '../../js/types.js';
import {
    createMockSource,
    employee,
    holiday,
    monthlyRule,
    specificRule,
    timeEntry,
    weeklyRule,
} from '../helpers/fixtures.js';

const EMPTY: CalendarRecords = { timeEntries: [], holidays: [], nonWorkingDays: [] };

function records(partial: Partial<CalendarRecords>): CalendarRecords {
    return { ...EMPTY, ...partial };
}

beforeAll(() => {
    setLogLevel(LogLevel.NONE);
});

describe('CalendarDay', () => {
    it('derives weekday and day of month from its date', () => {
        const day = new CalendarDay('2024-01-15', employee);

        expect(day.weekday).toBe(0);
        expect(day.dayOfMonth).toBe(15);
        expect(day.origin).toBe(DayOrigin.InMonth);
        expect(day.isOtherMonth).toBe(false);
        expect(day.isWorkday).toBe(true);
        expect(day.isMissingEntry).toBe(true);
        expect(day.status).toBe('missing-entry');
    });

    it('is frozen after construction', () => {
        const day = new CalendarDay('2024-01-15', employee);
        expect(Object.isFrozen(day)).toBe(true);
    });

    it('describes a recorded session', () => {
        const day = new CalendarDay('2024-01-15', employee, { timeEntry: timeEntry('2024-01-15') });

        expect(day.hasTimeEntry).toBe(true);
        expect(day.isMissingEntry).toBe(false);
        expect(day.workMinutes).toBe(480);
        expect(day.status).toBe('has-entry');
        expect(day.displayInfo).toBe('8.0h');
        expect(day.tooltipText).toBe(
            'Arbeitszeit: 07:00 - 15:30 (8.0h)\nPause: 30 Min\nVerschmutzung: Niedrig'
        );
    });

    it('labels weekend days by name', () => {
        expect(new CalendarDay('2024-01-06', employee).tooltipText).toBe('Wochenende: Samstag');
        expect(new CalendarDay('2024-01-07', employee).tooltipText).toBe('Wochenende: Sonntag');
    });

    it('falls back to a generic label for a non-working day without reason', () => {
        const day = new CalendarDay('2024-01-10', employee, { nonWorkingDay: specificRule('2024-01-10') });

        expect(day.nonWorkingReason).toBe('');
        expect(day.displayInfo).toBe('');
        expect(day.tooltipText).toBe('Nicht-Arbeitstag: Nicht-Arbeitstag');
    });

    it('ranks weekend over holiday over non-working over entry', () => {
        const onSaturday = new CalendarDay('2024-01-06', employee, {
            holiday: holiday('Heilige Drei Könige', '2024-01-06'),
            timeEntry: timeEntry('2024-01-06'),
        });
        expect(onSaturday.status).toBe('weekend');
        expect(onSaturday.isPublicHoliday).toBe(true);
        expect(onSaturday.tooltipText).toBe('Feiertag: Heilige Drei Könige');

        const holidayWithRule = new CalendarDay('2024-01-10', employee, {
            holiday: holiday('Betriebsfeier', '2024-01-10'),
            nonWorkingDay: specificRule('2024-01-10', 'Arzttermin'),
        });
        expect(holidayWithRule.status).toBe('public-holiday');

        const ruleWithEntry = new CalendarDay('2024-01-10', employee, {
            nonWorkingDay: specificRule('2024-01-10', 'Arzttermin'),
            timeEntry: timeEntry('2024-01-10'),
        });
        expect(ruleWithEntry.status).toBe('employee-non-working');
        expect(ruleWithEntry.isMissingEntry).toBe(false);
    });

    it('marks padding days as other-month', () => {
        const day = new CalendarDay('2024-02-03', employee, { origin: DayOrigin.PaddingAfter });

        expect(day.isOtherMonth).toBe(true);
        expect(day.cssClasses).toEqual(['calendar-day', 'weekend', 'other-month']);
    });
});

describe('MonthlyCalendar', () => {
    describe('construction', () => {
        it('creates one day per date of the month', () => {
            const calendar = new MonthlyCalendar(2024, 1, employee, EMPTY);

            expect(calendar.days).toHaveLength(31);
            expect(calendar.days[0].date).toBe('2024-01-01');
            expect(calendar.days[30].date).toBe('2024-01-31');
            expect(calendar.range).toEqual({ start: '2024-01-01', end: '2024-01-31' });
            expect(Object.isFrozen(calendar.days)).toBe(true);
        });

        it('handles leap years', () => {
            expect(new MonthlyCalendar(2024, 2, employee, EMPTY).days).toHaveLength(29);
            expect(new MonthlyCalendar(2023, 2, employee, EMPTY).days).toHaveLength(28);
        });

        it('rejects an invalid month', () => {
            expect(() => new MonthlyCalendar(2024, 13, employee, EMPTY)).toThrow(RangeError);
            expect(() => new MonthlyCalendar(2024, 0, employee, EMPTY)).toThrow(RangeError);
            expect(() => new MonthlyCalendar(2024.5, 1, employee, EMPTY)).toThrow(RangeError);
        });

        it('rejects years outside 1-9999', () => {
            expect(() => new MonthlyCalendar(-5, 1, employee, EMPTY)).toThrow('year must be in 1..9999, got -5');
            expect(() => new MonthlyCalendar(0, 6, employee, EMPTY)).toThrow(RangeError);
            expect(() => new MonthlyCalendar(10000, 1, employee, EMPTY)).toThrow(RangeError);
            expect(() => new MonthlyCalendar(12345, 1, employee, EMPTY)).toThrow(RangeError);
        });

        it('builds the first and last supported months', () => {
            const first = new MonthlyCalendar(1, 1, employee, EMPTY);
            const last = new MonthlyCalendar(9999, 12, employee, EMPTY);

            expect(first.range).toEqual({ start: '0001-01-01', end: '0001-01-31' });
            expect(first.days).toHaveLength(31);
            expect(first.getWeeks()[0][0].date).toBe('0001-01-01');
            expect(last.days).toHaveLength(31);
            expect(last.days[30].date).toBe('9999-12-31');
            expect(() => last.getWeeks()).toThrow(RangeError);
        });

        it('uses the specificity tie-break by default', () => {
            expect(new MonthlyCalendar(2024, 1, employee, EMPTY).tieBreak).toBe('specificity');
        });
    });

    describe('titles and navigation', () => {
        it('names the month', () => {
            const calendar = new MonthlyCalendar(2024, 3, employee, EMPTY);
            expect(calendar.monthName).toBe('März');
            expect(calendar.title).toBe('März 2024');
        });

        it('wraps around the year boundary', () => {
            const january = new MonthlyCalendar(2024, 1, employee, EMPTY);
            expect(january.prevMonth).toEqual([2023, 12]);
            expect(january.nextMonth).toEqual([2024, 2]);

            const december = new MonthlyCalendar(2024, 12, employee, EMPTY);
            expect(december.prevMonth).toEqual([2024, 11]);
            expect(december.nextMonth).toEqual([2025, 1]);
        });
    });

    describe('overlays', () => {
        it('computes stats for a month with one of each overlay', () => {
            const calendar = new MonthlyCalendar(
                2024,
                1,
                employee,
                records({
                    holidays: [holiday('Neujahr', '2024-01-01')],
                    nonWorkingDays: [specificRule('2024-01-10', 'Arzttermin')],
                    timeEntries: [timeEntry('2024-01-15')],
                })
            );

            expect(calendar.stats).toEqual({
                totalDays: 31,
                workdays: 21,
                entriesCount: 1,
                missingEntries: 20,
                weekends: 8,
                holidays: 1,
                nonWorkingDays: 1,
                workMinutes: 480,
            });
            expect(calendar.getDay('2024-01-01')?.displayInfo).toBe('Neujahr');
            expect(calendar.getDay('2024-01-10')?.displayInfo).toBe('Arzttermin');
            expect(calendar.getDay('2024-01-15')?.displayInfo).toBe('8.0h');
            expect(calendar.getDay('2024-01-02')?.displayInfo).toBe('');
        });

        it('ignores sessions of other users', () => {
            const calendar = new MonthlyCalendar(
                2024,
                1,
                employee,
                records({ timeEntries: [timeEntry('2024-01-15', { userId: 'u2' })] })
            );

            expect(calendar.getDay('2024-01-15')?.hasTimeEntry).toBe(false);
            expect(calendar.stats.entriesCount).toBe(0);
        });

        it('counts a weekend session without making the day a workday', () => {
            const calendar = new MonthlyCalendar(
                2024,
                1,
                employee,
                records({ timeEntries: [timeEntry('2024-01-06')] })
            );
            const saturday = calendar.getDay('2024-01-06');

            expect(saturday?.status).toBe('weekend');
            expect(saturday?.isMissingEntry).toBe(false);
            expect(calendar.stats.entriesCount).toBe(1);
            expect(calendar.stats.workdays).toBe(23);
        });

        it('applies a recurring holiday in every year', () => {
            const calendar = new MonthlyCalendar(
                2024,
                5,
                employee,
                records({ holidays: [holiday('Tag der Arbeit', '2020-05-01', true)] })
            );

            expect(calendar.getDay('2024-05-01')?.holidayName).toBe('Tag der Arbeit');
            expect(calendar.stats.holidays).toBe(1);
        });

        it('skips a recurring 29 February outside leap years', () => {
            const leapDay = holiday('Schalttag', '2020-02-29', true);

            expect(new MonthlyCalendar(2023, 2, employee, records({ holidays: [leapDay] })).stats.holidays).toBe(0);
            expect(
                new MonthlyCalendar(2024, 2, employee, records({ holidays: [leapDay] })).getDay('2024-02-29')
                    ?.isPublicHoliday
            ).toBe(true);
        });

        it('applies weekly rules inside their validity window only', () => {
            const calendar = new MonthlyCalendar(
                2024,
                1,
                employee,
                records({ nonWorkingDays: [weeklyRule(4, 'Teilzeit', { validFrom: '2024-01-15' })] })
            );

            expect(calendar.getDay('2024-01-12')?.isEmployeeNonWorkingDay).toBe(false);
            expect(calendar.getDay('2024-01-19')?.isEmployeeNonWorkingDay).toBe(true);
            expect(calendar.getDay('2024-01-26')?.isEmployeeNonWorkingDay).toBe(true);
            expect(calendar.stats.nonWorkingDays).toBe(2);
        });

        it('never matches a monthly rule on a day the month lacks', () => {
            const rule = monthlyRule(31, 'Monatsabschluss');

            expect(new MonthlyCalendar(2024, 2, employee, records({ nonWorkingDays: [rule] })).stats.nonWorkingDays).toBe(0);
            expect(
                new MonthlyCalendar(2024, 1, employee, records({ nonWorkingDays: [rule] })).getDay('2024-01-31')
                    ?.nonWorkingReason
            ).toBe('Monatsabschluss');
        });

        it('resolves competing rules by the tie-break policy', () => {
            const rules = records({
                nonWorkingDays: [weeklyRule(2, 'Teilzeit'), specificRule('2024-01-10', 'Arzttermin')],
            });

            const bySpecificity = new MonthlyCalendar(2024, 1, employee, rules);
            const bySourceOrder = new MonthlyCalendar(2024, 1, employee, rules, { tieBreak: 'source-order' });

            expect(bySpecificity.getDay('2024-01-10')?.nonWorkingReason).toBe('Arzttermin');
            expect(bySourceOrder.getDay('2024-01-10')?.nonWorkingReason).toBe('Teilzeit');
            expect(bySourceOrder.getDay('2024-01-17')?.nonWorkingReason).toBe('Teilzeit');
        });

        it('returns null for a date outside the month', () => {
            const calendar = new MonthlyCalendar(2024, 1, employee, EMPTY);
            expect(calendar.getDay('2024-02-01')).toBeNull();
        });
    });

    describe('getWeeks', () => {
        it('pads only the end when the month starts on Monday', () => {
            const weeks = new MonthlyCalendar(2024, 1, employee, EMPTY).getWeeks();

            expect(weeks).toHaveLength(5);
            expect(weeks[0][0].date).toBe('2024-01-01');
            expect(weeks[4].map((day) => day.date)).toEqual([
                '2024-01-29',
                '2024-01-30',
                '2024-01-31',
                '2024-02-01',
                '2024-02-02',
                '2024-02-03',
                '2024-02-04',
            ]);
            expect(weeks[4][3].origin).toBe(DayOrigin.PaddingAfter);
            expect(weeks[4][3].cssClasses).toEqual(['calendar-day', 'missing-entry', 'other-month']);
        });

        it('needs no padding for a month of exactly four weeks', () => {
            const weeks = new MonthlyCalendar(2021, 2, employee, EMPTY).getWeeks();

            expect(weeks).toHaveLength(4);
            expect(weeks.flat().every((day) => day.origin === DayOrigin.InMonth)).toBe(true);
        });

        it('pads both ends with neighbouring days', () => {
            const weeks = new MonthlyCalendar(2024, 2, employee, EMPTY).getWeeks();

            expect(weeks).toHaveLength(5);
            expect(weeks[0].slice(0, 3).map((day) => day.date)).toEqual(['2024-01-29', '2024-01-30', '2024-01-31']);
            expect(weeks[0][0].origin).toBe(DayOrigin.PaddingBefore);
            expect(weeks[0][3].date).toBe('2024-02-01');
            expect(weeks[4].slice(4).map((day) => day.date)).toEqual(['2024-03-01', '2024-03-02', '2024-03-03']);
        });

        it('spans six weeks when a month starts on Sunday', () => {
            const weeks = new MonthlyCalendar(2024, 9, employee, EMPTY).getWeeks();

            expect(weeks).toHaveLength(6);
            expect(weeks[0][0].date).toBe('2024-08-26');
            expect(weeks[0][6].date).toBe('2024-09-01');
            expect(weeks[5][0].date).toBe('2024-09-30');
            expect(weeks[5][6].date).toBe('2024-10-06');
        });

        it('attaches no overlay to padding days', () => {
            const calendar = new MonthlyCalendar(
                2024,
                1,
                employee,
                records({
                    timeEntries: [timeEntry('2024-02-01')],
                    holidays: [holiday('Lichtmess', '2024-02-02')],
                })
            );
            const lastWeek = calendar.getWeeks()[4];

            expect(lastWeek[3].hasTimeEntry).toBe(false);
            expect(lastWeek[4].isPublicHoliday).toBe(false);
            expect(calendar.stats.entriesCount).toBe(0);
        });
    });

    describe('build', () => {
        it('queries the month window for the owner, one source after another', async () => {
            const source = createMockSource();
            source.fetchTimeEntries.mockResolvedValue([timeEntry('2024-01-15')]);

            const calendar = await MonthlyCalendar.build(2024, 1, employee, source);

            const range = { start: '2024-01-01', end: '2024-01-31' };
            expect(source.fetchTimeEntries).toHaveBeenCalledWith('u1', range);
            expect(source.fetchHolidays).toHaveBeenCalledWith(2024);
            expect(source.fetchNonWorkingDays).toHaveBeenCalledWith('u1', range);
            expect(source.fetchTimeEntries.mock.invocationCallOrder[0]).toBeLessThan(
                source.fetchHolidays.mock.invocationCallOrder[0]
            );
            expect(source.fetchHolidays.mock.invocationCallOrder[0]).toBeLessThan(
                source.fetchNonWorkingDays.mock.invocationCallOrder[0]
            );
            expect(calendar.stats.entriesCount).toBe(1);
        });

        it('passes the tie-break option through', async () => {
            const calendar = await MonthlyCalendar.build(2024, 1, employee, createMockSource(), {
                tieBreak: 'source-order',
            });
            expect(calendar.tieBreak).toBe('source-order');
        });

        it('rejects an invalid month or year before querying', async () => {
            const source = createMockSource();

            await expect(MonthlyCalendar.build(2024, 0, employee, source)).rejects.toThrow(RangeError);
            await expect(MonthlyCalendar.build(10000, 1, employee, source)).rejects.toThrow(RangeError);
            expect(source.fetchTimeEntries).not.toHaveBeenCalled();
        });

        it('propagates a failed query', async () => {
            const source = createMockSource();
            const failure = new Error('holidays unavailable');
            source.fetchHolidays.mockRejectedValue(failure);

            await expect(MonthlyCalendar.build(2024, 1, employee, source)).rejects.toBe(failure);
            expect(source.fetchNonWorkingDays).not.toHaveBeenCalled();
        });
    });
});

describe('MonthlyCalendar properties', () => {
    const YEARS = [1, 1900, 2000, 2023, 2024, 2100, 9999];
    const MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

    const isLeap = (year: number) => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    const monthLength = (year: number, month: number) =>
        [31, isLeap(year) ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31][month - 1];
    const key = (year: number, month: number, day: number) =>
        `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
    const utcDay = (date: string) => new Date(`${date}T00:00:00Z`).getUTCDay();

    it('has one ascending day per date of every month', () => {
        for (const year of YEARS) {
            for (const month of MONTHS) {
                const { days } = new MonthlyCalendar(year, month, employee, EMPTY);
                const length = monthLength(year, month);

                expect(days).toHaveLength(length);
                expect(days[0].date).toBe(key(year, month, 1));
                expect(days[length - 1].date).toBe(key(year, month, length));
                expect(days.map((day) => day.dayOfMonth)).toEqual(
                    Array.from({ length }, (_, index) => index + 1)
                );
            }
        }
    });

    it('marks exactly Saturdays and Sundays as weekend', () => {
        for (const year of [2023, 2024, 2100]) {
            for (const month of MONTHS) {
                for (const day of new MonthlyCalendar(year, month, employee, EMPTY).days) {
                    const weekday = utcDay(day.date);
                    expect(day.isWeekend).toBe(weekday === 0 || weekday === 6);
                }
            }
        }
    });

    it('lays out 4-6 full Monday-to-Sunday weeks for every month', () => {
        for (const year of [1900, 2000, 2021, 2023, 2024, 2100]) {
            for (const month of MONTHS) {
                const weeks = new MonthlyCalendar(year, month, employee, EMPTY).getWeeks();
                const grid = weeks.flat();

                expect(weeks.length).toBeGreaterThanOrEqual(4);
                expect(weeks.length).toBeLessThanOrEqual(6);
                expect(weeks.every((week) => week.length === 7)).toBe(true);
                expect(grid[0].weekday).toBe(0);
                expect(utcDay(grid[0].date)).toBe(1);
                expect(grid[grid.length - 1].weekday).toBe(6);
                expect(grid.filter((day) => !day.isOtherMonth)).toHaveLength(monthLength(year, month));
            }
        }
    });

    it('derives workday and missing entry from the overlays on every day', () => {
        const mixed = records({
            timeEntries: [
                timeEntry('2024-01-01'),
                timeEntry('2024-01-06'),
                timeEntry('2024-01-10'),
                timeEntry('2024-01-15'),
                timeEntry('2024-02-29'),
            ],
            holidays: [holiday('Neujahr', '2024-01-01'), holiday('Tag der Arbeit', '2019-05-01', true)],
            nonWorkingDays: [
                specificRule('2024-01-10', 'Arzttermin'),
                weeklyRule(4, 'Teilzeit', { validFrom: '2024-02-01' }),
                monthlyRule(20),
            ],
        });

        let checked = 0;
        for (const month of [1, 2, 5]) {
            for (const day of new MonthlyCalendar(2024, month, employee, mixed).days) {
                expect(day.isWorkday).toBe(!(day.isWeekend || day.isPublicHoliday || day.isEmployeeNonWorkingDay));
                expect(day.isMissingEntry).toBe(day.isWorkday && !day.hasTimeEntry);
                checked++;
            }
        }
        expect(checked).toBe(31 + 29 + 31);
    });

    it('applies a weekly Friday rule to every Friday and no other day', () => {
        const rules = records({ nonWorkingDays: [weeklyRule(4, 'Teilzeit')] });

        for (const month of MONTHS) {
            const { days } = new MonthlyCalendar(2024, month, employee, rules);
            for (const day of days) {
                expect(day.isEmployeeNonWorkingDay).toBe(day.weekday === 4);
            }
        }
    });

    it('applies a monthly rule on the same day across the year boundary', () => {
        const rules = records({ nonWorkingDays: [monthlyRule(15, 'Inventur')] });
        const nonWorking = (year: number, month: number) =>
            new MonthlyCalendar(year, month, employee, rules).days
                .filter((day) => day.isEmployeeNonWorkingDay)
                .map((day) => day.date);

        expect(nonWorking(2023, 11)).toEqual(['2023-11-15']);
        expect(nonWorking(2023, 12)).toEqual(['2023-12-15']);
        expect(nonWorking(2024, 1)).toEqual(['2024-01-15']);
        expect(nonWorking(2024, 2)).toEqual(['2024-02-15']);
    });

    it('limits a monthly rule to its validity window across the year boundary', () => {
        const rule = { ...monthlyRule(15, 'Inventur'), validFrom: '2023-12-16', validUntil: '2024-02-15' };
        const rules = records({ nonWorkingDays: [rule] });
        const count = (year: number, month: number) =>
            new MonthlyCalendar(year, month, employee, rules).stats.nonWorkingDays;

        expect(count(2023, 12)).toBe(0);
        expect(count(2024, 1)).toBe(1);
        expect(count(2024, 2)).toBe(1);
        expect(count(2024, 3)).toBe(0);
    });

    it('repeats a recurring New Year on 1 January only', () => {
        const newYear = records({ holidays: [holiday('New Year', '2024-01-01', true)] });
        const holidayDates = (year: number, month: number) =>
            new MonthlyCalendar(year, month, employee, newYear).days
                .filter((day) => day.isPublicHoliday)
                .map((day) => day.date);

        const january = new MonthlyCalendar(2024, 1, employee, newYear).getDay('2024-01-01');
        expect(january?.isPublicHoliday).toBe(true);
        expect(january?.holidayName).toBe('New Year');
        expect(january?.isWorkday).toBe(false);

        expect(holidayDates(2024, 1)).toEqual(['2024-01-01']);
        expect(holidayDates(2031, 1)).toEqual(['2031-01-01']);
        expect(holidayDates(1999, 1)).toEqual(['1999-01-01']);
        expect(holidayDates(2024, 2)).toEqual([]);
        expect(holidayDates(2024, 12)).toEqual([]);
        expect(holidayDates(2023, 12)).toEqual([]);
    });

    it('applies a one-off holiday in its own year only', () => {
        const outing = records({ holidays: [holiday('Betriebsausflug', '2024-06-14')] });

        expect(new MonthlyCalendar(2024, 6, employee, outing).getDay('2024-06-14')?.isPublicHoliday).toBe(true);
        expect(new MonthlyCalendar(2024, 6, employee, outing).stats.holidays).toBe(1);
        expect(new MonthlyCalendar(2025, 6, employee, outing).stats.holidays).toBe(0);
        expect(new MonthlyCalendar(2023, 6, employee, outing).stats.holidays).toBe(0);
    });
});
