/**
 * @fileoverview Calendar Overlay Rules
 *
 * Pure predicates deciding which records apply to which dates. Each data
 * source gets one lookup of the form `(date) => value | null`; the calendar
 * combines them when it constructs a day.
 *
 * ## Holidays
 * - One-off holidays apply on their stored date only.
 * - Recurring holidays apply every year on the stored month/day. When a month
 *   is resolved, a recurring holiday is only considered if its stored month
 *   equals the requested month, and a stored 29 February is skipped in
 *   years without one.
 * - Two holidays on the same date: the later one in source order wins.
 *
 * ## Non-working-day rules
 * - A rule never applies outside its inclusive validity window.
 * - specific → same date, weekly → same weekday, monthly → same day of month.
 * - When several rules match a date, the first one in policy order wins
 *   (see `orderRules`).
 */

import { PATTERN_PRECEDENCE } from './constants.js';
import { IsoUtils } from './utils.js';
import type {
    DateKey,
    DateRange,
    NonWorkingDayRule,
    PublicHoliday,
    TieBreakPolicy,
    TimeEntry,
} from './types.js';

/**
 * Looks up the record an overlay attaches to a date.
 */
export type OverlayLookup<T> = (date: DateKey) => T | null;

// ==================== HOLIDAYS ====================

/**
 * Whether a holiday falls on a date, recurring holidays in any year.
 */
export function holidayAppliesTo(holiday: PublicHoliday, date: DateKey): boolean {
    if (!holiday.isRecurring) {
        return holiday.date === date;
    }
    const stored = IsoUtils.splitDateKey(holiday.date);
    const candidate = IsoUtils.splitDateKey(date);
    return stored.month === candidate.month && stored.day === candidate.day;
}

/**
 * Maps each date of a month to the holiday observed on it.
 *
 * @param holidays - Global holiday rules, in source order.
 * @param year - Requested year.
 * @param month - Requested month (1-12).
 * @param range - First and last date of the month.
 */
export function resolveHolidays(
    holidays: PublicHoliday[],
    year: number,
    month: number,
    range: DateRange
): Map<DateKey, PublicHoliday> {
    const byDate = new Map<DateKey, PublicHoliday>();

    for (const holiday of holidays) {
        if (!holiday.isRecurring) {
            if (IsoUtils.isWithin(holiday.date, range)) {
                byDate.set(holiday.date, holiday);
            }
            continue;
        }

        const stored = IsoUtils.splitDateKey(holiday.date);
        if (stored.month !== month) continue;
        if (stored.day > IsoUtils.daysInMonth(year, stored.month)) continue;

        const observed = IsoUtils.fromParts(year, stored.month, stored.day);
        if (IsoUtils.isWithin(observed, range)) {
            byDate.set(observed, holiday);
        }
    }

    return byDate;
}

export function createHolidayLookup(
    holidays: PublicHoliday[],
    year: number,
    month: number,
    range: DateRange
): OverlayLookup<PublicHoliday> {
    const byDate = resolveHolidays(holidays, year, month, range);
    return (date) => byDate.get(date) ?? null;
}

// ==================== NON-WORKING DAYS ====================

/**
 * Whether a date lies inside a rule's validity window (open bounds allowed).
 */
export function isWithinValidity(rule: NonWorkingDayRule, date: DateKey): boolean {
    if (rule.validFrom && date < rule.validFrom) return false;
    if (rule.validUntil && date > rule.validUntil) return false;
    return true;
}

/**
 * Whether a non-working-day rule covers a date.
 */
export function appliesToDate(rule: NonWorkingDayRule, date: DateKey): boolean {
    if (!isWithinValidity(rule, date)) {
        return false;
    }

    switch (rule.pattern) {
        case 'specific':
            return rule.date === date;
        case 'weekly':
            return IsoUtils.getWeekday(date) === rule.weekday;
        case 'monthly':
            return IsoUtils.splitDateKey(date).day === rule.dayOfMonth;
    }
}

/**
 * Whether a rule can match any date of the range: a specific rule dated
 * inside it, or a recurring rule whose validity window overlaps it.
 */
export function ruleOverlapsRange(rule: NonWorkingDayRule, range: DateRange): boolean {
    if (rule.pattern === 'specific') {
        return IsoUtils.isWithin(rule.date, range);
    }
    const startsInTime = !rule.validFrom || rule.validFrom <= range.end;
    const endsInTime = !rule.validUntil || rule.validUntil >= range.start;
    return startsInTime && endsInTime;
}

/**
 * Rules of one employee that can match a date in the range, in source order.
 */
export function selectNonWorkingRules(
    rules: NonWorkingDayRule[],
    employeeId: string,
    range: DateRange
): NonWorkingDayRule[] {
    return rules.filter((rule) => rule.employeeId === employeeId && ruleOverlapsRange(rule, range));
}

/**
 * Orders candidate rules for first-match-wins.
 * `specificity` ranks specific < weekly < monthly and keeps source order
 * among equals (the sort is stable); `source-order` leaves them as given.
 */
export function orderRules(rules: NonWorkingDayRule[], policy: TieBreakPolicy): NonWorkingDayRule[] {
    if (policy === 'source-order') {
        return [...rules];
    }
    return [...rules].sort(
        (a, b) => PATTERN_PRECEDENCE[a.pattern] - PATTERN_PRECEDENCE[b.pattern]
    );
}

/**
 * First rule in the given order covering the date.
 */
export function findNonWorkingRule(rules: NonWorkingDayRule[], date: DateKey): NonWorkingDayRule | null {
    return rules.find((rule) => appliesToDate(rule, date)) ?? null;
}

export function createNonWorkingLookup(
    rules: NonWorkingDayRule[],
    employeeId: string,
    range: DateRange,
    policy: TieBreakPolicy
): OverlayLookup<NonWorkingDayRule> {
    const candidates = orderRules(selectNonWorkingRules(rules, employeeId, range), policy);
    return (date) => findNonWorkingRule(candidates, date);
}

// ==================== TIME ENTRIES ====================

/**
 * Indexes one employee's sessions in the range by date.
 * Sessions are unique per (user, date); a duplicate would replace the earlier one.
 */
export function createEntryLookup(
    entries: TimeEntry[],
    userId: string,
    range: DateRange
): OverlayLookup<TimeEntry> {
    const byDate = new Map<DateKey, TimeEntry>();
    for (const entry of entries) {
        if (entry.userId === userId && IsoUtils.isWithin(entry.date, range)) {
            byDate.set(entry.date, entry);
        }
    }
    return (date) => byDate.get(date) ?? null;
}
