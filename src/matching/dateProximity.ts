/**
 * Date Proximity Scoring for Recurring-Instance Reconciliation
 *
 * Bank postings drift a few days from the scheduled date of a bill
 * (weekends, processing delays). The date signal is 1.0 on the scheduled
 * date and decays linearly to 0 at the window edge.
 *
 * Dates are ISO calendar dates (YYYY-MM-DD) and are compared in UTC so
 * that no local time zone can shift a day.
 */

import type { CalendarDate } from './types';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses an ISO calendar date into UTC midnight milliseconds.
 *
 * @returns NaN when the input is not a real calendar date
 */
export function toUtcMillis(date: CalendarDate): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    return Number.NaN;
  }

  const [, year, month, day] = match;
  const millis = Date.UTC(Number(year), Number(month) - 1, Number(day));

  // Reject rollovers such as 2025-02-30
  return formatUtcMillis(millis) === date ? millis : Number.NaN;
}

function formatUtcMillis(millis: number): CalendarDate {
  return new Date(millis).toISOString().slice(0, 10);
}

export function isCalendarDate(value: string): boolean {
  return !Number.isNaN(toUtcMillis(value));
}

/**
 * Signed number of days from `from` to `to`.
 *
 * @example
 * dayOffset('2025-03-10', '2025-03-12') // Returns: 2
 * dayOffset('2025-03-12', '2025-03-10') // Returns: -2
 */
export function dayOffset(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMillis(to) - toUtcMillis(from)) / MS_PER_DAY);
}

/**
 * Absolute number of days between two dates.
 */
export function daysBetween(date1: CalendarDate, date2: CalendarDate): number {
  return Math.abs(dayOffset(date1, date2));
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return formatUtcMillis(toUtcMillis(date) + days * MS_PER_DAY);
}

/**
 * First and last calendar day of a month (month is 1-based).
 */
export function monthRange(year: number, month: number): { from: CalendarDate; to: CalendarDate } {
  return {
    from: formatUtcMillis(Date.UTC(year, month - 1, 1)),
    to: formatUtcMillis(Date.UTC(year, month, 0)),
  };
}

export function isWithinWindow(offsetDays: number, windowDays: number): boolean {
  return Number.isFinite(offsetDays) && Math.abs(offsetDays) <= windowDays;
}

/**
 * Date signal for the confidence score.
 *
 * A window of 0 days means only the exact scheduled date scores.
 *
 * @example
 * calculateDateScore(0, 3)  // Returns: 1
 * calculateDateScore(-1, 3) // Returns: 0.666...
 * calculateDateScore(3, 3)  // Returns: 0
 * calculateDateScore(5, 3)  // Returns: 0
 */
export function calculateDateScore(offsetDays: number, windowDays: number): number {
  if (!isWithinWindow(offsetDays, windowDays)) {
    return 0;
  }
  if (windowDays === 0) {
    return 1;
  }

  return 1 - Math.abs(offsetDays) / windowDays;
}

export default calculateDateScore;
