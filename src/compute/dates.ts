/**
 * Calendar date helpers
 *
 * Dates travel as YYYY-MM-DD strings. Calendar arithmetic uses the
 * process-local time zone (set TZ to change it), and every window is
 * inclusive at both ends.
 */

import type { Weekday } from '../config.js';
import type { DateRange, Period } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse YYYY-MM-DD into a local-midnight Date, or null when it is not a real date
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);

  // Rejects 2024-02-30 and friends, which Date would roll over
  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    return null;
  }
  return date;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function formatIsoDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Local midnight of the given instant */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/**
 * The day, week or month containing the anchor date
 */
export function periodWindow(period: Period, anchor: Date, weekStartsOn: Weekday = 1): DateRange {
  const day = startOfDay(anchor);

  switch (period) {
    case 'day':
      return { from: formatIsoDate(day), to: formatIsoDate(day) };
    case 'week': {
      const offset = (day.getDay() - weekStartsOn + 7) % 7;
      const first = addDays(day, -offset);
      return { from: formatIsoDate(first), to: formatIsoDate(addDays(first, 6)) };
    }
    case 'month': {
      const first = new Date(day.getFullYear(), day.getMonth(), 1);
      const last = new Date(day.getFullYear(), day.getMonth() + 1, 0);
      return { from: formatIsoDate(first), to: formatIsoDate(last) };
    }
  }
}

/**
 * The `days` calendar days ending on (and including) `today`
 */
export function trailingWindow(days: number, today: Date): DateRange {
  const end = startOfDay(today);
  return { from: formatIsoDate(addDays(end, -(days - 1))), to: formatIsoDate(end) };
}

/**
 * Every date in the range, in order
 */
export function eachDate(range: DateRange): string[] {
  const start = parseIsoDate(range.from);
  const end = parseIsoDate(range.to);
  if (!start || !end) return [];

  const dates: string[] = [];
  for (let current = start; current.getTime() <= end.getTime(); current = addDays(current, 1)) {
    dates.push(formatIsoDate(current));
  }
  return dates;
}

/**
 * Inclusive range check; a missing bound is open.
 * YYYY-MM-DD strings order the same way as the dates they name.
 */
export function isWithin(date: string, range: Partial<DateRange>): boolean {
  if (range.from && date < range.from) return false;
  if (range.to && date > range.to) return false;
  return true;
}
