import { format, isValid, parseISO } from 'date-fns';

/**
 * Calendar date helpers for cycle deadlines
 *
 * Deadlines are whole calendar days carried as ISO `YYYY-MM-DD` strings. A
 * deadline is still open for the whole of its day and has passed from the
 * following day on. "Today" is the server's local calendar date.
 *
 * @module utils/date
 */

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format a Date as a calendar date in local time
 *
 * @example
 * toCalendarDate(new Date(2026, 0, 31, 18, 30)); // '2026-01-31'
 */
export function toCalendarDate(date: Date): string {
  if (!isValid(date)) {
    throw new Error('Invalid date provided');
  }
  return format(date, 'yyyy-MM-dd');
}

/**
 * Today's calendar date
 */
export function today(now: Date = new Date()): string {
  return toCalendarDate(now);
}

/**
 * Parse a strict `YYYY-MM-DD` string
 *
 * @returns Date at local midnight, or null for anything else, including
 * impossible days such as 2026-02-30
 */
export function parseCalendarDate(value: string): Date | null {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return null;
  }

  const parsed = parseISO(value);

  if (!isValid(parsed) || format(parsed, 'yyyy-MM-dd') !== value) {
    return null;
  }

  return parsed;
}

/**
 * Type guard for valid calendar date strings
 */
export function isCalendarDate(value: unknown): value is string {
  return typeof value === 'string' && parseCalendarDate(value) !== null;
}

/**
 * Whether a deadline day is over on the given day
 *
 * @example
 * isDeadlinePassed('2026-03-31', '2026-03-31'); // false
 * isDeadlinePassed('2026-03-31', '2026-04-01'); // true
 */
export function isDeadlinePassed(deadline: string, on: string): boolean {
  return on > deadline;
}

/**
 * Human-readable deadline, e.g. "Tuesday, 31 March 2026"
 */
export function formatDeadline(deadline: string): string {
  const parsed = parseCalendarDate(deadline);
  return parsed ? format(parsed, 'EEEE, d MMMM yyyy') : deadline;
}
