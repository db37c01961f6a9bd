/**
 * Calendar date helpers.
 *
 * Scheduling works on whole days. Dates travel as `YYYY-MM-DD` strings and
 * all arithmetic happens in UTC so daylight-saving shifts never move a due
 * date.
 */

import type { CalendarDate } from './models';

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * The local calendar date of a timestamp.
 *
 * Used at the edges (CLI, API) to turn the wall clock into the explicit
 * `today` the scheduler takes.
 */
export function toCalendarDate(date: Date): CalendarDate {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}`;
}

/**
 * Parses and validates a `YYYY-MM-DD` string.
 *
 * @throws RangeError if the value is not a real calendar date
 */
export function parseCalendarDate(value: string): CalendarDate {
  const match = CALENDAR_DATE_PATTERN.exec(value);
  if (!match) {
    throw new RangeError(`Expected a YYYY-MM-DD date, got '${value}'`);
  }

  const [, year, month, day] = match;
  const utc = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    utc.getUTCFullYear() !== Number(year) ||
    utc.getUTCMonth() !== Number(month) - 1 ||
    utc.getUTCDate() !== Number(day)
  ) {
    throw new RangeError(`Not a valid calendar date: '${value}'`);
  }

  return value;
}

/**
 * Adds a whole number of days to a calendar date.
 *
 * @example
 * addDays('2024-02-28', 2); // '2024-03-01'
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const [year, month, day] = parseCalendarDate(date).split('-').map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day) + days * MS_PER_DAY);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1, 2)}-${pad(shifted.getUTCDate(), 2)}`;
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: CalendarDate, to: CalendarDate): number {
  const toUtc = (value: CalendarDate): number => {
    const [year, month, day] = parseCalendarDate(value).split('-').map(Number);
    return Date.UTC(year, month - 1, day);
  };
  return Math.round((toUtc(to) - toUtc(from)) / MS_PER_DAY);
}
