/**
 * Resort-local calendar helpers
 *
 * All day-boundary decisions use the resort's IANA timezone, never the
 * host's. Dates are plain YYYY-MM-DD strings so they sort lexically.
 */

import type { LocalDate } from '../types/grooming';

const LOCAL_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const partsOf = (now: Date, timeZone: string): Map<string, string> => {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  return new Map(formatter.formatToParts(now).map((part) => [part.type, part.value]));
};

/**
 * Calendar date of `now` in the given timezone
 */
export function localDateOf(now: Date, timeZone: string): LocalDate {
  const parts = partsOf(now, timeZone);
  return `${parts.get('year')}-${parts.get('month')}-${parts.get('day')}`;
}

/**
 * Wall-clock hour (0-23) and minute of `now` in the given timezone
 */
export function localTimeOf(now: Date, timeZone: string): { hour: number; minute: number } {
  const parts = partsOf(now, timeZone);
  return {
    hour: parseInt(parts.get('hour') ?? '0', 10),
    minute: parseInt(parts.get('minute') ?? '0', 10),
  };
}

/**
 * True once local time has reached hour:minute
 */
export function isAtOrAfter(now: Date, timeZone: string, hour: number, minute = 0): boolean {
  const local = localTimeOf(now, timeZone);
  return local.hour > hour || (local.hour === hour && local.minute >= minute);
}

export function isLocalDate(value: string): boolean {
  if (!LOCAL_DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Shift a calendar date by whole days
 */
export function addDays(date: LocalDate, days: number): LocalDate {
  const [year, month, day] = date.split('-').map((part) => parseInt(part, 10));
  if (year === undefined || month === undefined || day === undefined) {
    throw new Error(`Invalid local date: ${date}`);
  }
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return shifted.toISOString().slice(0, 10);
}

/**
 * Short weekday name (Mon, Tue, ...) of a calendar date
 */
export function weekdayOf(date: LocalDate): string {
  return new Intl.DateTimeFormat('en-US', { weekday: 'short', timeZone: 'UTC' }).format(
    new Date(`${date}T00:00:00Z`)
  );
}
