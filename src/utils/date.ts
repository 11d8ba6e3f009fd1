import { DateTime } from 'luxon';
import { FRIDAY, ISO_DATE_FORMAT } from '../constants.js';

/** Calendar date in `yyyy-MM-dd` form. */
export type IsoDate = string;

/**
 * Parses a `yyyy-MM-dd` string as a UTC calendar date.
 * Returns null when the string is not a valid date.
 */
export function parseIsoDate(value: string): DateTime | null {
  const parsed = DateTime.fromFormat(value.trim(), ISO_DATE_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

/** Parses a `yyyy-MM-dd` string, throwing when it is not a valid date. */
export function requireIsoDate(value: string): DateTime {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new Error(`"${value}" is not a valid yyyy-MM-dd date`);
  }
  return parsed;
}

export function toIsoDate(date: DateTime): IsoDate {
  return date.toFormat(ISO_DATE_FORMAT);
}

/** Today's local calendar date as a UTC midnight DateTime. */
export function today(now: DateTime = DateTime.now()): DateTime {
  return DateTime.utc(now.year, now.month, now.day);
}

export function isWeekday(date: DateTime): boolean {
  return date.weekday <= FRIDAY;
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: DateTime, to: DateTime): number {
  return Math.round(to.startOf('day').diff(from.startOf('day'), 'days').days);
}

/** Every calendar date in `[start, end]`, inclusive. */
export function datesInRange(start: DateTime, end: DateTime): DateTime[] {
  const dates: DateTime[] = [];
  let current = start.startOf('day');

  while (current <= end) {
    dates.push(current);
    current = current.plus({ days: 1 });
  }

  return dates;
}

export function countWeekdaysInRange(start: DateTime, end: DateTime): number {
  return datesInRange(start, end).filter(isWeekday).length;
}

/**
 * Rounds to the nearest integer, sending exact halves to the even neighbour.
 * 2.5 rounds to 2 and 3.5 rounds to 4.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
}
