/**
 * Day-Serial Date Conversion
 *
 * Spreadsheet exports store timestamps as floating-point day counts:
 * the integer part is the date, the fractional part the time of day.
 * The 1900 date system inherited a bug that treats 1900 as a leap year,
 * so serials before 1900-03-01 are off by one day.
 *
 * All date-times here are naive wall-clock values. They are carried in the
 * UTC fields of a Date and never shifted by a time zone.
 *
 * Example conversions:
 * - 45870 → 2025-08-01 00:00:00
 * - 45870.5 → 2025-08-01 12:00:00
 * - 59 → 1900-02-28 00:00:00 (leap-bug window)
 */

import {
  LEAP_BUG_WINDOW,
  MS_PER_DAY,
  SERIAL_EPOCH_MS,
  SERIAL_INTEGER_EPSILON,
} from './constants';
import { ReceiptFormatError } from './errors';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?: (\d{1,2}):(\d{1,2}):(\d{1,2}))?$/;

/**
 * Converts a day-serial into a date-time.
 *
 * No range validation is done: a non-finite serial yields an invalid Date,
 * and an implausible serial yields an implausible date.
 *
 * @example
 * serialToDate(45870.46841435185) // 2025-08-01 11:14:31
 */
export function serialToDate(serial: number): Date {
  const inLeapBugWindow =
    serial >= LEAP_BUG_WINDOW.FIRST_SERIAL && serial < LEAP_BUG_WINDOW.PHANTOM_SERIAL;
  const days = inLeapBugWindow ? serial + 1 : serial;

  return new Date(SERIAL_EPOCH_MS + Math.round(days * MS_PER_DAY));
}

/**
 * Converts a date-time into a day-serial.
 * Dates in 1900-01-01..1900-02-28 are shifted down by one to mirror the
 * leap-bug; results within 1e-9 of a whole number collapse to it.
 *
 * @example
 * dateToSerial(new Date(Date.UTC(2025, 7, 1))) // 45870
 */
export function dateToSerial(date: Date): number {
  const time = date.getTime();
  let serial = (time - SERIAL_EPOCH_MS) / MS_PER_DAY;

  if (time >= LEAP_BUG_WINDOW.START_MS && time < LEAP_BUG_WINDOW.CUTOFF_MS) {
    serial -= 1;
  }

  const rounded = Math.round(serial);
  return Math.abs(serial - rounded) < SERIAL_INTEGER_EPSILON ? rounded : serial;
}

/**
 * Builds a wall-clock date-time, or null when any component is out of range
 * (month 13, February 30th, hour 24...).
 */
export function buildDateTime(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  const sameCalendarDay =
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;

  return sameCalendarDay ? date : null;
}

/**
 * Parses `YYYY-MM-DD HH:MM:SS`, falling back to a date-only `YYYY-MM-DD`.
 * Returns null for anything else.
 */
export function tryParseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hours, minutes, seconds] = match;
  return buildDateTime(
    Number(year),
    Number(month),
    Number(day),
    Number(hours ?? 0),
    Number(minutes ?? 0),
    Number(seconds ?? 0)
  );
}

/**
 * Parses the approval timestamp printed on a receipt.
 *
 * @throws ReceiptFormatError when neither format applies
 */
export function parseReceiptTimestamp(value: string): Date {
  const parsed = tryParseTimestamp(value);
  if (!parsed) {
    throw new ReceiptFormatError(
      `Invalid datetime format: ${value}. Expected: 'YYYY-MM-DD HH:MM:SS'`
    );
  }
  return parsed;
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

/**
 * Formats a date-time as `YYYY-MM-DD HH:MM:SS` (or `YYYY-MM-DD`).
 */
export function formatDateTime(date: Date, withTime = true): string {
  const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  if (!withTime) {
    return day;
  }
  return `${day} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Renders a day-serial the way the sales report displays it.
 *
 * @example
 * formatSerial(45870.5) // "2025-08-01 12:00:00"
 * formatSerial(45870.5, false) // "2025-08-01"
 */
export function formatSerial(serial: number, withTime = true): string {
  return formatDateTime(serialToDate(serial), withTime);
}

/**
 * True when both date-times fall on the same calendar day.
 */
export function isSameCalendarDate(a: Date, b: Date): boolean {
  return (
    a.getUTCFullYear() === b.getUTCFullYear() &&
    a.getUTCMonth() === b.getUTCMonth() &&
    a.getUTCDate() === b.getUTCDate()
  );
}

/**
 * Absolute distance between two date-times, in seconds.
 */
export function secondsBetween(a: Date, b: Date): number {
  return Math.abs(a.getTime() - b.getTime()) / 1000;
}
