/**
 * Timezone and date/time utilities for the calendar file format
 */

import { DateTime, Info } from 'luxon';
import type { DayKey } from '../types/calendar.js';

export const DEFAULT_TIME_ZONE = 'UTC';

const ICAL_INSTANT_FORMAT = "yyyyMMdd'T'HHmmss'Z'";
const ICAL_INSTANT_PATTERN = /^\d{8}T\d{6}Z$/;
const DAY_KEY_FORMAT = 'yyyy-MM-dd';
const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MIN_INSTANT_YEAR = 0;
const MAX_INSTANT_YEAR = 9999;

/**
 * Whether the UTC year of `date` fits the four digits of `YYYYMMDDTHHMMSSZ`
 */
export function isEncodableInstant(date: Date): boolean {
  const dateTime = DateTime.fromJSDate(date, { zone: 'utc' });
  return dateTime.isValid && dateTime.year >= MIN_INSTANT_YEAR && dateTime.year <= MAX_INSTANT_YEAR;
}

/**
 * Formats an instant as `YYYYMMDDTHHMMSSZ` in UTC. Milliseconds are dropped.
 * Throws for years outside 0000-9999, which the format cannot hold.
 */
export function formatInstant(date: Date): string {
  const dateTime = DateTime.fromJSDate(date, { zone: 'utc' });
  if (!dateTime.isValid) {
    throw new Error(`Invalid date: ${String(date)}`);
  }
  if (dateTime.year < MIN_INSTANT_YEAR || dateTime.year > MAX_INSTANT_YEAR) {
    throw new Error(`Year ${dateTime.year} cannot be written as YYYYMMDDTHHMMSSZ`);
  }
  return dateTime.toFormat(ICAL_INSTANT_FORMAT);
}

/**
 * Parses exactly `YYYYMMDDTHHMMSSZ`. Anything else, including out-of-range
 * calendar values, yields undefined.
 */
export function parseInstant(text: string): Date | undefined {
  if (!ICAL_INSTANT_PATTERN.test(text)) {
    return undefined;
  }

  const dateTime = DateTime.fromFormat(text, ICAL_INSTANT_FORMAT, { zone: 'utc' });
  return dateTime.isValid ? dateTime.toJSDate() : undefined;
}

/**
 * Parses the value of a date-time property line such as
 * `DTSTART;X-PARAM=1:20250510T090000Z`. Parameters are ignored: only the text
 * after the last colon is read.
 */
export function parseInstantField(line: string): Date | undefined {
  const separator = line.lastIndexOf(':');
  if (separator === -1) {
    return undefined;
  }
  return parseInstant(line.slice(separator + 1));
}

/**
 * Calendar day of an instant as seen from the given IANA zone
 */
export function toDayKey(date: Date, timeZone: string = DEFAULT_TIME_ZONE): DayKey {
  const dateTime = DateTime.fromJSDate(date, { zone: timeZone });
  if (!dateTime.isValid) {
    throw new Error(`Cannot derive day key for ${String(date)} in ${timeZone}: ${dateTime.invalidReason ?? 'invalid date'}`);
  }
  return dateTime.toFormat(DAY_KEY_FORMAT);
}

export function isValidTimeZone(timeZone: string): boolean {
  return Info.isValidIANAZone(timeZone);
}

/**
 * Checks a `YYYY-MM-DD` string names a real calendar day
 */
export function isDayKey(text: string): boolean {
  return DAY_KEY_PATTERN.test(text) && DateTime.fromFormat(text, DAY_KEY_FORMAT, { zone: 'utc' }).isValid;
}

/**
 * Parses an ISO 8601 date-time carrying a `Z` or numeric offset
 */
export function parseIsoDateTime(text: string): Date | undefined {
  if (!text.includes('T') || !/(Z|[+-]\d{2}:?\d{2})$/i.test(text)) {
    return undefined;
  }
  const dateTime = DateTime.fromISO(text, { setZone: true });
  return dateTime.isValid ? dateTime.toJSDate() : undefined;
}

export function isIsoDateTime(text: string): boolean {
  return parseIsoDateTime(text) !== undefined;
}

/**
 * Calculates the duration between two dates in minutes
 */
export function getDurationMinutes(startDate: Date, endDate: Date): number {
  return Math.round((endDate.getTime() - startDate.getTime()) / (1000 * 60));
}
