/**
 * Learning Facts Module - Calendar Helpers
 *
 * Date arithmetic on YYYY-MM-DD strings and the fact timestamp format.
 * Everything here works in UTC, the single reference calendar.
 */

import type { CalendarDate, FactTimestamp } from './types.js';

const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// Seconds are required; a fraction and a Z / ±HH:MM suffix are optional (legacy writers)
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:\d{2})?$/;

const MS_PER_MINUTE = 60 * 1000;

/**
 * Builds a UTC epoch value and rejects components that overflow (e.g. Feb 30).
 */
function utcEpoch(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): number | null {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  date.setUTCFullYear(year);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return null;
  }

  return date.getTime();
}

/**
 * Parses a YYYY-MM-DD date. Returns null for anything that is not a real date.
 */
export function parseCalendarDate(raw: string | null | undefined): CalendarDate | null {
  if (raw == null) {
    return null;
  }

  const match = CALENDAR_DATE_PATTERN.exec(raw);
  if (match === null) {
    return null;
  }

  const [, year, month, day] = match;
  const epoch = utcEpoch(Number(year), Number(month), Number(day));
  return epoch === null ? null : raw;
}

/**
 * Calendar date (UTC) of an instant.
 */
export function toCalendarDate(instant: Date): CalendarDate {
  return instant.toISOString().slice(0, 10);
}

/**
 * Shifts a calendar date by a number of days.
 */
export function addDays(date: CalendarDate, days: number): CalendarDate {
  const shifted = new Date(`${date}T00:00:00Z`);
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return toCalendarDate(shifted);
}

/**
 * Formats an instant as YYYY-MM-DDTHH:MM:SSZ, dropping sub-second precision.
 */
export function formatFactTimestamp(instant: Date): FactTimestamp {
  return `${instant.toISOString().slice(0, 19)}Z`;
}

/**
 * Parses a stored fact timestamp into epoch milliseconds.
 *
 * Accepts the canonical second-precision form plus legacy values with
 * fractional seconds or an explicit offset. A missing suffix is read as UTC.
 */
export function parseFactTimestamp(raw: string | null | undefined): number | null {
  if (raw == null) {
    return null;
  }

  const match = TIMESTAMP_PATTERN.exec(raw);
  if (match === null) {
    return null;
  }

  const [, year, month, day, hours, minutes, seconds, zone] = match;
  const epoch = utcEpoch(
    Number(year),
    Number(month),
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );
  if (epoch === null) {
    return null;
  }

  if (zone === undefined || zone === 'Z') {
    return epoch;
  }

  const sign = zone.startsWith('-') ? -1 : 1;
  const offsetHours = Number(zone.slice(1, 3));
  const offsetMinutes = Number(zone.slice(4, 6));
  if (offsetHours > 23 || offsetMinutes > 59) {
    return null;
  }

  return epoch - sign * (offsetHours * 60 + offsetMinutes) * MS_PER_MINUTE;
}

/**
 * Re-emits a stored timestamp in the canonical form, or null when unparsable.
 */
export function normalizeFactTimestamp(raw: string | null | undefined): FactTimestamp | null {
  const epoch = parseFactTimestamp(raw);
  return epoch === null ? null : formatFactTimestamp(new Date(epoch));
}
