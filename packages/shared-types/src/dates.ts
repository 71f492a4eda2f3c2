/**
 * Timezone-aware date helpers
 *
 * Built on Intl.DateTimeFormat so any IANA zone the runtime knows works
 * without a tz database dependency. Instants are plain `Date`s (UTC);
 * wall-clock values in a zone are `LocalDateTime` records.
 */

import type { DayOfWeek } from './tasks.js';
import { DAYS_OF_WEEK } from './tasks.js';

/** Calendar date in some zone, month is 1-12 */
export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

/** Wall-clock date and time in some zone */
export interface LocalDateTime extends LocalDate {
  hour: number;
  minute: number;
  second?: number;
}

/** Wall-clock parts of an instant in a zone; weekday 0 = Sunday */
export interface ZonedParts extends LocalDateTime {
  second: number;
  weekday: number;
}

const WEEKDAY_INDEX: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Check whether the runtime knows an IANA timezone
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock parts of an instant in the given zone
 */
export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = getFormatter(timeZone).formatToParts(date);
  const read = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '';

  return {
    year: Number(read('year')),
    month: Number(read('month')),
    day: Number(read('day')),
    hour: Number(read('hour')) % 24,
    minute: Number(read('minute')),
    second: Number(read('second')),
    weekday: WEEKDAY_INDEX[read('weekday')] ?? 0,
  };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds
 * (negative west of Greenwich)
 */
export function getTimeZoneOffsetMs(date: Date, timeZone: string): number {
  const p = getZonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/**
 * Convert a wall-clock time in a zone to the instant it denotes.
 * Times inside a DST gap resolve to the later offset.
 */
export function zonedTimeToUtc(local: LocalDateTime, timeZone: string): Date {
  const asUtc = Date.UTC(
    local.year,
    local.month - 1,
    local.day,
    local.hour,
    local.minute,
    local.second ?? 0
  );
  const firstOffset = getTimeZoneOffsetMs(new Date(asUtc), timeZone);
  const candidate = asUtc - firstOffset;
  const secondOffset = getTimeZoneOffsetMs(new Date(candidate), timeZone);

  return new Date(secondOffset === firstOffset ? candidate : asUtc - secondOffset);
}

/**
 * Add calendar days to a local date
 */
export function addDaysToDate(date: LocalDate, days: number): LocalDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/**
 * Day of week (0 = Sunday) of a local date
 */
export function weekdayOf(date: LocalDate): number {
  return new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
}

export function dayOfWeekName(weekday: number): DayOfWeek {
  return DAYS_OF_WEEK[((weekday % 7) + 7) % 7] ?? 'sunday';
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function isValidLocalDate(date: LocalDate): boolean {
  return (
    Number.isInteger(date.year) &&
    date.month >= 1 &&
    date.month <= 12 &&
    date.day >= 1 &&
    date.day <= daysInMonth(date.year, date.month)
  );
}

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

/**
 * Parse "YYYY-MM-DD" or "YYYY-MM-DDTHH:mm[:ss]" (no offset) as a wall-clock
 * value. Returns null when malformed or out of range.
 */
export function parseLocalDateTime(
  value: string
): { value: LocalDateTime; hasTime: boolean } | null {
  const match = LOCAL_DATE_TIME.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour, minute, second] = match;
  const parsed: LocalDateTime = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour !== undefined ? Number(hour) : 0,
    minute: minute !== undefined ? Number(minute) : 0,
    second: second !== undefined ? Number(second) : 0,
  };

  if (!isValidLocalDate(parsed) || parsed.hour > 23 || parsed.minute > 59 || (parsed.second ?? 0) > 59) {
    return null;
  }

  return { value: parsed, hasTime: hour !== undefined };
}

const OFFSET_SUFFIX = /(?:[zZ]|[+-]\d{2}:?\d{2})$/;

/**
 * Resolve a due date string to an instant. Local values are read in the
 * given zone and a date without a time means 23:59 that day; values with an
 * explicit offset are taken as-is.
 */
export function parseDueDate(value: string, timeZone: string): Date | null {
  const local = parseLocalDateTime(value);
  if (local) {
    return zonedTimeToUtc(
      local.hasTime ? local.value : { ...local.value, hour: 23, minute: 59, second: 0 },
      timeZone
    );
  }
  return parseInstant(value);
}

/**
 * Parse an ISO timestamp that carries its own offset ("Z" or "+02:00").
 * Anything without one is rejected rather than read in the server's zone.
 */
export function parseInstant(value: string): Date | null {
  const trimmed = value.trim();
  if (!OFFSET_SUFFIX.test(trimmed)) {
    return null;
  }
  const instant = new Date(trimmed);
  return Number.isNaN(instant.getTime()) ? null : instant;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format an instant as "YYYY-MM-DDTHH:mm" wall-clock time in a zone
 */
export function formatLocalDateTime(date: Date, timeZone: string): string {
  const p = getZonedParts(date, timeZone);
  return `${p.year}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}`;
}

/**
 * Parse "HH:MM" into minutes after midnight
 */
export function parseClockTime(value: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return hours * 60 + minutes;
}

/**
 * Human-readable date for prompts and replies, e.g. "Tue, Oct 20, 3:00 PM"
 */
export function formatForHumans(date: Date, timeZone: string): string {
  return date.toLocaleString('en-US', {
    weekday: 'short',
    month: 'short',
    day: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
    hour12: true,
    timeZone,
  });
}
