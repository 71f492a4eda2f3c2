import { describe, it, expect } from 'vitest';
import {
  addDaysToDate,
  formatLocalDateTime,
  getZonedParts,
  isValidTimeZone,
  parseClockTime,
  parseDueDate,
  parseLocalDateTime,
  weekdayOf,
  zonedTimeToUtc,
} from './dates.js';

describe('zonedTimeToUtc', () => {
  it('converts daylight time in New York (UTC-4)', () => {
    const instant = zonedTimeToUtc(
      { year: 2026, month: 10, day: 20, hour: 15, minute: 0 },
      'America/New_York'
    );
    expect(instant.toISOString()).toBe('2026-10-20T19:00:00.000Z');
  });

  it('converts standard time in New York (UTC-5)', () => {
    const instant = zonedTimeToUtc(
      { year: 2026, month: 1, day: 15, hour: 9, minute: 0 },
      'America/New_York'
    );
    expect(instant.toISOString()).toBe('2026-01-15T14:00:00.000Z');
  });

  it('handles half-hour offsets (Asia/Kolkata)', () => {
    const instant = zonedTimeToUtc(
      { year: 2026, month: 3, day: 1, hour: 10, minute: 30 },
      'Asia/Kolkata'
    );
    expect(instant.toISOString()).toBe('2026-03-01T05:00:00.000Z');
  });

  it('is the identity for UTC', () => {
    const instant = zonedTimeToUtc({ year: 2026, month: 7, day: 4, hour: 12, minute: 5 }, 'UTC');
    expect(instant.toISOString()).toBe('2026-07-04T12:05:00.000Z');
  });
});

describe('getZonedParts', () => {
  it('reads wall-clock parts across the date line', () => {
    const parts = getZonedParts(new Date('2026-10-19T03:30:00Z'), 'America/Los_Angeles');
    expect(parts).toEqual({
      year: 2026,
      month: 10,
      day: 18,
      hour: 20,
      minute: 30,
      second: 0,
      weekday: 0,
    });
  });
});

describe('formatLocalDateTime', () => {
  it('formats an instant in the given zone', () => {
    expect(formatLocalDateTime(new Date('2026-10-19T13:05:00Z'), 'America/New_York')).toBe(
      '2026-10-19T09:05'
    );
  });
});

describe('parseLocalDateTime', () => {
  it('parses date-only values', () => {
    expect(parseLocalDateTime('2026-10-23')).toEqual({
      value: { year: 2026, month: 10, day: 23, hour: 0, minute: 0, second: 0 },
      hasTime: false,
    });
  });

  it('parses date and time values', () => {
    expect(parseLocalDateTime('2026-10-20T15:00')?.value).toEqual({
      year: 2026,
      month: 10,
      day: 20,
      hour: 15,
      minute: 0,
      second: 0,
    });
  });

  it('rejects impossible dates and malformed strings', () => {
    expect(parseLocalDateTime('2026-02-30')).toBeNull();
    expect(parseLocalDateTime('2026-10-20T25:00')).toBeNull();
    expect(parseLocalDateTime('tomorrow')).toBeNull();
  });
});

describe('parseDueDate', () => {
  it('reads local values in the given zone, date-only as end of day', () => {
    expect(parseDueDate('2026-10-20T15:00', 'America/New_York')?.toISOString()).toBe(
      '2026-10-20T19:00:00.000Z'
    );
    expect(parseDueDate('2026-10-23', 'America/New_York')?.toISOString()).toBe(
      '2026-10-24T03:59:00.000Z'
    );
  });

  it('keeps explicit offsets and rejects anything else', () => {
    expect(parseDueDate('2026-10-20T15:00:00+02:00', 'America/New_York')?.toISOString()).toBe(
      '2026-10-20T13:00:00.000Z'
    );
    expect(parseDueDate('next friday', 'UTC')).toBeNull();
  });
});

describe('calendar helpers', () => {
  it('adds days across a year boundary', () => {
    expect(addDaysToDate({ year: 2026, month: 12, day: 31 }, 1)).toEqual({
      year: 2027,
      month: 1,
      day: 1,
    });
  });

  it('computes the weekday of a local date', () => {
    // 2026-10-19 is a Monday
    expect(weekdayOf({ year: 2026, month: 10, day: 19 })).toBe(1);
  });

  it('parses clock times', () => {
    expect(parseClockTime('09:30')).toBe(570);
    expect(parseClockTime('24:00')).toBeNull();
  });

  it('validates time zones', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
