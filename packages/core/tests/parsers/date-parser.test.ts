import { describe, it, expect } from 'vitest';
import { parseDate, formatDisplayDate } from '../../src/parsers/date-parser.js';

/** Create a fixed "today" date for deterministic tests */
function today(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('parseDate', () => {
  const fixed = today(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('  ')).toBeNull();
  });

  it('parses named dates', () => {
    expect(parseDate('today', fixed)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', fixed)).toBe('2026-02-09');
    expect(parseDate('yesterday', fixed)).toBe('2026-02-07');
  });

  it('does not modify the date it is given', () => {
    const now = new Date(2026, 1, 8, 15, 30);
    parseDate('today', now);
    expect(now.getHours()).toBe(15);
  });

  it('parses relative dates', () => {
    expect(parseDate('+3d', fixed)).toBe('2026-02-11');
    expect(parseDate('+2w', fixed)).toBe('2026-02-22');
    expect(parseDate('+1m', fixed)).toBe('2026-03-08');
  });

  it('parses day-of-week names as the next occurrence', () => {
    expect(parseDate('mon', fixed)).toBe('2026-02-09');
    expect(parseDate('friday', fixed)).toBe('2026-02-13');
    expect(parseDate('sunday', fixed)).toBe('2026-02-15');
    expect(parseDate('Wed', fixed)).toBe('2026-02-11');
    expect(parseDate('thurs', fixed)).toBeNull();
  });

  it('parses month+day, rolling past dates into next year', () => {
    expect(parseDate('mar15', fixed)).toBe('2026-03-15');
    expect(parseDate('jan5', fixed)).toBe('2027-01-05');
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  it('parses ISO dates', () => {
    expect(parseDate('2024-01-01', fixed)).toBe('2024-01-01');
    expect(parseDate('2026-02-30', fixed)).toBeNull();
  });

  it('parses ISO dates with a 24-hour time', () => {
    expect(parseDate('2019-12-02 1800', fixed)).toBe('2019-12-02 18:00');
    expect(parseDate('2019-12-02 09:05', fixed)).toBe('2019-12-02 09:05');
    expect(parseDate('2019-12-02 2500', fixed)).toBeNull();
  });

  it('returns null for offsets past the end of the calendar', () => {
    expect(parseDate('+99999999999d', fixed)).toBeNull();
  });

  it('returns null for free text', () => {
    expect(parseDate('Sunday 2pm', fixed)).toBeNull();
    expect(parseDate('end of term', fixed)).toBeNull();
  });
});

describe('formatDisplayDate', () => {
  it('formats canonical dates', () => {
    expect(formatDisplayDate('2024-01-01')).toBe('Jan 1, 2024');
    expect(formatDisplayDate('2024-12-25 09:30')).toBe('Dec 25, 2024, 09:30');
  });

  it('leaves other text alone', () => {
    expect(formatDisplayDate('Sunday 2pm')).toBe('Sunday 2pm');
    expect(formatDisplayDate('2024-02-30')).toBe('2024-02-30');
  });

  it('leaves impossible clock times alone', () => {
    expect(formatDisplayDate('2024-01-01 25:00')).toBe('2024-01-01 25:00');
    expect(formatDisplayDate('2024-01-01 23:60')).toBe('2024-01-01 23:60');
    expect(formatDisplayDate('2024-01-01 23:59')).toBe('Jan 1, 2024, 23:59');
  });
});
