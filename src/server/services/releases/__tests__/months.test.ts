import { describe, it, expect } from 'vitest';
import {
  displayMonthName,
  getMonthsToScrape,
  isInWindow,
  monthEndDate,
  monthFromIndex,
  monthNumber,
  monthPrefix,
  monthStartDate,
  parseMonthName,
} from '../months';

describe('month helpers', () => {
  it('converts between names and numbers', () => {
    expect(monthNumber('january')).toBe(1);
    expect(monthNumber('december')).toBe(12);
    expect(monthFromIndex(0)).toBe('january');
    expect(monthFromIndex(12)).toBe('january');
    expect(monthFromIndex(-1)).toBe('december');
  });

  it('parses month names loosely', () => {
    expect(parseMonthName(' March ')).toBe('march');
    expect(parseMonthName('Marzo')).toBeNull();
  });

  it('formats display names', () => {
    expect(displayMonthName('september')).toBe('September');
  });
});

describe('month windows', () => {
  const december = { month: 'december', year: 2025 } as const;

  it('builds the date prefix and bounds', () => {
    expect(monthPrefix(december)).toBe('2025-12');
    expect(monthStartDate(december)).toBe('2025-12-01');
    expect(monthEndDate(december)).toBe('2025-12-31');
  });

  it('uses the real last day of the month', () => {
    expect(monthEndDate({ month: 'february', year: 2024 })).toBe('2024-02-29');
    expect(monthEndDate({ month: 'february', year: 2026 })).toBe('2026-02-28');
    expect(monthEndDate({ month: 'april', year: 2026 })).toBe('2026-04-30');
  });

  it('checks whether a date falls inside the window', () => {
    expect(isInWindow('2025-12-31', december)).toBe(true);
    expect(isInWindow('2026-01-01', december)).toBe(false);
    expect(isInWindow('2024-12-15', december)).toBe(false);
  });
});

describe('getMonthsToScrape', () => {
  it('returns the current and next month', () => {
    expect(getMonthsToScrape(new Date(2026, 5, 10))).toEqual([
      { month: 'june', year: 2026 },
      { month: 'july', year: 2026 },
    ]);
  });

  it('rolls over into the next year from december', () => {
    expect(getMonthsToScrape(new Date(2025, 11, 15))).toEqual([
      { month: 'december', year: 2025 },
      { month: 'january', year: 2026 },
    ]);
  });
});
