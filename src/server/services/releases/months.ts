export const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

export interface MonthWindow {
  month: MonthName;
  year: number;
}

/** One-based month number, january → 1. */
export function monthNumber(month: MonthName): number {
  return MONTH_NAMES.indexOf(month) + 1;
}

/** Zero-based lookup, wrapping so that 12 → january. */
export function monthFromIndex(index: number): MonthName {
  return MONTH_NAMES[((index % 12) + 12) % 12];
}

export function parseMonthName(name: string): MonthName | null {
  const lower = name.trim().toLowerCase();
  return MONTH_NAMES.find((m) => m === lower) ?? null;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** "2025-12" for december 2025. */
export function monthPrefix(window: MonthWindow): string {
  return `${window.year}-${pad(monthNumber(window.month))}`;
}

export function isInWindow(date: string, window: MonthWindow): boolean {
  return date.startsWith(`${monthPrefix(window)}-`);
}

export function monthStartDate(window: MonthWindow): string {
  return `${monthPrefix(window)}-01`;
}

export function monthEndDate(window: MonthWindow): string {
  // Day 0 of the following month is the last day of this one.
  const lastDay = new Date(Date.UTC(window.year, monthNumber(window.month), 0)).getUTCDate();
  return `${monthPrefix(window)}-${pad(lastDay)}`;
}

export function displayMonthName(month: MonthName): string {
  return month.charAt(0).toUpperCase() + month.slice(1);
}

/**
 * The current month and the one after it, rolling into the next year from
 * december.
 */
export function getMonthsToScrape(now: Date = new Date()): MonthWindow[] {
  return [0, 1].map((offset) => {
    const index = now.getMonth() + offset;
    return {
      month: monthFromIndex(index),
      year: now.getFullYear() + Math.floor(index / 12),
    };
  });
}
