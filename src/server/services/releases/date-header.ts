import { monthNumber, parseMonthName } from "./months";

const WEEKDAYS = "monday|tuesday|wednesday|thursday|friday|saturday|sunday";

const HEADER_SHAPE_RE = new RegExp(`^(?:${WEEKDAYS}),\\s+\\w+\\s+\\d+`, "i");
const HEADER_START_RE = new RegExp(`^(?:${WEEKDAYS}),`, "i");
const HEADER_RE = new RegExp(`^(?:${WEEKDAYS}),\\s+([a-z]+)\\s+(\\d{1,2}),\\s+(\\d{4})$`, "i");
const ORDINAL_RE = /(\d+)(?:st|nd|rd|th)/gi;

/**
 * True for lines shaped like "Monday, December 1st, 2025". A line can look
 * like a header and still fail {@link parseDateHeader}.
 */
export function looksLikeDateHeader(line: string): boolean {
  return HEADER_SHAPE_RE.test(line);
}

/** Weaker check used to end a synopsis lookahead: "Weekday," at line start. */
export function startsWithWeekday(line: string): boolean {
  return HEADER_START_RE.test(line);
}

/**
 * Parse "Monday, December 1st, 2025" into "2025-12-01".
 *
 * Returns null when the line is not a header or names a date that does not
 * exist (February 30th). The weekday is not checked against the date.
 */
export function parseDateHeader(line: string): string | null {
  const clean = line.replace(ORDINAL_RE, "$1").trim();
  const match = clean.match(HEADER_RE);
  if (!match) return null;

  const month = parseMonthName(match[1]);
  if (!month) return null;

  return toIsoDate(Number(match[3]), monthNumber(month), Number(match[2]));
}

/**
 * Build a YYYY-MM-DD string, or null if the components do not form a real
 * calendar date.
 */
export function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

const LONG_DATE_RE = /^([a-z]+)\s+(\d{1,2}),\s+(\d{4})$/i;

/** Parse "December 9, 2025" into "2025-12-09". */
export function parseLongDate(text: string): string | null {
  const match = text.trim().match(LONG_DATE_RE);
  if (!match) return null;

  const month = parseMonthName(match[1]);
  if (!month) return null;

  return toIsoDate(Number(match[3]), monthNumber(month), Number(match[2]));
}
