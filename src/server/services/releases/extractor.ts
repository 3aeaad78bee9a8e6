import { looksLikeDateHeader, parseDateHeader, startsWithWeekday } from "./date-header";
import { isInWindow, type MonthWindow } from "./months";
import { classifyPlatform, UNKNOWN_PLATFORM } from "./platforms";
import type { ReleaseRecord } from "./types";

const SYNOPSIS_PREFIX = "Synopsis:";
const SYNOPSIS_LOOKAHEAD = 4;
const RESERVED_TITLES = new Set(["synopsis", "cast"]);
const TITLE_RE = /^(.+?)\s*\([^)]+\)\s*$/;

export interface ExtractOptions {
  /** Drop records dated outside this month instead of emitting them. */
  window?: MonthWindow;
  /** Truncate synopses longer than this, appending "...". */
  synopsisMaxLength?: number;
}

interface ExtractState {
  currentDate: string | null;
  records: ReleaseRecord[];
}

/**
 * Walk the text lines of a release listing page and emit one streaming
 * record per "Title (Platform)" line found under a date header.
 *
 *   Monday, December 1st, 2025
 *   Some Film (Netflix)
 *   Synopsis: A story.
 *
 * The date context lives only for one call; lines before the first valid
 * header never produce records.
 */
export function extractReleases(lines: readonly string[], options: ExtractOptions = {}): ReleaseRecord[] {
  const initial: ExtractState = { currentDate: null, records: [] };

  const final = lines.reduce<ExtractState>((state, line, index) => {
    if (looksLikeDateHeader(line)) {
      const date = parseDateHeader(line);
      return date ? { ...state, currentDate: date } : state;
    }

    if (!state.currentDate) return state;

    const record = extractRecord(lines, index, state.currentDate, options);
    if (!record) return state;
    if (options.window && !isInWindow(record.date, options.window)) return state;

    return { ...state, records: [...state.records, record] };
  }, initial);

  return final.records;
}

function extractRecord(
  lines: readonly string[],
  index: number,
  date: string,
  options: ExtractOptions,
): ReleaseRecord | null {
  const line = lines[index];
  const platform = classifyPlatform(line);
  if (platform === UNKNOWN_PLATFORM) return null;

  const title = extractTitle(line);
  if (!title) return null;

  return {
    title,
    date,
    platform,
    synopsis: findSynopsis(lines, index, options.synopsisMaxLength),
    kind: "streaming",
  };
}

/**
 * Title is the text before the trailing "(...)" group, minus any enclosing
 * square brackets. Returns null for structural noise.
 */
export function extractTitle(line: string): string | null {
  const match = line.match(TITLE_RE);
  if (!match) return null;

  const title = match[1].trim().replace(/^\[|\]$/g, "");
  if (title.length < 2 || RESERVED_TITLES.has(title.toLowerCase())) return null;

  return isAllUpperCase(title) ? toTitleCase(title) : title;
}

function findSynopsis(lines: readonly string[], index: number, maxLength?: number): string {
  const end = Math.min(index + 1 + SYNOPSIS_LOOKAHEAD, lines.length);

  for (let j = index + 1; j < end; j++) {
    const candidate = lines[j];
    if (candidate.startsWith(SYNOPSIS_PREFIX)) {
      return truncateSynopsis(candidate.slice(SYNOPSIS_PREFIX.length).trim(), maxLength);
    }
    if (startsWithWeekday(candidate)) break;
  }

  return "";
}

export function truncateSynopsis(text: string, maxLength?: number): string {
  if (maxLength === undefined || text.length <= maxLength) return text;
  return `${text.slice(0, maxLength).trimEnd()}...`;
}

/** Has at least one cased letter and none of them lower-case. */
export function isAllUpperCase(text: string): boolean {
  return text !== text.toLowerCase() && text === text.toUpperCase();
}

/** "THE LONG WALK" → "The Long Walk" */
export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[\s\-(])(\p{L})/gu, (_, boundary: string, letter: string) => boundary + letter.toUpperCase());
}
