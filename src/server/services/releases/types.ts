import type { MonthWindow } from "./months";
import type { Platform } from "./platforms";

export type ReleaseKind = "streaming" | "theatrical";

export type TheatricalPlatform = "Wide Release" | "Limited";

export type ReleasePlatform = Platform | TheatricalPlatform;

export interface ReleaseRecord {
  title: string;
  /** ISO calendar date, YYYY-MM-DD */
  date: string;
  platform: ReleasePlatform;
  synopsis: string;
  kind: ReleaseKind;
  tmdbId?: number;
  /** Letterboxd average, 0.0–5.0 */
  rating?: number | null;
  ratingUrl?: string | null;
  poster?: string | null;
}

export type FetchPage = (url: string) => Promise<string>;

export interface SourceAdapter {
  fetch(window: MonthWindow): Promise<ReleaseRecord[]>;
}

export interface RatingResult {
  url: string;
  rating: number | null;
  poster: string | null;
}

export type LookupRating = (title: string, year?: string) => Promise<RatingResult | null>;

export type LookupPoster = (title: string, year?: string) => Promise<string | null>;
