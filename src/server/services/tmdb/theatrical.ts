import {
  monthEndDate,
  monthStartDate,
  type MonthWindow,
} from "@/server/services/releases/months";
import type { ReleaseRecord, TheatricalPlatform } from "@/server/services/releases/types";
import { TMDB_IMAGE_BASE, type DiscoverParams } from "./client";
import type { TmdbMovie, TmdbPagedMovies } from "./types";

const MAX_PAGES = 3;
const MIN_TITLE_LENGTH = 2;
/** Older films with this many votes are back in cinemas, not new. */
const RE_RELEASE_VOTE_COUNT = 1000;
/** TMDB popularity above which a release is treated as wide. */
const WIDE_RELEASE_POPULARITY = 8;

export interface TheatricalSource {
  discoverTheatrical(params: DiscoverParams): Promise<TmdbPagedMovies>;
}

export function theatricalPlatform(popularity: number): TheatricalPlatform {
  return popularity > WIDE_RELEASE_POPULARITY ? "Wide Release" : "Limited";
}

/**
 * Map one discover result onto a theatrical record, or null if it should be
 * skipped: untitled, undated, released before `minYear`, or a re-release.
 */
export function toTheatricalRecord(movie: TmdbMovie, minYear: number): ReleaseRecord | null {
  const title = movie.title.trim();
  if (title.length < MIN_TITLE_LENGTH) {
    console.log(`[Theatrical] Skipping untitled movie: ${movie.id}`);
    return null;
  }

  if (!movie.release_date) return null;

  const year = Number.parseInt(movie.release_date.slice(0, 4), 10);
  if (!Number.isFinite(year) || year < minYear) {
    console.log(`[Theatrical] Skipping old movie: ${movie.title} (${movie.release_date})`);
    return null;
  }

  if (movie.vote_count > RE_RELEASE_VOTE_COUNT) {
    console.log(`[Theatrical] Skipping likely re-release: ${movie.title} (votes: ${movie.vote_count})`);
    return null;
  }

  return {
    title,
    date: movie.release_date,
    platform: theatricalPlatform(movie.popularity),
    synopsis: movie.overview,
    kind: "theatrical",
    tmdbId: movie.id,
    poster: movie.poster_path ? `${TMDB_IMAGE_BASE}${movie.poster_path}` : null,
    rating: null,
    ratingUrl: null,
  };
}

/**
 * Theatrical releases opening during the window, up to three pages of the
 * most popular. A failed page ends the scan with what was collected so far.
 *
 * TMDB filters on the US release date but reports the film's first release
 * date, so festival titles from before `minYear` are dropped here.
 */
export async function getTheatricalReleases(
  source: TheatricalSource,
  window: MonthWindow,
  minYear: number = window.year,
): Promise<ReleaseRecord[]> {
  const from = monthStartDate(window);
  const to = monthEndDate(window);
  const releases: ReleaseRecord[] = [];

  for (let page = 1; page <= MAX_PAGES; page++) {
    let response: TmdbPagedMovies;
    try {
      response = await source.discoverTheatrical({ from, to, page });
    } catch (err) {
      console.error(`[Theatrical] Error fetching TMDB page ${page}:`, err);
      break;
    }

    for (const movie of response.results) {
      const record = toTheatricalRecord(movie, minYear);
      if (record) releases.push(record);
    }

    if (page >= response.total_pages) break;
  }

  return releases;
}
