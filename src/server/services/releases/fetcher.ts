import { getTheatricalReleases, type TheatricalSource } from "@/server/services/tmdb/theatrical";
import type { ArtifactInput } from "./artifact";
import { enrichReleases } from "./enrichment";
import { displayMonthName, getMonthsToScrape, type MonthWindow } from "./months";
import { reconcileStreaming, reconcileTheatrical } from "./reconciler";
import type { LookupPoster, LookupRating, ReleaseRecord, SourceAdapter } from "./types";

export interface MonthSources {
  preview: SourceAdapter;
  calendar: SourceAdapter;
}

export interface PipelineDeps {
  sources: MonthSources;
  lookupRating: LookupRating;
  /** Without TMDB credentials there are no posters. */
  lookupPoster?: LookupPoster;
  /** Without TMDB credentials there is no theatrical list. */
  theatrical?: TheatricalSource;
  now?: Date;
}

function label(window: MonthWindow): string {
  return `${displayMonthName(window.month)} ${window.year}`;
}

/**
 * Candidate streaming releases for one month: the preview article first, then
 * the calendar page for titles added since. Duplicates are left for the
 * reconciler.
 */
export async function scrapeStreamingMonth(
  window: MonthWindow,
  sources: MonthSources,
): Promise<ReleaseRecord[]> {
  const preview = await sources.preview.fetch(window);
  if (preview.length === 0) {
    console.log(`[Fetcher] No preview releases for ${label(window)}, using calendar page only`);
  }

  const calendar = await sources.calendar.fetch(window);
  return [...preview, ...calendar];
}

/**
 * Run every pass for the current and next month and return the reconciled,
 * enriched release lists ready to serialize.
 */
export async function collectReleases(deps: PipelineDeps): Promise<ArtifactInput> {
  const now = deps.now ?? new Date();
  const months = getMonthsToScrape(now);

  // 1. Streaming candidates, one list per month, in month order
  const candidates: ReleaseRecord[][] = [];
  for (const window of months) {
    try {
      const releases = await scrapeStreamingMonth(window, deps.sources);
      console.log(`[Fetcher] Found ${releases.length} streaming releases for ${label(window)}`);
      candidates.push(releases);
    } catch (err) {
      console.error(`[Fetcher] Failed to scrape ${label(window)}:`, err);
    }
  }

  const streaming = reconcileStreaming(...candidates);

  console.log("[Fetcher] Fetching Letterboxd ratings and TMDB posters...");
  const releases = await enrichReleases(streaming, {
    lookupRating: deps.lookupRating,
    lookupPoster: deps.lookupPoster,
  });

  // 2. Theatrical releases from TMDB
  let theatrical: ReleaseRecord[] = [];
  if (deps.theatrical) {
    const theatricalCandidates: ReleaseRecord[][] = [];
    for (const window of months) {
      const found = await getTheatricalReleases(deps.theatrical, window, months[0].year);
      console.log(`[Fetcher] Found ${found.length} theatrical releases for ${label(window)}`);
      theatricalCandidates.push(found);
    }

    console.log("[Fetcher] Fetching Letterboxd ratings for theatrical releases...");
    theatrical = await enrichReleases(reconcileTheatrical(...theatricalCandidates), {
      lookupRating: deps.lookupRating,
    });
  } else {
    console.warn("[Fetcher] TMDB is not configured, skipping theatrical releases");
  }

  return { lastUpdated: now, months, releases, theatrical };
}
