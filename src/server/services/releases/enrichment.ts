import type { LookupPoster, LookupRating, ReleaseRecord } from "./types";

export interface EnrichmentLookups {
  lookupRating: LookupRating;
  /** Omitted for theatrical releases, which already carry a TMDB poster. */
  lookupPoster?: LookupPoster;
}

/**
 * Attach Letterboxd ratings (and optionally posters) to releases.
 *
 * Enrichment is best-effort — a failed lookup leaves the field null and never
 * drops the release. Processes sequentially to respect the services' rate
 * limits.
 */
export async function enrichReleases(
  releases: ReleaseRecord[],
  lookups: EnrichmentLookups,
): Promise<ReleaseRecord[]> {
  const enriched: ReleaseRecord[] = [];

  for (const [i, release] of releases.entries()) {
    enriched.push(await enrichSingle(release, lookups));

    if ((i + 1) % 10 === 0) {
      console.log(`[Enrichment] [${i + 1}/${releases.length} complete]`);
    }
  }

  return enriched;
}

async function enrichSingle(
  release: ReleaseRecord,
  { lookupRating, lookupPoster }: EnrichmentLookups,
): Promise<ReleaseRecord> {
  const year = release.date.slice(0, 4) || undefined;
  let rating: number | null = null;
  let ratingUrl: string | null = null;
  let poster = release.poster ?? null;

  try {
    const result = await lookupRating(release.title, year);
    if (result) {
      rating = result.rating;
      ratingUrl = result.url;
    }
  } catch (err) {
    console.warn(`[Enrichment] Rating lookup failed for ${release.title}:`, err);
  }

  if (lookupPoster) {
    try {
      poster = await lookupPoster(release.title, year);
    } catch (err) {
      console.warn(`[Enrichment] Poster lookup failed for ${release.title}:`, err);
      poster = null;
    }
  }

  console.log(
    `[Enrichment] ${release.title}: ${rating ?? "no rating"}, ${poster ? "poster" : "no poster"}`,
  );

  return { ...release, rating, ratingUrl, poster };
}
