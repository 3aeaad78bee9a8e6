import { load } from "cheerio";
import { cached, CacheKey, CacheTTL } from "@/lib/cache";
import { IntervalRateLimiter } from "@/lib/rate-limiter";
import { titleToSlug } from "@/server/services/releases/slug";
import type { FetchPage, RatingResult } from "@/server/services/releases/types";

const BASE_URL = "https://letterboxd.com/film";
const REQUEST_INTERVAL_MS = 300;

const HEADERS = {
  "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36",
};

const RATING_RE = /([\d.]+)\s*out of/;

/**
 * Read the average rating and poster from a Letterboxd film page.
 *
 * The rating sits in `<meta name="twitter:data2" content="3.45 out of 5">`.
 */
export function parseFilmPage(html: string, url: string): RatingResult {
  const $ = load(html);
  const result: RatingResult = { url, rating: null, poster: null };

  const ratingText = $('meta[name="twitter:data2"]').attr("content") ?? "";
  const ratingMatch = ratingText.match(RATING_RE);
  if (ratingMatch) {
    const rating = Number.parseFloat(ratingMatch[1]);
    if (Number.isFinite(rating)) result.rating = rating;
  }

  const ogImage = $('meta[property="og:image"]').attr("content") ?? "";
  if (ogImage && ogImage.includes("letterboxd")) {
    result.poster = ogImage;
  }

  if (!result.poster) {
    result.poster = $("img.image").first().attr("src") || null;
  }

  return result;
}

async function fetchFilmPage(url: string): Promise<string> {
  const response = await fetch(url, {
    headers: HEADERS,
    signal: AbortSignal.timeout(10_000),
  });
  if (!response.ok) {
    throw new Error(`Letterboxd returned ${response.status} for ${url}`);
  }
  return response.text();
}

/**
 * Letterboxd rating lookup by film title.
 *
 * Letterboxd has no public API, so this reads the film page at the title's
 * slug. Titles that share a name with an older film live at `{slug}-{year}`,
 * which is tried first when the year is known.
 */
export class LetterboxdClient {
  private rateLimiter: IntervalRateLimiter;
  private fetchPage: FetchPage;

  constructor(
    rateLimiter: IntervalRateLimiter = new IntervalRateLimiter(REQUEST_INTERVAL_MS),
    fetchPage: FetchPage = fetchFilmPage,
  ) {
    this.rateLimiter = rateLimiter;
    this.fetchPage = fetchPage;
  }

  async lookup(title: string, year?: string): Promise<RatingResult | null> {
    const slug = titleToSlug(title);
    if (!slug) return null;

    return cached(
      CacheKey.letterboxdFilm(slug, year),
      () => this.lookupUncached(slug, year),
      CacheTTL.LONG,
    );
  }

  private async lookupUncached(slug: string, year?: string): Promise<RatingResult | null> {
    const urls = [`${BASE_URL}/${slug}/`];
    if (year) urls.unshift(`${BASE_URL}/${slug}-${year}/`);

    for (const url of urls) {
      await this.rateLimiter.waitForToken();

      let html: string;
      try {
        html = await this.fetchPage(url);
      } catch (err) {
        console.warn(`[Letterboxd] ${url}: ${err instanceof Error ? err.message : String(err)}`);
        continue;
      }

      const result = parseFilmPage(html, url);
      if (result.rating !== null || result.poster !== null) return result;
    }

    return null;
  }
}

/** Singleton client shared by the enrichment pass. */
export const letterboxdClient = new LetterboxdClient();
