import type { z } from "zod";
import { cached, CacheKey, CacheTTL } from "@/lib/cache";
import { IntervalRateLimiter } from "@/lib/rate-limiter";
import { tmdbPagedMoviesSchema, type TmdbPagedMovies } from "./types";

export const TMDB_IMAGE_BASE = "https://image.tmdb.org/t/p/w154";

const REQUEST_INTERVAL_MS = 250;

export interface DiscoverParams {
  from: string;
  to: string;
  page: number;
}

/**
 * TMDB API client.
 *
 * Typed, rate-limited access to the v3 endpoints used for posters and
 * theatrical discovery. Every response is validated against its schema; a
 * payload that does not match is reported as an error.
 *
 * @see https://developer.themoviedb.org/docs
 */
export class TmdbClient {
  private baseUrl: string = "https://api.themoviedb.org/3";
  private apiKey: string;
  private rateLimiter: IntervalRateLimiter;

  constructor(apiKey: string, rateLimiter: IntervalRateLimiter = new IntervalRateLimiter(REQUEST_INTERVAL_MS)) {
    if (!apiKey) {
      throw new Error("TMDB API key is not configured. Set the TMDB_API_KEY env var.");
    }
    this.apiKey = apiKey;
    this.rateLimiter = rateLimiter;
  }

  // ---------- public API ----------

  /**
   * Search movies by title, optionally narrowed to a release year.
   *
   * @see https://developer.themoviedb.org/reference/search-movie
   */
  async searchMovies(title: string, year?: string): Promise<TmdbPagedMovies> {
    const params: Record<string, string> = { query: title };
    if (year) params.year = year;
    return this.request("/search/movie", params, tmdbPagedMoviesSchema);
  }

  /**
   * US theatrical and limited releases in a date range, most popular first.
   *
   * @see https://developer.themoviedb.org/reference/discover-movie
   */
  async discoverTheatrical({ from, to, page }: DiscoverParams): Promise<TmdbPagedMovies> {
    return this.request(
      "/discover/movie",
      {
        region: "US",
        with_release_type: "2|3",
        "release_date.gte": from,
        "release_date.lte": to,
        sort_by: "popularity.desc",
        page: String(page),
      },
      tmdbPagedMoviesSchema,
    );
  }

  /** Poster of the best search match, or null when there is none. */
  async lookupPoster(title: string, year?: string): Promise<string | null> {
    return cached(
      CacheKey.tmdbPoster(title, year),
      async () => {
        const response = await this.searchMovies(title, year);
        const posterPath = response.results[0]?.poster_path;
        return posterPath ? `${TMDB_IMAGE_BASE}${posterPath}` : null;
      },
      CacheTTL.WEEK,
    );
  }

  // ---------- private ----------

  private async request<T>(
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    await this.rateLimiter.waitForToken();

    const url = new URL(`${this.baseUrl}${path}`);
    url.searchParams.set("api_key", this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url.toString(), {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(10_000),
    });

    if (!response.ok) {
      throw new Error(`TMDB API error: ${response.status} ${response.statusText} — ${path}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`TMDB API returned an unexpected payload for ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
