import { Redis } from "@upstash/redis";
import { env } from "./env";

// Lazy Redis connection - returns null if not configured
let _redis: Redis | null | undefined;
function getRedis(): Redis | null {
  if (_redis === undefined) {
    const url = env.UPSTASH_REDIS_REST_URL;
    const token = env.UPSTASH_REDIS_REST_TOKEN;
    if (url && token) {
      _redis = new Redis({ url, token });
    } else {
      _redis = null;
    }
  }
  return _redis;
}

// TTL presets in seconds
export const CacheTTL = {
  MEDIUM: 60 * 60,         // 1 hour
  LONG: 60 * 60 * 24,      // 24 hours - ratings move slowly
  WEEK: 60 * 60 * 24 * 7,  // 7 days - posters
} as const;

/**
 * Cache-aside wrapper. Checks Redis first, falls back to fetcher function.
 * Degrades to no caching if Redis is unconfigured or unreachable.
 */
export async function cached<T>(
  key: string,
  fetcher: () => Promise<T>,
  ttl: number = CacheTTL.MEDIUM,
): Promise<T> {
  const redis = getRedis();

  if (redis) {
    try {
      const hit = await redis.get<T>(key);
      if (hit !== null && hit !== undefined) {
        return hit;
      }
    } catch (err) {
      console.warn(`[Cache] Read failed for ${key}:`, err);
    }
  }

  const result = await fetcher();

  if (redis && result !== null && result !== undefined) {
    try {
      await redis.set(key, JSON.stringify(result), { ex: ttl });
    } catch (err) {
      console.warn(`[Cache] Write failed for ${key}:`, err);
    }
  }

  return result;
}

// Cache key builders for consistent naming
export const CacheKey = {
  letterboxdFilm: (slug: string, year?: string) =>
    year ? `letterboxd:film:${slug}:${year}` : `letterboxd:film:${slug}`,
  tmdbPoster: (title: string, year?: string) =>
    `tmdb:poster:${title.toLowerCase()}:${year ?? "any"}`,
} as const;
