function optional(key: string, fallback: string = ""): string {
  return process.env[key]?.trim() || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const raw = optional(key);
  if (!raw) return fallback;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export const env = {
  TMDB_API_KEY: optional("TMDB_API_KEY"),
  OUTPUT_DIR: optional("OUTPUT_DIR", "data"),
  SYNOPSIS_MAX_LENGTH: optionalInt("SYNOPSIS_MAX_LENGTH", 500),
  UPSTASH_REDIS_REST_URL: optional("UPSTASH_REDIS_REST_URL"),
  UPSTASH_REDIS_REST_TOKEN: optional("UPSTASH_REDIS_REST_TOKEN"),
} as const;
