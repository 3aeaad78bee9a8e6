/**
 * Minimum-interval rate limiter.
 *
 * Tracks the timestamp of the last request and ensures at least
 * `minIntervalMs` have elapsed before allowing the next one. Neither TMDB nor
 * Letterboxd publish a burst allowance we rely on, so a fixed spacing is
 * enough for a single sequential scraper run.
 */
export class IntervalRateLimiter {
  private lastRequestTime: number = 0;
  private minIntervalMs: number;

  constructor(minIntervalMs: number) {
    this.minIntervalMs = minIntervalMs;
  }

  /**
   * Wait until enough time has elapsed since the last request, then mark the
   * current timestamp. Resolves immediately if the interval already passed.
   */
  async waitForToken(): Promise<void> {
    const now = Date.now();
    const elapsed = now - this.lastRequestTime;
    const remaining = this.minIntervalMs - elapsed;

    if (remaining > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, remaining));
    }

    this.lastRequestTime = Date.now();
  }
}
