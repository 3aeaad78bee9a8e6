import { IntervalRateLimiter } from "@/lib/rate-limiter";
import { truncateSynopsis } from "./extractor";
import { isInWindow, type MonthWindow } from "./months";
import { extractMovieLinks, parseMoviePage, titleFromMovieUrl } from "./movie-page";
import { htmlToLines } from "./page-text";
import { calendarUrl } from "./sources";
import type { FetchPage, ReleaseRecord, SourceAdapter } from "./types";

const MOVIE_PAGE_INTERVAL_MS = 300;

export interface CalendarAdapterOptions {
  fetchPage: FetchPage;
  synopsisMaxLength?: number;
  rateLimiter?: IntervalRateLimiter;
}

/**
 * Calendar-page collector.
 *
 * Fetches the month's calendar page, collects film detail links, then reads
 * each film page for its streaming date and platform. Picks up films added
 * after the preview article was written.
 */
export class CalendarAdapter implements SourceAdapter {
  private readonly rateLimiter: IntervalRateLimiter;

  constructor(private readonly options: CalendarAdapterOptions) {
    this.rateLimiter = options.rateLimiter ?? new IntervalRateLimiter(MOVIE_PAGE_INTERVAL_MS);
  }

  async fetch(window: MonthWindow): Promise<ReleaseRecord[]> {
    const url = calendarUrl(window);
    console.log(`[CalendarAdapter] Fetching ${url}`);

    let html: string;
    try {
      html = await this.options.fetchPage(url);
    } catch (err) {
      console.error(`[CalendarAdapter] Failed to fetch calendar page ${url}:`, err);
      return [];
    }

    const links = extractMovieLinks(html, window.year);
    console.log(`[CalendarAdapter] ${links.length} movie links on ${url}`);

    const releases: ReleaseRecord[] = [];

    // Sequential: one film page at a time through the rate limiter.
    for (const movieUrl of links) {
      const release = await this.fetchMovie(movieUrl, window);
      if (release) releases.push(release);
    }

    return releases;
  }

  private async fetchMovie(movieUrl: string, window: MonthWindow): Promise<ReleaseRecord | null> {
    const title = titleFromMovieUrl(movieUrl);
    if (title.length < 2) return null;

    await this.rateLimiter.waitForToken();

    let html: string;
    try {
      html = await this.options.fetchPage(movieUrl);
    } catch (err) {
      console.error(`[CalendarAdapter] Failed to fetch ${movieUrl}:`, err);
      return null;
    }

    const info = parseMoviePage(htmlToLines(html));
    if (!info.date || !info.platform) return null;

    if (!isInWindow(info.date, window)) {
      console.log(`[CalendarAdapter] Skipping ${title}: ${info.date} is outside ${window.month} ${window.year}`);
      return null;
    }

    return {
      title,
      date: info.date,
      platform: info.platform,
      synopsis: truncateSynopsis(info.synopsis ?? "", this.options.synopsisMaxLength),
      kind: "streaming",
    };
  }
}
