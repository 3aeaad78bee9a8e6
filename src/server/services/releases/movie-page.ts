import { load } from "cheerio";
import { parseLongDate } from "./date-header";
import { toTitleCase } from "./extractor";
import { isPlaceholderPlatform, normalizePlatformName, type Platform } from "./platforms";
import { SITE_HOST } from "./sources";

export interface MoviePageInfo {
  date?: string;
  platform?: Platform;
  synopsis?: string;
}

const SVOD_RE = /SVOD Release Date:\s*(\w+ \d+, \d+)\s*\(([^)]+)\)/;
const VOD_RE = /VOD Release Date:\s*(\w+ \d+, \d+)/;

/**
 * Read release details from the text lines of a single film page.
 *
 * "SVOD Release Date: January 9, 2026 (Netflix)" takes precedence over a
 * plain "VOD Release Date:"; a "Distributor" line upgrades a VOD/Digital or
 * unrecognized platform to the distributor's own service.
 */
export function parseMoviePage(lines: readonly string[]): MoviePageInfo {
  const info: MoviePageInfo = {};
  let distributor: Platform | undefined;

  for (const line of lines) {
    if (!info.date && line.includes("SVOD Release Date:")) {
      const match = line.match(SVOD_RE);
      const date = match ? parseLongDate(match[1]) : null;
      if (match && date) {
        info.date = date;
        info.platform = normalizePlatformName(match[2]);
      }
    }

    // "SVOD Release Date:" also contains this marker; it only applies when
    // the SVOD form did not yield a date.
    if (!info.date && line.includes("VOD Release Date:")) {
      const match = line.match(VOD_RE);
      const date = match ? parseLongDate(match[1]) : null;
      if (date) {
        info.date = date;
        info.platform = "VOD/Digital";
      }
    }

    if (line.includes("Distributor")) {
      distributor = distributorPlatform(line) ?? distributor;
    }

    if (line.includes("Synopsis:")) {
      info.synopsis = line.replaceAll("Synopsis:", "").trim();
    }
  }

  if (info.platform && isPlaceholderPlatform(info.platform) && distributor) {
    info.platform = distributor;
  }

  return info;
}

function distributorPlatform(line: string): Platform | undefined {
  if (line.includes("MUBI")) return "MUBI";
  if (line.includes("Netflix")) return "Netflix";
  if (line.includes("Hulu")) return "Hulu";
  if (line.includes("Amazon") || line.includes("Prime")) return "Prime Video";
  if (line.includes("HBO") || line.includes("Max")) return "HBO Max";
  return undefined;
}

/**
 * Film detail links on a monthly calendar page: on-site, carrying the year
 * in the path, and not another calendar or theaters listing.
 */
export function extractMovieLinks(html: string, year: number): string[] {
  const $ = load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href") ?? "";
    if (
      href.includes(`-${year}/`) &&
      href.includes(SITE_HOST) &&
      !href.includes("streaming-") &&
      !href.includes("theaters-") &&
      !seen.has(href)
    ) {
      seen.add(href);
      links.push(href);
    }
  });

  return links;
}

/** "https://whentostream.com/the-long-walk-2025/" → "The Long Walk" */
export function titleFromMovieUrl(url: string): string {
  const segment = url.split("/").filter(Boolean).pop() ?? "";
  return toTitleCase(segment.replace(/-\d{4}$/, "").replace(/-/g, " "));
}
