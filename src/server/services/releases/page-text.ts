import { load } from "cheerio";

const FETCH_HEADERS = {
  "User-Agent": "Mozilla/5.0 (compatible; ReleaseCalendar/1.0)",
  Accept: "text/html,application/xhtml+xml",
};

export async function fetchPage(url: string): Promise<string> {
  const response = await fetch(url, {
    headers: FETCH_HEADERS,
    signal: AbortSignal.timeout(30_000),
    redirect: "follow",
  });
  if (!response.ok) {
    throw new Error(`Failed to fetch ${url}: ${response.status}`);
  }
  return response.text();
}

/**
 * Flatten an HTML document into its non-blank text lines, trimmed.
 *
 * Line breaks come from the markup's own newlines, so elements written on one
 * source line end up on one text line.
 */
export function htmlToLines(html: string): string[] {
  const $ = load(html);
  $("script, style, noscript").remove();
  return textToLines($.root().text());
}

export function textToLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
