import { extractReleases } from "./extractor";
import type { MonthWindow } from "./months";
import { htmlToLines } from "./page-text";
import { previewUrl } from "./sources";
import type { FetchPage, ReleaseRecord, SourceAdapter } from "./types";

export interface PreviewAdapterOptions {
  fetchPage: FetchPage;
  synopsisMaxLength?: number;
}

/**
 * Monthly preview article: releases grouped under "Weekday, Month D, YYYY"
 * headers. An unpublished preview redirects to the homepage, which carries no
 * "Synopsis:" text; that case yields no releases.
 */
export class PreviewAdapter implements SourceAdapter {
  constructor(private readonly options: PreviewAdapterOptions) {}

  async fetch(window: MonthWindow): Promise<ReleaseRecord[]> {
    const url = previewUrl(window);
    console.log(`[PreviewAdapter] Fetching ${url}`);

    let html: string;
    try {
      html = await this.options.fetchPage(url);
    } catch (err) {
      console.warn(`[PreviewAdapter] Preview unavailable for ${url}:`, err);
      return [];
    }

    if (!html.includes("Synopsis:")) {
      console.warn(`[PreviewAdapter] ${url} has no release data`);
      return [];
    }

    const releases = extractReleases(htmlToLines(html), {
      window,
      synopsisMaxLength: this.options.synopsisMaxLength,
    });

    console.log(`[PreviewAdapter] ${url}: ${releases.length} releases`);
    return releases;
  }
}
