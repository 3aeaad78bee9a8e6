export type {
  FetchPage,
  LookupPoster,
  LookupRating,
  RatingResult,
  ReleaseKind,
  ReleasePlatform,
  ReleaseRecord,
  SourceAdapter,
  TheatricalPlatform,
} from "./types";
export type { MonthName, MonthWindow } from "./months";
export type { Platform, StreamingPlatform } from "./platforms";
export { classifyPlatform, isPlaceholderPlatform, normalizePlatformName, UNKNOWN_PLATFORM } from "./platforms";
export { looksLikeDateHeader, parseDateHeader } from "./date-header";
export { extractReleases } from "./extractor";
export { reconcileStreaming, reconcileTheatrical } from "./reconciler";
export { titleToSlug } from "./slug";
export { getMonthsToScrape, isInWindow, monthFromIndex, monthNumber } from "./months";
export { fetchPage, htmlToLines } from "./page-text";
export { PreviewAdapter } from "./preview-adapter";
export { CalendarAdapter } from "./calendar-adapter";
export { enrichReleases } from "./enrichment";
export { toArtifact, writeArtifact } from "./artifact";
export { collectReleases, scrapeStreamingMonth } from "./fetcher";
