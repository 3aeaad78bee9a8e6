/**
 * Page locations on whentostream.com for a given month.
 *
 * The preview article lists the month's releases as text blocks under date
 * headers; the calendar page links to one detail page per film.
 */
import type { MonthWindow } from "./months";

export const SITE_HOST = "whentostream.com";

export function previewUrl(window: MonthWindow): string {
  return `https://${SITE_HOST}/when-to-streams-${window.month}-${window.year}-preview/`;
}

export function calendarUrl(window: MonthWindow): string {
  return `https://${SITE_HOST}/streaming-${window.month}-${window.year}/`;
}
