import { isPlaceholderPlatform } from "./platforms";
import type { ReleaseRecord } from "./types";

export function streamingKey(release: ReleaseRecord): string {
  return release.title.toLowerCase();
}

export function theatricalKey(release: ReleaseRecord): string {
  return `${release.title.toLowerCase()}::${release.date}`;
}

/**
 * Decide whether a later sighting of the same streaming title should
 * replace the stored one.
 *
 * - a placeholder platform (VOD/Digital, Unknown) gives way to a specific one
 * - between two specific platforms, the later date wins
 * - everything else keeps the first sighting
 */
function shouldReplace(existing: ReleaseRecord, incoming: ReleaseRecord): boolean {
  const existingIsPlaceholder = isPlaceholderPlatform(existing.platform);
  const incomingIsPlaceholder = isPlaceholderPlatform(incoming.platform);

  if (existingIsPlaceholder && !incomingIsPlaceholder) return true;
  if (!existingIsPlaceholder && !incomingIsPlaceholder) return incoming.date > existing.date;
  return false;
}

/**
 * Merge streaming candidates from several extraction passes, in source order,
 * into one list keyed by title and sorted by date.
 */
export function reconcileStreaming(...sources: ReleaseRecord[][]): ReleaseRecord[] {
  const seen = new Map<string, ReleaseRecord>();

  for (const release of sources.flat()) {
    const key = streamingKey(release);
    const existing = seen.get(key);
    if (!existing || shouldReplace(existing, release)) {
      // Map.set on an existing key keeps its insertion slot.
      seen.set(key, release);
    }
  }

  return sortByDate([...seen.values()]);
}

/**
 * Theatrical releases carry no placeholder distinction: first sighting of a
 * (title, date) pair wins.
 */
export function reconcileTheatrical(...sources: ReleaseRecord[][]): ReleaseRecord[] {
  const seen = new Set<string>();
  const unique: ReleaseRecord[] = [];

  for (const release of sources.flat()) {
    const key = theatricalKey(release);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(release);
  }

  return sortByDate(unique);
}

/** Stable ascending sort; equal dates keep encounter order. */
function sortByDate(releases: ReleaseRecord[]): ReleaseRecord[] {
  return [...releases].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
