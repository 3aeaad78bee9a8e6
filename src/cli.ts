import { env } from "@/lib/env";
import { letterboxdClient } from "@/server/services/letterboxd/client";
import {
  CalendarAdapter,
  collectReleases,
  fetchPage,
  PreviewAdapter,
  toArtifact,
  writeArtifact,
} from "@/server/services/releases";
import { TmdbClient } from "@/server/services/tmdb/client";

/**
 * Scrape streaming and theatrical releases for the current and next month
 * and write them to `$OUTPUT_DIR/releases.json`.
 */
async function main(): Promise<void> {
  const sourceOptions = { fetchPage, synopsisMaxLength: env.SYNOPSIS_MAX_LENGTH };
  const tmdb = env.TMDB_API_KEY ? new TmdbClient(env.TMDB_API_KEY) : null;

  const input = await collectReleases({
    sources: {
      preview: new PreviewAdapter(sourceOptions),
      calendar: new CalendarAdapter(sourceOptions),
    },
    lookupRating: (title, year) => letterboxdClient.lookup(title, year),
    lookupPoster: tmdb ? (title, year) => tmdb.lookupPoster(title, year) : undefined,
    theatrical: tmdb ?? undefined,
  });

  const file = await writeArtifact(env.OUTPUT_DIR, toArtifact(input));
  console.log(
    `Saved ${input.releases.length} streaming and ${input.theatrical.length} theatrical releases to ${file}`,
  );
}

main().catch((err: unknown) => {
  console.error("Release scrape failed:", err);
  process.exitCode = 1;
});
