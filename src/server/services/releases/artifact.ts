import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { displayMonthName, type MonthWindow } from "./months";
import type { ReleaseRecord } from "./types";

export const ARTIFACT_FILE = "releases.json";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const streamingEntrySchema = z.object({
  title: z.string().min(1),
  date: isoDate,
  platform: z.string().min(1),
  synopsis: z.string(),
  type: z.literal("streaming"),
  letterboxd_rating: z.number().min(0).max(5).nullable(),
  letterboxd_url: z.string().nullable(),
  poster: z.string().nullable(),
});

const theatricalEntrySchema = z.object({
  title: z.string().min(1),
  date: isoDate,
  platform: z.string().min(1),
  synopsis: z.string(),
  type: z.literal("theatrical"),
  poster: z.string().nullable(),
  tmdb_id: z.number().int().nullable(),
  letterboxd_rating: z.number().min(0).max(5).nullable(),
  letterboxd_url: z.string().nullable(),
});

export const artifactSchema = z.object({
  last_updated: z.string().datetime(),
  months: z.array(z.object({ name: z.string(), year: z.number().int() })),
  releases: z.array(streamingEntrySchema),
  theatrical: z.array(theatricalEntrySchema),
});

export type ReleaseArtifact = z.infer<typeof artifactSchema>;
export type StreamingEntry = z.infer<typeof streamingEntrySchema>;
export type TheatricalEntry = z.infer<typeof theatricalEntrySchema>;

export interface ArtifactInput {
  lastUpdated: Date;
  months: MonthWindow[];
  releases: ReleaseRecord[];
  theatrical: ReleaseRecord[];
}

export function toStreamingEntry(release: ReleaseRecord): StreamingEntry {
  return {
    title: release.title,
    date: release.date,
    platform: release.platform,
    synopsis: release.synopsis,
    type: "streaming",
    letterboxd_rating: release.rating ?? null,
    letterboxd_url: release.ratingUrl ?? null,
    poster: release.poster ?? null,
  };
}

export function toTheatricalEntry(release: ReleaseRecord): TheatricalEntry {
  return {
    title: release.title,
    date: release.date,
    platform: release.platform,
    synopsis: release.synopsis,
    type: "theatrical",
    poster: release.poster ?? null,
    tmdb_id: release.tmdbId ?? null,
    letterboxd_rating: release.rating ?? null,
    letterboxd_url: release.ratingUrl ?? null,
  };
}

export function toArtifact(input: ArtifactInput): ReleaseArtifact {
  return artifactSchema.parse({
    last_updated: input.lastUpdated.toISOString(),
    months: input.months.map((m) => ({ name: displayMonthName(m.month), year: m.year })),
    releases: input.releases.map(toStreamingEntry),
    theatrical: input.theatrical.map(toTheatricalEntry),
  });
}

/** Write the artifact as indented JSON, returning the file path. */
export async function writeArtifact(outputDir: string, artifact: ReleaseArtifact): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const file = path.join(outputDir, ARTIFACT_FILE);
  await writeFile(file, `${JSON.stringify(artifact, null, 2)}\n`, "utf8");
  return file;
}
