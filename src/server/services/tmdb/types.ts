/**
 * Schemas for the TMDB v3 responses this project reads. Only the fields in
 * use are declared; zod drops the rest.
 *
 * @see https://developer.themoviedb.org/reference/discover-movie
 * @see https://developer.themoviedb.org/reference/search-movie
 */
import { z } from "zod";

export const tmdbMovieSchema = z.object({
  id: z.number().int(),
  title: z.string().default(""),
  release_date: z.string().default(""),
  overview: z.string().default(""),
  poster_path: z.string().nullable().default(null),
  popularity: z.number().default(0),
  vote_count: z.number().default(0),
});

export const tmdbPagedMoviesSchema = z.object({
  page: z.number().int(),
  total_pages: z.number().int().default(1),
  results: z.array(tmdbMovieSchema).default([]),
});

export type TmdbMovie = z.infer<typeof tmdbMovieSchema>;
export type TmdbPagedMovies = z.infer<typeof tmdbPagedMoviesSchema>;
