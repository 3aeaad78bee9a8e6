/**
 * Convert a film title into a Letterboxd URL slug.
 *
 * "The Movie: Part Two! (2025)" → "the-movie-part-two"
 */
export function titleToSlug(title: string): string {
  return title
    .replace(/\s*\(\d{4}\)\s*$/, "")
    .toLowerCase()
    .replace(/[:'"!?,.]/g, "")
    .replace(/[–—]/g, "-")
    .replace(/\s+/g, "-")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");
}
