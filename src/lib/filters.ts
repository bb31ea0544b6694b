import { SENTINEL, type CanonicalMovieRecord, type SearchFilters } from "./types";

/**
 * Loose match: the filter year only has to appear inside the record year,
 * so 2020 also keeps "02020". Records without a year are dropped.
 */
export function matchesYear(
  movie: CanonicalMovieRecord,
  year: number | undefined,
): boolean {
  if (!year) return true;
  if (movie.year === SENTINEL) return false;
  return movie.year.includes(String(year));
}

function parseRating(rating: string | number): number | null {
  if (typeof rating === "number") return Number.isNaN(rating) ? null : rating;
  const trimmed = rating.trim();
  if (!trimmed) return null;
  const value = Number(trimmed);
  return Number.isNaN(value) ? null : value;
}

/** Unknown or unparseable ratings pass the threshold. */
export function meetsMinRating(
  movie: CanonicalMovieRecord,
  minRating: number | undefined,
): boolean {
  if (!minRating) return true;
  if (movie.rating === SENTINEL) return true;
  const value = parseRating(movie.rating);
  if (value === null) return true;
  return value >= minRating;
}

export function applyFilters(
  movies: CanonicalMovieRecord[],
  filters?: SearchFilters,
): CanonicalMovieRecord[] {
  if (!filters) return movies;
  return movies.filter(
    (movie) =>
      matchesYear(movie, filters.year) &&
      meetsMinRating(movie, filters.minRating),
  );
}

function parsePositive(value: string | null): number | undefined {
  if (!value?.trim()) return undefined;
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/** Reads `year` and `minRating` query params; malformed values are ignored. */
export function parseFilterParams(
  params: URLSearchParams,
): SearchFilters | undefined {
  const year = parsePositive(params.get("year"));
  const minRating = parsePositive(params.get("minRating"));
  const filters: SearchFilters = {
    ...(year !== undefined && Number.isInteger(year) ? { year } : {}),
    ...(minRating !== undefined ? { minRating } : {}),
  };
  return Object.keys(filters).length > 0 ? filters : undefined;
}
