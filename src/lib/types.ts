export type ProviderName = "TMDB" | "OMDb";

export const PROVIDERS: readonly ProviderName[] = ["TMDB", "OMDb"];

/** Placeholder for any field the provider did not return. */
export const SENTINEL = "N/A";

export const SUMMARY_FALLBACK = "Summary not available";

export type CanonicalMovieRecord = Readonly<{
  id: string | number; // TMDB numeric id, OMDb imdbID
  title: string;
  year: string; // "YYYY" or SENTINEL
  summary: string;
  posterUrl?: string;
  rating: string | number; // provider scale, not normalized
  director: string;
  sourceProvider: ProviderName;
}>;

export type SearchFilters = {
  year?: number;
  minRating?: number;
};

export type SearchIssue =
  | { kind: "configuration_missing"; provider: ProviderName; message: string }
  | {
      kind: "request_failure";
      provider: ProviderName;
      message: string;
      cause?: unknown;
    }
  | { kind: "unrecognized_provider"; provider: string; message: string };

export type SearchOutcome = {
  movies: CanonicalMovieRecord[];
  issues: SearchIssue[];
};

export function isProviderName(value: string): value is ProviderName {
  return value === "TMDB" || value === "OMDb";
}

export function recordKey(
  movie: Pick<CanonicalMovieRecord, "id" | "sourceProvider">,
): string {
  return `${movie.sourceProvider}:${movie.id}`;
}

/** Raw hits kept per search; the rest are dropped, never paginated. */
export const MAX_SEARCH_HITS = 20;
