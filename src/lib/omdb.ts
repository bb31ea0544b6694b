import { checkProviderAvailability, requestJson } from "./gateway";
import { isJsonObject } from "./http";
import { log } from "./logger";
import type { OmdbConfig } from "./config";
import {
  MAX_SEARCH_HITS,
  SENTINEL,
  SUMMARY_FALLBACK,
  type CanonicalMovieRecord,
  type SearchOutcome,
} from "./types";

type OmdbSearchHit = {
  Title?: string;
  Year?: string;
  imdbID?: string;
  Type?: string;
  Poster?: string;
};

type OmdbSearchResponse = {
  Response?: string;
  Search?: Array<OmdbSearchHit | null>;
  Error?: string;
};

export type OmdbMovie = {
  Response?: string;
  Title?: string;
  Year?: string;
  Plot?: string;
  Poster?: string;
  imdbRating?: string;
  Director?: string;
  imdbID?: string;
  Error?: string;
};

/**
 * The bulk search endpoint omits plot, rating and director, so each hit is
 * completed by a by-id lookup. `null` means the lookup gave nothing usable.
 */
export interface OmdbDetailResolver {
  resolveFullRecord(imdbId: string): Promise<OmdbMovie | null>;
}

function posterOrUndefined(poster: string | undefined): string | undefined {
  if (!poster || poster === SENTINEL) return undefined;
  return poster;
}

export function createOmdbDetailResolver(
  config: OmdbConfig,
): OmdbDetailResolver {
  return {
    async resolveFullRecord(imdbId) {
      const result = await requestJson<OmdbMovie>(config.baseUrl, {
        apikey: config.apiKey,
        i: imdbId,
        plot: "full",
      });
      if (!result.ok) {
        log.warn("detail_lookup_failed", {
          provider: "OMDb",
          imdbId,
          error: result.failure.message,
        });
        return null;
      }
      if (result.data.Response !== "True") {
        log.warn("detail_lookup_failed", {
          provider: "OMDb",
          imdbId,
          error: result.data.Error ?? "Response was not True",
        });
        return null;
      }
      return result.data;
    },
  };
}

export function omdbToRecord(
  movie: OmdbMovie,
  fallbackId: string,
): CanonicalMovieRecord {
  const posterUrl = posterOrUndefined(movie.Poster);
  const record: CanonicalMovieRecord = {
    id: movie.imdbID || fallbackId,
    title: movie.Title ?? SENTINEL,
    year: movie.Year ?? SENTINEL,
    summary: movie.Plot ?? SUMMARY_FALLBACK,
    ...(posterUrl ? { posterUrl } : {}),
    rating: movie.imdbRating ?? SENTINEL,
    director: movie.Director ?? SENTINEL,
    sourceProvider: "OMDb",
  };
  return Object.freeze(record);
}

/** Best-effort record from the search hit alone. */
export function omdbHitToPartialRecord(
  hit: OmdbSearchHit,
): CanonicalMovieRecord {
  return omdbToRecord(
    {
      imdbID: hit.imdbID,
      Title: hit.Title,
      Year: hit.Year,
      Poster: hit.Poster,
      Plot: SUMMARY_FALLBACK,
      imdbRating: SENTINEL,
    },
    hit.imdbID || SENTINEL,
  );
}

async function completeHit(
  hit: OmdbSearchHit,
  resolver: OmdbDetailResolver,
): Promise<CanonicalMovieRecord> {
  const imdbId = hit.imdbID;
  if (!imdbId) return omdbHitToPartialRecord(hit);
  let detail: OmdbMovie | null = null;
  try {
    detail = await resolver.resolveFullRecord(imdbId);
  } catch (err) {
    log.warn("detail_lookup_failed", {
      provider: "OMDb",
      imdbId,
      error: (err as Error).message,
    });
  }
  return detail ? omdbToRecord(detail, imdbId) : omdbHitToPartialRecord(hit);
}

export async function searchOmdb(
  query: string,
  config: OmdbConfig,
  resolver: OmdbDetailResolver = createOmdbDetailResolver(config),
): Promise<SearchOutcome> {
  if (!query.trim()) return { movies: [], issues: [] };

  const missing = checkProviderAvailability("OMDb", config.apiKey);
  if (missing) {
    log.warn("provider_not_configured", { provider: "OMDb" });
    return { movies: [], issues: [missing] };
  }

  const search = await requestJson<OmdbSearchResponse>(config.baseUrl, {
    apikey: config.apiKey,
    s: query,
    type: "movie",
  });
  if (!search.ok) {
    log.warn("search_failed", {
      provider: "OMDb",
      query,
      error: search.failure.message,
    });
    return {
      movies: [],
      issues: [
        {
          kind: "request_failure",
          provider: "OMDb",
          message: `OMDb search failed: ${search.failure.message}`,
          cause: search.failure,
        },
      ],
    };
  }

  // OMDb reports "no match" as a 200 with Response: "False"
  if (search.data.Response !== "True" || !Array.isArray(search.data.Search)) {
    log.info("search_empty", {
      provider: "OMDb",
      query,
      reason: search.data.Error,
    });
    return { movies: [], issues: [] };
  }

  const movies: CanonicalMovieRecord[] = [];
  for (const hit of search.data.Search.slice(0, MAX_SEARCH_HITS)) {
    if (!isJsonObject(hit)) continue;
    movies.push(await completeHit(hit, resolver));
  }

  log.info("search_done", { provider: "OMDb", query, count: movies.length });
  return { movies, issues: [] };
}
