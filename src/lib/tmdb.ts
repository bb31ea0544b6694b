import { checkProviderAvailability, requestJson } from "./gateway";
import { isJsonObject } from "./http";
import { log } from "./logger";
import type { TmdbConfig } from "./config";
import {
  MAX_SEARCH_HITS,
  SENTINEL,
  SUMMARY_FALLBACK,
  type CanonicalMovieRecord,
  type SearchOutcome,
} from "./types";

type TmdbSearchResult = {
  id?: number;
  title?: string;
  release_date?: string;
  overview?: string;
  poster_path?: string | null;
  vote_average?: number;
};

type TmdbSearchResponse = {
  results?: Array<TmdbSearchResult | null>;
};

type TmdbCrewMember = { job?: string; name?: string };

type TmdbCreditsResponse = {
  id?: number;
  crew?: Array<TmdbCrewMember | null>;
};

/** Search hits carry no crew, so the director needs one lookup per movie. */
export interface TmdbDetailResolver {
  resolveDirector(movieId: number): Promise<string>;
}

function nonEmpty(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export function pickDirector(
  crew: Array<TmdbCrewMember | null> | undefined,
): string {
  if (!Array.isArray(crew)) return SENTINEL;
  const director = crew.find(
    (member): member is TmdbCrewMember =>
      isJsonObject(member) && member.job === "Director",
  );
  if (!director) return SENTINEL;
  return nonEmpty(director.name) ?? SENTINEL;
}

export function createTmdbDetailResolver(
  config: TmdbConfig,
): TmdbDetailResolver {
  return {
    async resolveDirector(movieId) {
      const result = await requestJson<TmdbCreditsResponse>(
        `${config.baseUrl}/movie/${movieId}/credits`,
        { api_key: config.apiKey, language: config.language },
      );
      if (!result.ok) {
        log.warn("credits_lookup_failed", {
          provider: "TMDB",
          movieId,
          error: result.failure.message,
        });
        return SENTINEL;
      }
      return pickDirector(result.data.crew);
    },
  };
}

export function tmdbToRecord(
  result: TmdbSearchResult,
  director: string,
  imageBaseUrl: string,
): CanonicalMovieRecord {
  const posterPath = nonEmpty(result.poster_path);
  const record: CanonicalMovieRecord = {
    id: result.id ?? SENTINEL,
    title: nonEmpty(result.title) ?? SENTINEL,
    year: nonEmpty(result.release_date?.slice(0, 4)) ?? SENTINEL,
    summary: nonEmpty(result.overview) ?? SUMMARY_FALLBACK,
    ...(posterPath ? { posterUrl: `${imageBaseUrl}${posterPath}` } : {}),
    rating: result.vote_average ?? SENTINEL,
    director,
    sourceProvider: "TMDB",
  };
  return Object.freeze(record);
}

async function directorFor(
  result: TmdbSearchResult,
  resolver: TmdbDetailResolver,
): Promise<string> {
  if (result.id === undefined) return SENTINEL;
  try {
    return await resolver.resolveDirector(result.id);
  } catch (err) {
    log.warn("credits_lookup_failed", {
      provider: "TMDB",
      movieId: result.id,
      error: (err as Error).message,
    });
    return SENTINEL;
  }
}

export async function searchTmdb(
  query: string,
  config: TmdbConfig,
  resolver: TmdbDetailResolver = createTmdbDetailResolver(config),
): Promise<SearchOutcome> {
  if (!query.trim()) return { movies: [], issues: [] };

  const missing = checkProviderAvailability("TMDB", config.apiKey);
  if (missing) {
    log.warn("provider_not_configured", { provider: "TMDB" });
    return { movies: [], issues: [missing] };
  }

  const search = await requestJson<TmdbSearchResponse>(
    `${config.baseUrl}/search/movie`,
    {
      api_key: config.apiKey,
      query,
      language: config.language,
      include_adult: false,
    },
  );
  if (!search.ok) {
    log.warn("search_failed", {
      provider: "TMDB",
      query,
      error: search.failure.message,
    });
    return {
      movies: [],
      issues: [
        {
          kind: "request_failure",
          provider: "TMDB",
          message: `TMDB search failed: ${search.failure.message}`,
          cause: search.failure,
        },
      ],
    };
  }

  const results = Array.isArray(search.data.results)
    ? search.data.results
        .slice(0, MAX_SEARCH_HITS)
        .filter((result): result is TmdbSearchResult => isJsonObject(result))
    : [];

  // One credits call per hit, awaited in result order
  const movies: CanonicalMovieRecord[] = [];
  for (const result of results) {
    const director = await directorFor(result, resolver);
    movies.push(tmdbToRecord(result, director, config.imageBaseUrl));
  }

  log.info("search_done", { provider: "TMDB", query, count: movies.length });
  return { movies, issues: [] };
}
