import { getProviderConfig, type ProviderConfig } from "./config";
import { applyFilters } from "./filters";
import { log } from "./logger";
import { searchOmdb, type OmdbDetailResolver } from "./omdb";
import { searchTmdb, type TmdbDetailResolver } from "./tmdb";
import {
  isProviderName,
  PROVIDERS,
  type SearchFilters,
  type SearchOutcome,
} from "./types";

export type SearchDeps = {
  env?: Record<string, string | undefined>;
  config?: ProviderConfig;
  tmdbResolver?: TmdbDetailResolver;
  omdbResolver?: OmdbDetailResolver;
};

export async function searchMovies(
  query: string,
  providerName: string,
  deps: SearchDeps = {},
): Promise<SearchOutcome> {
  if (!isProviderName(providerName)) {
    log.warn("unrecognized_provider", { provider: providerName });
    return {
      movies: [],
      issues: [
        {
          kind: "unrecognized_provider",
          provider: providerName,
          message: `Provider "${providerName}" is not recognized (expected ${PROVIDERS.join(" or ")})`,
        },
      ],
    };
  }

  const config = deps.config ?? getProviderConfig(deps.env ?? process.env);

  switch (providerName) {
    case "TMDB":
      return searchTmdb(query, config.TMDB, deps.tmdbResolver);
    case "OMDb":
      return searchOmdb(query, config.OMDb, deps.omdbResolver);
  }
}

export async function searchWithFilters(
  query: string,
  providerName: string,
  filters?: SearchFilters,
  deps: SearchDeps = {},
): Promise<SearchOutcome> {
  const outcome = await searchMovies(query, providerName, deps);
  if (!filters) return outcome;
  return { ...outcome, movies: applyFilters(outcome.movies, filters) };
}
