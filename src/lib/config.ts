import type { ProviderName } from "./types";

const TMDB_BASE_URL = "https://api.themoviedb.org/3";
const TMDB_IMAGE_BASE_URL = "https://image.tmdb.org/t/p/w300";
const TMDB_LANGUAGE = "fr-FR";
const OMDB_BASE_URL = "https://www.omdbapi.com/";

export type TmdbConfig = {
  apiKey?: string;
  baseUrl: string;
  imageBaseUrl: string;
  language: string;
};

export type OmdbConfig = {
  apiKey?: string;
  baseUrl: string;
};

export type ProviderConfig = { TMDB: TmdbConfig; OMDb: OmdbConfig };

function readKey(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function getProviderConfig(
  env: Record<string, string | undefined>,
): ProviderConfig {
  return {
    TMDB: {
      apiKey: readKey(env.TMDB_API_KEY),
      baseUrl: stripTrailingSlash(readKey(env.TMDB_BASE_URL) ?? TMDB_BASE_URL),
      imageBaseUrl: stripTrailingSlash(
        readKey(env.TMDB_IMAGE_BASE_URL) ?? TMDB_IMAGE_BASE_URL,
      ),
      language: readKey(env.TMDB_LANGUAGE) ?? TMDB_LANGUAGE,
    },
    OMDb: {
      apiKey: readKey(env.OMDB_API_KEY),
      // OMDb serves everything from the root path, keep the slash
      baseUrl: readKey(env.OMDB_BASE_URL) ?? OMDB_BASE_URL,
    },
  };
}

export function isProviderConfigured(
  config: ProviderConfig,
  provider: ProviderName,
): boolean {
  return Boolean(config[provider].apiKey);
}

export const defaults = {
  tmdbBaseUrl: TMDB_BASE_URL,
  tmdbImageBaseUrl: TMDB_IMAGE_BASE_URL,
  tmdbLanguage: TMDB_LANGUAGE,
  omdbBaseUrl: OMDB_BASE_URL,
};
