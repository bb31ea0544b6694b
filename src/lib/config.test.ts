import { describe, it, expect } from "vitest";
import { defaults, getProviderConfig, isProviderConfigured } from "./config";

describe("getProviderConfig", () => {
  it("reads keys from env", () => {
    const config = getProviderConfig({
      TMDB_API_KEY: "test-tmdb-key",
      OMDB_API_KEY: "test-omdb-key",
    });
    expect(config.TMDB.apiKey).toBe("test-tmdb-key");
    expect(config.OMDb.apiKey).toBe("test-omdb-key");
  });

  it("has no built-in keys", () => {
    const config = getProviderConfig({});
    expect(config.TMDB.apiKey).toBeUndefined();
    expect(config.OMDb.apiKey).toBeUndefined();
  });

  it("treats blank keys as missing and trims the rest", () => {
    const config = getProviderConfig({
      TMDB_API_KEY: "   ",
      OMDB_API_KEY: " test-omdb ",
    });
    expect(config.TMDB.apiKey).toBeUndefined();
    expect(config.OMDb.apiKey).toBe("test-omdb");
  });

  it("falls back to the public endpoints and the French locale", () => {
    const config = getProviderConfig({});
    expect(config.TMDB.baseUrl).toBe(defaults.tmdbBaseUrl);
    expect(config.TMDB.imageBaseUrl).toBe("https://image.tmdb.org/t/p/w300");
    expect(config.TMDB.language).toBe("fr-FR");
    expect(config.OMDb.baseUrl).toBe("https://www.omdbapi.com/");
  });

  it("strips trailing slashes from TMDB overrides", () => {
    const config = getProviderConfig({
      TMDB_BASE_URL: "https://tmdb.test/3/",
      TMDB_IMAGE_BASE_URL: "https://img.test/w500/",
    });
    expect(config.TMDB.baseUrl).toBe("https://tmdb.test/3");
    expect(config.TMDB.imageBaseUrl).toBe("https://img.test/w500");
  });
});

describe("isProviderConfigured", () => {
  it("reflects which providers have a key", () => {
    const config = getProviderConfig({ OMDB_API_KEY: "test-omdb" });
    expect(isProviderConfigured(config, "TMDB")).toBe(false);
    expect(isProviderConfigured(config, "OMDb")).toBe(true);
  });
});
