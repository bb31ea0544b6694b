import { afterEach, describe, expect, it, vi } from "vitest";
import { checkProviderAvailability, requestJson } from "./gateway";
import { RequestFailure } from "./http";

describe("requestJson", () => {
  const originalFetch = global.fetch;

  afterEach(() => {
    global.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("issues one GET with the encoded params", async () => {
    global.fetch = vi.fn().mockResolvedValue({
      ok: true,
      json: async () => ({ results: [{ id: 1 }] }),
    });

    const result = await requestJson<{ results: Array<{ id: number }> }>(
      "https://api.test/search",
      { query: "dune", api_key: "test-key" },
    );

    expect(result).toEqual({ ok: true, data: { results: [{ id: 1 }] } });
    expect(global.fetch).toHaveBeenCalledWith(
      "https://api.test/search?query=dune&api_key=test-key",
      expect.any(Object),
    );
  });

  it("returns failures instead of throwing", async () => {
    global.fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 503,
      statusText: "Service Unavailable",
    });

    const result = await requestJson("https://api.test/search", {});

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toBeInstanceOf(RequestFailure);
    expect(result.failure.reason).toBe("http_status");
    expect(result.failure.status).toBe(503);
    expect(global.fetch).toHaveBeenCalledTimes(1);
  });

  it.each([{ body: null }, { body: [1, 2] }, { body: 42 }])(
    "treats a $body body as malformed",
    async ({ body }) => {
      global.fetch = vi.fn().mockResolvedValue({
        ok: true,
        json: async () => body,
      });

      const result = await requestJson("https://api.test/search", {});

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.failure.reason).toBe("malformed_body");
      expect(result.failure.message).toBe("Response was not a JSON object");
    },
  );

  it("reports a broken base url without calling fetch", async () => {
    global.fetch = vi.fn();

    const result = await requestJson("not a url", { q: "x" });

    expect(result.ok).toBe(false);
    expect(global.fetch).not.toHaveBeenCalled();
  });
});

describe("checkProviderAvailability", () => {
  it("flags a provider without a key", () => {
    expect(checkProviderAvailability("TMDB", undefined)).toEqual({
      kind: "configuration_missing",
      provider: "TMDB",
      message: "TMDB API key is not configured",
    });
  });

  it("accepts a provider with a key", () => {
    expect(checkProviderAvailability("OMDb", "test-key")).toBeNull();
  });
});
