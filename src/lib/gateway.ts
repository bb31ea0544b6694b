import {
  buildUrl,
  fetchJson,
  isJsonObject,
  RequestFailure,
  type QueryParams,
} from "./http";
import { log } from "./logger";
import type { ProviderName, SearchIssue } from "./types";

export const REQUEST_TIMEOUT_MS = 10000;

export type GatewayResult<T> =
  | { ok: true; data: T }
  | { ok: false; failure: RequestFailure };

/**
 * One GET against a provider endpoint. Transport, status and decoding errors
 * come back as a `RequestFailure` value instead of being thrown, and so does
 * a body that is not a JSON object. No caching, no retries.
 */
export async function requestJson<T>(
  baseUrl: string,
  params: QueryParams,
  timeoutMs: number = REQUEST_TIMEOUT_MS,
): Promise<GatewayResult<T>> {
  let url: string;
  try {
    url = buildUrl(baseUrl, params);
  } catch (err) {
    return {
      ok: false,
      failure: new RequestFailure("network", `Invalid URL: ${baseUrl}`, baseUrl, {
        cause: err,
      }),
    };
  }

  try {
    const data = await fetchJson<T>(url, timeoutMs);
    if (!isJsonObject(data)) {
      throw new RequestFailure(
        "malformed_body",
        "Response was not a JSON object",
        url,
      );
    }
    return { ok: true, data };
  } catch (err) {
    const failure =
      err instanceof RequestFailure
        ? err
        : new RequestFailure("network", String(err), url, { cause: err });
    log.debug("gateway_request_failed", {
      url: failure.url,
      reason: failure.reason,
      status: failure.status,
    });
    return { ok: false, failure };
  }
}

/** Issue to report when the provider has no API key, or null when usable. */
export function checkProviderAvailability(
  provider: ProviderName,
  apiKey: string | undefined,
): Extract<SearchIssue, { kind: "configuration_missing" }> | null {
  if (apiKey) return null;
  return {
    kind: "configuration_missing",
    provider,
    message: `${provider} API key is not configured`,
  };
}
