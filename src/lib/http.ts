const DEFAULT_TIMEOUT_MS = 10000;
const USER_AGENT = "library-movie-catalog/1.0";

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type FailureReason =
  | "network"
  | "timeout"
  | "http_status"
  | "malformed_body";

const SECRET_PARAMS = ["api_key", "apikey"];

/** Copy of the URL safe to log: API keys are masked. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const name of SECRET_PARAMS) {
      if (parsed.searchParams.has(name)) parsed.searchParams.set(name, "***");
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

export class RequestFailure extends Error {
  readonly reason: FailureReason;
  readonly url: string;
  readonly status?: number;

  constructor(
    reason: FailureReason,
    message: string,
    url: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "RequestFailure";
    this.reason = reason;
    this.url = redactUrl(url);
    this.status = options.status;
  }
}

export function isJsonObject(
  value: unknown,
): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

export function buildUrl(base: string, params: QueryParams = {}): string {
  const url = new URL(base);
  for (const [name, value] of Object.entries(params)) {
    if (value === undefined) continue;
    url.searchParams.set(name, String(value));
  }
  return url.toString();
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: {
        "user-agent": USER_AGENT,
        ...(init.headers || {}),
      },
    });
  } catch (err) {
    if (isAbortError(err)) {
      throw new RequestFailure(
        "timeout",
        `Request timed out after ${timeoutMs} ms`,
        url,
        { cause: err },
      );
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new RequestFailure("network", `Network error: ${detail}`, url, {
      cause: err,
    });
  } finally {
    clearTimeout(timeout);
  }
}

async function requestOk(url: string, timeoutMs?: number): Promise<Response> {
  const res = await fetchWithTimeout(url, {}, timeoutMs);
  if (!res.ok) {
    throw new RequestFailure(
      "http_status",
      `Request failed: ${res.status} ${res.statusText}`,
      url,
      { status: res.status },
    );
  }
  return res;
}

export async function fetchJson<T>(
  url: string,
  timeoutMs?: number,
): Promise<T> {
  const res = await requestOk(url, timeoutMs);
  try {
    return (await res.json()) as T;
  } catch (err) {
    throw new RequestFailure("malformed_body", "Response was not valid JSON", url, {
      cause: err,
    });
  }
}

export type BinaryBody = { data: ArrayBuffer; contentType: string | null };

export async function fetchBinary(
  url: string,
  timeoutMs?: number,
): Promise<BinaryBody> {
  const res = await requestOk(url, timeoutMs);
  try {
    return {
      data: await res.arrayBuffer(),
      contentType: res.headers.get("content-type"),
    };
  } catch (err) {
    throw new RequestFailure("network", "Response body could not be read", url, {
      cause: err,
    });
  }
}
