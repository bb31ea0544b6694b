import { isProviderName, type CanonicalMovieRecord } from "./types";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isIdentifier(value: unknown): value is string | number {
  return (
    (typeof value === "string" && value.length > 0) ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

/**
 * Rebuilds a record received from a client (e.g. a selection posted for
 * export). Unknown fields are dropped; returns null when a field is missing or
 * has the wrong type.
 */
export function toMovieRecord(value: unknown): CanonicalMovieRecord | null {
  if (!isObject(value)) return null;
  const { id, title, year, summary, posterUrl, rating, director, sourceProvider } =
    value;

  if (!isIdentifier(id)) return null;
  if (typeof title !== "string" || typeof year !== "string") return null;
  if (typeof summary !== "string" || typeof director !== "string") return null;
  if (typeof rating !== "string" && typeof rating !== "number") return null;
  if (typeof sourceProvider !== "string" || !isProviderName(sourceProvider)) {
    return null;
  }
  let poster: string | undefined;
  if (typeof posterUrl === "string") {
    poster = posterUrl || undefined;
  } else if (posterUrl !== undefined && posterUrl !== null) {
    return null;
  }

  const record: CanonicalMovieRecord = {
    id,
    title,
    year,
    summary,
    ...(poster ? { posterUrl: poster } : {}),
    rating,
    director,
    sourceProvider,
  };
  return Object.freeze(record);
}

export function toMovieRecords(value: unknown): CanonicalMovieRecord[] | null {
  if (!Array.isArray(value)) return null;
  const records: CanonicalMovieRecord[] = [];
  for (const item of value) {
    const record = toMovieRecord(item);
    if (!record) return null;
    records.push(record);
  }
  return records;
}
