import { format } from "date-fns";

const BASE_NAME = "library_movies";

const EXTENSIONS: Record<string, string> = {
  xlsx: ".xlsx",
  "xlsx-images": ".xlsx",
  csv: ".csv",
  html: ".html",
  zip: ".zip",
};

export function getExportFilename(
  kind: string,
  withTimestamp = true,
  now: Date = new Date(),
): string {
  const base = withTimestamp
    ? `${BASE_NAME}_${format(now, "yyyyMMdd_HHmmss")}`
    : BASE_NAME;
  return base + (EXTENSIONS[kind] ?? ".txt");
}

/** `attachment` header value that survives non-ASCII titles. */
export function contentDisposition(filename: string): string {
  const ascii = filename.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}
