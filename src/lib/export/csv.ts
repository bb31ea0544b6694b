import { stringify } from "csv-stringify/sync";
import type { CanonicalMovieRecord } from "../types";
import { COLUMN_HEADERS, toExportRow, type ExportRow } from "./columns";

const CSV_COLUMNS: Array<keyof ExportRow> = [
  "title",
  "year",
  "director",
  "rating",
  "summary",
  "source",
];

/** CSV of the selection, prefixed with a UTF-8 BOM. */
export function createCsvExport(
  movies: readonly CanonicalMovieRecord[],
): string | null {
  if (movies.length === 0) return null;
  return stringify(movies.map(toExportRow), {
    bom: true,
    header: true,
    columns: CSV_COLUMNS.map((key) => ({ key, header: COLUMN_HEADERS[key] })),
  });
}
