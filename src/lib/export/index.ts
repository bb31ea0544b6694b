import type { CanonicalMovieRecord } from "../types";
import { createCsvExport } from "./csv";
import { getExportFilename } from "./filename";
import { createPosterZip, type PosterFetcher } from "./posters";
import { createPrintableHtml } from "./printable";
import { createSimpleWorkbook, createWorkbookWithPosters } from "./workbook";

export const EXPORT_FORMATS = [
  "csv",
  "xlsx",
  "xlsx-images",
  "html",
  "zip",
] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export type ExportFile = {
  body: string | ArrayBuffer;
  contentType: string;
  filename: string;
};

const XLSX_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export function isExportFormat(value: unknown): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

async function buildBody(
  format: ExportFormat,
  movies: readonly CanonicalMovieRecord[],
  fetchPoster?: PosterFetcher,
): Promise<{ body: string | ArrayBuffer; contentType: string } | null> {
  switch (format) {
    case "csv": {
      const body = createCsvExport(movies);
      return body === null ? null : { body, contentType: "text/csv; charset=utf-8" };
    }
    case "xlsx": {
      const body = await createSimpleWorkbook(movies);
      return body === null ? null : { body, contentType: XLSX_TYPE };
    }
    case "xlsx-images": {
      const body = await createWorkbookWithPosters(movies, fetchPoster);
      return body === null ? null : { body, contentType: XLSX_TYPE };
    }
    case "html": {
      const body = createPrintableHtml(movies);
      return body === null
        ? null
        : { body, contentType: "text/html; charset=utf-8" };
    }
    case "zip": {
      const zip = await createPosterZip(movies, fetchPoster);
      return zip === null ? null : { body: zip.data, contentType: "application/zip" };
    }
  }
}

/** Builds the file for one export format, or null for an empty selection. */
export async function buildExport(
  format: ExportFormat,
  movies: readonly CanonicalMovieRecord[],
  fetchPoster?: PosterFetcher,
): Promise<ExportFile | null> {
  const built = await buildBody(format, movies, fetchPoster);
  if (!built) return null;
  return { ...built, filename: getExportFilename(format) };
}

export { createCsvExport } from "./csv";
export { contentDisposition, getExportFilename } from "./filename";
export {
  createPosterZip,
  downloadPoster,
  fetchPosterImage,
  safePosterFilename,
} from "./posters";
export type { PosterDownload, PosterFetcher, PosterFile } from "./posters";
export { createPrintableHtml, escapeHtml } from "./printable";
export {
  createSimpleWorkbook,
  createWorkbookWithPosters,
  SHEET_NAME,
} from "./workbook";
