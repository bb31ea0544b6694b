import ExcelJS from "exceljs";
import { log } from "../logger";
import type { CanonicalMovieRecord } from "../types";
import { COLUMN_HEADERS, toExportRow } from "./columns";
import { fetchPosterImage, type PosterFetcher } from "./posters";

export const SHEET_NAME = "Library movies";

const POSTER_ROW_HEIGHT = 120;
const POSTER_SIZE = { width: 90, height: 135 };

type ImageExtension = "jpeg" | "png" | "gif";

function imageExtension(contentType: string | null): ImageExtension {
  if (contentType?.includes("png")) return "png";
  if (contentType?.includes("gif")) return "gif";
  return "jpeg";
}

function styleHeader(row: ExcelJS.Row) {
  row.font = { bold: true, size: 12, color: { argb: "FFFFFFFF" } };
  row.fill = {
    type: "pattern",
    pattern: "solid",
    fgColor: { argb: "FF4472C4" },
  };
  row.alignment = { horizontal: "center", vertical: "middle" };
}

export async function createSimpleWorkbook(
  movies: readonly CanonicalMovieRecord[],
): Promise<ArrayBuffer | null> {
  if (movies.length === 0) return null;

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.columns = [
    { header: COLUMN_HEADERS.title, key: "title", width: 25 },
    { header: COLUMN_HEADERS.year, key: "year", width: 8 },
    { header: COLUMN_HEADERS.director, key: "director", width: 20 },
    { header: COLUMN_HEADERS.rating, key: "rating", width: 8 },
    { header: COLUMN_HEADERS.summary, key: "summary", width: 50 },
  ];
  for (const movie of movies) {
    const { title, year, director, rating, summary } = toExportRow(movie);
    sheet.addRow({ title, year, director, rating, summary });
  }

  return workbook.xlsx.writeBuffer();
}

/**
 * Workbook with each poster embedded in column A. Posters are downloaded one
 * at a time; a failed download leaves a text note in the cell instead.
 */
export async function createWorkbookWithPosters(
  movies: readonly CanonicalMovieRecord[],
  fetchPoster: PosterFetcher = fetchPosterImage,
): Promise<ArrayBuffer | null> {
  if (movies.length === 0) return null;

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.columns = [
    { header: "Poster", key: "poster", width: 15 },
    { header: COLUMN_HEADERS.title, key: "title", width: 25 },
    { header: COLUMN_HEADERS.year, key: "year", width: 8 },
    { header: COLUMN_HEADERS.director, key: "director", width: 20 },
    { header: COLUMN_HEADERS.rating, key: "rating", width: 8 },
    { header: COLUMN_HEADERS.summary, key: "summary", width: 50 },
    { header: COLUMN_HEADERS.source, key: "source", width: 10 },
  ];
  styleHeader(sheet.getRow(1));

  for (const [index, movie] of movies.entries()) {
    const row = sheet.addRow({
      ...toExportRow(movie),
      year: String(movie.year),
      rating: String(movie.rating),
    });
    row.height = POSTER_ROW_HEIGHT;
    row.alignment = { vertical: "top", wrapText: true };

    if (!movie.posterUrl) {
      row.getCell("poster").value = "No image";
      continue;
    }

    try {
      const image = await fetchPoster(movie.posterUrl);
      const imageId = workbook.addImage({
        base64: Buffer.from(image.data).toString("base64"),
        extension: imageExtension(image.contentType),
      });
      // Anchors are zero-based: data row `index` sits on sheet row index + 2
      sheet.addImage(imageId, {
        tl: { col: 0, row: index + 1 },
        ext: POSTER_SIZE,
      });
    } catch (err) {
      log.warn("poster_download_failed", {
        title: movie.title,
        error: (err as Error).message,
      });
      row.getCell("poster").value = "Image unavailable";
    }
  }

  return workbook.xlsx.writeBuffer();
}
