import { SENTINEL, type CanonicalMovieRecord } from "../types";

export type ExportRow = {
  title: string;
  year: string;
  director: string;
  rating: string | number;
  summary: string;
  source: string;
};

export const COLUMN_HEADERS: Record<keyof ExportRow, string> = {
  title: "Title",
  year: "Year",
  director: "Director",
  rating: "Rating",
  summary: "Summary",
  source: "Source",
};

export function toExportRow(movie: CanonicalMovieRecord): ExportRow {
  return {
    title: movie.title,
    year: movie.year,
    director: movie.director || SENTINEL,
    rating: movie.rating,
    summary: movie.summary,
    source: movie.sourceProvider,
  };
}
