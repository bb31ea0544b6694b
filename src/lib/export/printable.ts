import { format } from "date-fns";
import type { CanonicalMovieRecord } from "../types";
import { COLUMN_HEADERS, toExportRow, type ExportRow } from "./columns";

const DOCUMENT_TITLE = "Library movie list";

const PRINT_STYLES = `
  body { font-family: Arial, sans-serif; margin: 24px; }
  table { border-collapse: collapse; width: 100%; }
  th, td { border: 1px solid #ddd; padding: 8px; text-align: left; vertical-align: top; }
  th { background-color: #4472c4; color: white; }
  .title { text-align: center; color: #4472c4; }
  .summary { max-width: 300px; word-wrap: break-word; }
  @media print { .no-print { display: none; } }
`;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const TABLE_COLUMNS: Array<keyof ExportRow> = [
  "title",
  "year",
  "director",
  "rating",
  "summary",
  "source",
];

function renderRow(movie: CanonicalMovieRecord): string {
  const row = toExportRow(movie);
  const cells = TABLE_COLUMNS.map((key) => {
    const cls = key === "summary" ? ' class="summary"' : "";
    return `<td${cls}>${escapeHtml(String(row[key]))}</td>`;
  });
  return `<tr>${cells.join("")}</tr>`;
}

export function createPrintableHtml(
  movies: readonly CanonicalMovieRecord[],
  now: Date = new Date(),
): string | null {
  if (movies.length === 0) return null;

  const head = TABLE_COLUMNS.map((key) => `<th>${COLUMN_HEADERS[key]}</th>`);
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${DOCUMENT_TITLE}</title>`,
    `<style>${PRINT_STYLES}</style>`,
    "</head>",
    "<body>",
    `<h1 class="title">${DOCUMENT_TITLE}</h1>`,
    `<p><strong>Export date:</strong> ${format(now, "dd/MM/yyyy HH:mm")}</p>`,
    `<p><strong>Number of movies:</strong> ${movies.length}</p>`,
    "<table>",
    `<thead><tr>${head.join("")}</tr></thead>`,
    `<tbody>${movies.map(renderRow).join("")}</tbody>`,
    "</table>",
    "</body>",
    "</html>",
  ].join("\n");
}
