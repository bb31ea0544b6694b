import JSZip from "jszip";
import { REQUEST_TIMEOUT_MS } from "../gateway";
import { fetchBinary, type BinaryBody } from "../http";
import { log } from "../logger";
import type { CanonicalMovieRecord } from "../types";

export type PosterFetcher = (url: string) => Promise<BinaryBody>;

export const fetchPosterImage: PosterFetcher = (url) =>
  fetchBinary(url, REQUEST_TIMEOUT_MS);

export type PosterFile = { data: ArrayBuffer; filename: string; mime: string };

export type PosterDownload =
  | { ok: true; file: PosterFile }
  | { ok: false; message: string };

export type PosterZip = {
  data: ArrayBuffer;
  added: string[];
  skipped: string[];
};

function keepSafeChars(value: string): string {
  return Array.from(value)
    .filter((char) => /[\p{L}\p{N} _-]/u.test(char))
    .join("");
}

export function safePosterFilename(
  movie: Pick<CanonicalMovieRecord, "title" | "year">,
): string {
  const title = keepSafeChars(movie.title).trimEnd() || "poster";
  return `${title}_${keepSafeChars(movie.year)}.jpg`;
}

/** `Dune_2021.jpg`, then `Dune_2021_2.jpg`, ... for repeated names. */
function uniqueEntryName(filename: string, used: Set<string>): string {
  const stem = filename.replace(/\.jpg$/, "");
  let candidate = filename;
  for (let n = 2; used.has(candidate); n++) {
    candidate = `${stem}_${n}.jpg`;
  }
  used.add(candidate);
  return candidate;
}

function imageMime(contentType: string | null): string {
  const mime = contentType?.split(";")[0].trim().toLowerCase();
  return mime?.startsWith("image/") ? mime : "image/jpeg";
}

export async function downloadPoster(
  movie: CanonicalMovieRecord,
  fetchPoster: PosterFetcher = fetchPosterImage,
): Promise<PosterDownload> {
  if (!movie.posterUrl) {
    return { ok: false, message: `No poster available for ${movie.title}` };
  }
  try {
    const image = await fetchPoster(movie.posterUrl);
    return {
      ok: true,
      file: {
        data: image.data,
        filename: safePosterFilename(movie),
        mime: imageMime(image.contentType),
      },
    };
  } catch (err) {
    log.warn("poster_download_failed", {
      title: movie.title,
      error: (err as Error).message,
    });
    return {
      ok: false,
      message: `Could not download the poster for ${movie.title}: ${(err as Error).message}`,
    };
  }
}

/** Movies without artwork are left out; failed downloads land in `skipped`. */
export async function createPosterZip(
  movies: readonly CanonicalMovieRecord[],
  fetchPoster: PosterFetcher = fetchPosterImage,
): Promise<PosterZip | null> {
  if (movies.length === 0) return null;

  const zip = new JSZip();
  const added: string[] = [];
  const skipped: string[] = [];
  const used = new Set<string>();

  for (const movie of movies) {
    if (!movie.posterUrl) continue;
    const download = await downloadPoster(movie, fetchPoster);
    if (!download.ok) {
      skipped.push(movie.title);
      continue;
    }
    const name = uniqueEntryName(download.file.filename, used);
    zip.file(name, download.file.data);
    added.push(name);
  }

  const data = await zip.generateAsync({
    type: "arraybuffer",
    compression: "DEFLATE",
  });
  return { data, added, skipped };
}
