import JSZip from "jszip";
import { describe, expect, it, vi } from "vitest";
import type { CanonicalMovieRecord } from "../types";
import {
  createPosterZip,
  downloadPoster,
  safePosterFilename,
  type PosterFetcher,
} from "./posters";

function movie(
  title: string,
  overrides: Partial<CanonicalMovieRecord> = {},
): CanonicalMovieRecord {
  return {
    id: title,
    title,
    year: "2001",
    summary: "Summary",
    posterUrl: `https://img.test/${encodeURIComponent(title)}.jpg`,
    rating: "7.0",
    director: "N/A",
    sourceProvider: "OMDb",
    ...overrides,
  };
}

async function image(text: string, contentType: string | null = "image/jpeg") {
  return { data: await new Response(text).arrayBuffer(), contentType };
}

describe("safePosterFilename", () => {
  it("keeps letters, digits, spaces, dashes and underscores", () => {
    expect(
      safePosterFilename({ title: "Star Wars: Episode IV – A New Hope ", year: "1977" }),
    ).toBe("Star Wars Episode IV  A New Hope_1977.jpg");
  });

  it("keeps accented letters and cleans the year", () => {
    expect(safePosterFilename({ title: "Amélie", year: "N/A" })).toBe(
      "Amélie_NA.jpg",
    );
  });

  it("uses a default name when nothing is left of the title", () => {
    expect(safePosterFilename({ title: "???", year: "2001" })).toBe(
      "poster_2001.jpg",
    );
  });
});

describe("downloadPoster", () => {
  it("reports a movie without artwork", async () => {
    const fetchPoster = vi.fn();
    const result = await downloadPoster(
      movie("Amélie", { posterUrl: undefined }),
      fetchPoster,
    );
    expect(result).toEqual({
      ok: false,
      message: "No poster available for Amélie",
    });
    expect(fetchPoster).not.toHaveBeenCalled();
  });

  it("returns the image with a safe filename", async () => {
    const fetchPoster: PosterFetcher = async () =>
      image("png-bytes", "image/png; charset=binary");
    const result = await downloadPoster(movie("Amélie"), fetchPoster);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.file.filename).toBe("Amélie_2001.jpg");
    expect(result.file.mime).toBe("image/png");
    expect(result.file.data.byteLength).toBe(9);
  });

  it("defaults the mime type to JPEG", async () => {
    const result = await downloadPoster(movie("Heat"), async () =>
      image("x", null),
    );
    expect(result.ok && result.file.mime).toBe("image/jpeg");
  });

  it("reports download failures", async () => {
    const result = await downloadPoster(movie("Heat"), async () => {
      throw new Error("boom");
    });
    expect(result).toEqual({
      ok: false,
      message: "Could not download the poster for Heat: boom",
    });
  });
});

describe("createPosterZip", () => {
  it("returns null for an empty selection", async () => {
    expect(await createPosterZip([])).toBeNull();
  });

  it("zips downloadable posters and lists the failures", async () => {
    const fetchPoster = vi.fn(async (url: string) => {
      if (url.includes("Broken")) throw new Error("404");
      return image("img-bytes");
    });

    const zip = await createPosterZip(
      [
        movie("Amélie"),
        movie("No Art", { posterUrl: undefined }),
        movie("Broken"),
      ],
      fetchPoster,
    );

    expect(zip?.added).toEqual(["Amélie_2001.jpg"]);
    expect(zip?.skipped).toEqual(["Broken"]);
    expect(fetchPoster).toHaveBeenCalledTimes(2);

    const archive = await JSZip.loadAsync(zip?.data ?? new ArrayBuffer(0));
    expect(Object.keys(archive.files)).toEqual(["Amélie_2001.jpg"]);
    expect(await archive.file("Amélie_2001.jpg")?.async("string")).toBe(
      "img-bytes",
    );
  });

  it("keeps both posters when two movies share a title and year", async () => {
    const fetchPoster = vi.fn(async (url: string) => image(url));

    const zip = await createPosterZip(
      [
        movie("Dune", { id: 438631, year: "2021", sourceProvider: "TMDB" }),
        movie("Dune", {
          id: "tt1160419",
          year: "2021",
          sourceProvider: "OMDb",
          posterUrl: "https://img.test/omdb-dune.jpg",
        }),
      ],
      fetchPoster,
    );

    expect(zip?.added).toEqual(["Dune_2021.jpg", "Dune_2021_2.jpg"]);
    const archive = await JSZip.loadAsync(zip?.data ?? new ArrayBuffer(0));
    expect(Object.keys(archive.files)).toEqual([
      "Dune_2021.jpg",
      "Dune_2021_2.jpg",
    ]);
    expect(await archive.file("Dune_2021_2.jpg")?.async("string")).toBe(
      "https://img.test/omdb-dune.jpg",
    );
  });
});
