import { describe, expect, it } from "vitest";
import { POST } from "./route";

const movie = {
  id: 949,
  title: "Heat",
  year: "1995",
  summary: "A heist in Los Angeles.",
  rating: 7.9,
  director: "Michael Mann",
  sourceProvider: "TMDB",
};

function makeRequest(body: unknown): Request {
  return new Request("http://localhost/api/export", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("POST /api/export", () => {
  it("returns the CSV as an attachment", async () => {
    const res = await POST(makeRequest({ format: "csv", movies: [movie] }));
    const text = await res.text();

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/csv; charset=utf-8");
    expect(res.headers.get("content-disposition")).toMatch(
      /^attachment; filename="library_movies_\d{8}_\d{6}\.csv"/,
    );
    expect(text.replace(/^\uFEFF/, "")).toBe(
      "Title,Year,Director,Rating,Summary,Source\n" +
        "Heat,1995,Michael Mann,7.9,A heist in Los Angeles.,TMDB\n",
    );
  });

  it("returns a spreadsheet for xlsx", async () => {
    const res = await POST(makeRequest({ format: "xlsx", movies: [movie] }));

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    );
    // xlsx files are zip archives
    const bytes = new Uint8Array(await res.arrayBuffer());
    expect(Array.from(bytes.slice(0, 2))).toEqual([0x50, 0x4b]);
  });

  it("rejects an unknown format", async () => {
    const res = await POST(makeRequest({ format: "pdf", movies: [movie] }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "format must be one of csv, xlsx, xlsx-images, html, zip",
    });
  });

  it("rejects malformed records", async () => {
    const res = await POST(
      makeRequest({ format: "csv", movies: [{ ...movie, sourceProvider: "IMDb" }] }),
    );

    expect(res.status).toBe(400);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await POST(makeRequest("{not json"));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid JSON body" });
  });

  it("answers 422 for an empty selection", async () => {
    const res = await POST(makeRequest({ format: "html", movies: [] }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ error: "Selection is empty" });
  });
});
