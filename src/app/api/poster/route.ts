import { NextResponse } from "next/server";
import { contentDisposition, downloadPoster } from "@/lib/export";
import { toMovieRecord } from "@/lib/records";

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  const movie = toMovieRecord(
    typeof body === "object" && body !== null && "movie" in body
      ? body.movie
      : undefined,
  );
  if (!movie) {
    return NextResponse.json({ error: "movie is required" }, { status: 400 });
  }

  const download = await downloadPoster(movie);
  if (!download.ok) {
    return NextResponse.json({ error: download.message }, { status: 404 });
  }

  return new Response(download.file.data, {
    status: 200,
    headers: {
      "content-type": download.file.mime,
      "content-disposition": contentDisposition(download.file.filename),
    },
  });
}
