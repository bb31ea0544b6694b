import { NextResponse } from "next/server";
import {
  buildExport,
  contentDisposition,
  EXPORT_FORMATS,
  isExportFormat,
} from "@/lib/export";
import { log } from "@/lib/logger";
import { toMovieRecords } from "@/lib/records";

export async function POST(request: Request) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body" }, { status: 400 });
  }

  const format = typeof body === "object" && body !== null && "format" in body
    ? body.format
    : undefined;
  if (!isExportFormat(format)) {
    return NextResponse.json(
      { error: `format must be one of ${EXPORT_FORMATS.join(", ")}` },
      { status: 400 },
    );
  }

  const movies = toMovieRecords(
    typeof body === "object" && body !== null && "movies" in body
      ? body.movies
      : undefined,
  );
  if (!movies) {
    return NextResponse.json(
      { error: "movies must be a list of movie records" },
      { status: 400 },
    );
  }

  try {
    const file = await buildExport(format, movies);
    if (!file) {
      return NextResponse.json({ error: "Selection is empty" }, { status: 422 });
    }
    log.info("export_built", { format, count: movies.length });
    return new Response(file.body, {
      status: 200,
      headers: {
        "content-type": file.contentType,
        "content-disposition": contentDisposition(file.filename),
      },
    });
  } catch (err) {
    log.error("export_failed", { format, error: (err as Error).message });
    return NextResponse.json({ error: "Export failed" }, { status: 500 });
  }
}
