import { NextResponse } from "next/server";
import { log } from "@/lib/logger";
import { parseFilterParams } from "@/lib/filters";
import { searchWithFilters } from "@/lib/search";
import type { SearchIssue } from "@/lib/types";

const DEFAULT_PROVIDER = "TMDB";

/** Issues as sent to the client: the underlying error object stays server-side. */
function toPublicIssue(issue: SearchIssue) {
  return { kind: issue.kind, provider: issue.provider, message: issue.message };
}

export async function GET(request: Request) {
  const { searchParams } = new URL(request.url);
  const query = searchParams.get("q")?.trim() ?? "";
  const provider = searchParams.get("provider")?.trim() || DEFAULT_PROVIDER;
  const filters = parseFilterParams(searchParams);

  try {
    const { movies, issues } = await searchWithFilters(
      query,
      provider,
      filters,
      { env: process.env },
    );
    return NextResponse.json({
      results: movies,
      issues: issues.map(toPublicIssue),
    });
  } catch (err) {
    log.error("search_request_failed", {
      query,
      provider,
      error: (err as Error).message,
    });
    return NextResponse.json({ error: "Search failed" }, { status: 500 });
  }
}
