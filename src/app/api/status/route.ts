import { NextResponse } from "next/server";
import { getProviderConfig, isProviderConfigured } from "@/lib/config";

// Reports only whether a key is set; keys themselves are never echoed.
export async function GET() {
  const config = getProviderConfig(process.env);
  return NextResponse.json({
    providers: {
      TMDB: { configured: isProviderConfigured(config, "TMDB") },
      OMDb: { configured: isProviderConfigured(config, "OMDb") },
    },
  });
}
