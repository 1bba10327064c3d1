/**
 * API Route: GET /api/health
 * Reports whether the search index is loaded and how it was built
 */

import { NextResponse } from "next/server";
import { errorMessage } from "@/lib/errors";
import { describeIndex } from "@/lib/searcher";
import { getRetrievalService } from "@/lib/services";

export async function GET() {
  const timestamp = new Date().toISOString();

  try {
    const service = await getRetrievalService();
    return NextResponse.json({
      status: "ok",
      timestamp,
      service: "aligned-retrieval",
      index: describeIndex(service.loaded),
    });
  } catch (error) {
    return NextResponse.json(
      {
        status: "unavailable",
        timestamp,
        service: "aligned-retrieval",
        error: errorMessage(error),
      },
      { status: 503 }
    );
  }
}
