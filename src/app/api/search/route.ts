import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse } from '@/lib/http';
import { getRetrievalService } from '@/lib/services';

// Validation schema
const searchSchema = z.object({
  query: z.string().trim().min(1).max(5000),
  k: z.number().int().positive().optional(),
  part: z.string().min(1).optional(),
  filterMode: z.enum(['pre', 'post']).optional(),
  rerank: z.boolean().optional(),
});

/**
 * POST /api/search
 * Similarity search over the alignment index, optionally re-ranked
 *
 * Request body:
 * - query: free text
 * - k: number of results
 * - part: restrict to one part identifier (e.g. "001")
 * - filterMode: "pre" | "post"
 * - rerank: ask the relevance judge to reorder the candidates
 */
export async function POST(request: NextRequest) {
  try {
    // Malformed JSON falls through to the schema check
    const body: unknown = await request.json().catch(() => undefined);
    const validationResult = searchSchema.safeParse(body);

    if (!validationResult.success) {
      return NextResponse.json(
        {
          error: 'Validation failed',
          details: validationResult.error.format(),
        },
        { status: 400 }
      );
    }

    const service = await getRetrievalService();
    const result = await service.search(validationResult.data);

    console.log(
      `Search "${validationResult.data.query}": ${result.hits.length} hits${result.reranked ? ' (reranked)' : ''}`
    );

    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, 'Failed to search alignments');
  }
}
