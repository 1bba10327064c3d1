import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getCorpus } from '@/lib/services';

/**
 * GET /api/lookup?q=text
 * Find the chunk containing an excerpt and its validated alignment
 */
export async function GET(request: NextRequest) {
  try {
    const excerpt = request.nextUrl.searchParams.get('q')?.trim();

    if (!excerpt) {
      return NextResponse.json(
        { error: 'Missing q parameter' },
        { status: 400 }
      );
    }

    const corpus = await getCorpus();
    const result = corpus.lookup(excerpt);

    return NextResponse.json(result);
  } catch (error) {
    return errorResponse(error, 'Failed to look up excerpt');
  }
}
