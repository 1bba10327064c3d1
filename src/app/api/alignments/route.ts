import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { getCorpus } from '@/lib/services';

/**
 * GET /api/alignments?part=001
 * List validated alignments for a part; without `part`, list the parts
 */
export async function GET(request: NextRequest) {
  try {
    const part = request.nextUrl.searchParams.get('part');
    const corpus = await getCorpus();

    if (!part) {
      return NextResponse.json({ parts: corpus.parts });
    }

    return NextResponse.json({
      part,
      alignments: corpus.alignmentsForPart(part),
    });
  } catch (error) {
    return errorResponse(error, 'Failed to load alignments');
  }
}
