import { NextRequest } from 'next/server';
import { loadConfig } from '@/lib/config';
import { ConfigMismatchError } from '@/lib/errors';
import { buildIndex } from '@/lib/indexer';
import { RetrievalService } from '@/lib/retrieval';
import { getRetrievalService } from '@/lib/services';
import { alignments, vocabularyEmbedder } from '@/lib/__fixtures__/corpus';
import { POST } from './route';

jest.mock('@/lib/services', () => ({
  getRetrievalService: jest.fn(),
  getCorpus: jest.fn(),
}));

function searchRequest(body: string): NextRequest {
  return new NextRequest('http://localhost/api/search', { method: 'POST', body });
}

describe('POST /api/search', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('returns validated hits', async () => {
    const embedder = vocabularyEmbedder(['an', 'emergency', 'passenger', 'train']);
    const { index, metadata, config } = await buildIndex(alignments, embedder);
    jest
      .mocked(getRetrievalService)
      .mockResolvedValue(
        new RetrievalService({ dir: 'memory', index, metadata, config }, embedder, undefined, loadConfig({}))
      );

    const response = await POST(searchRequest(JSON.stringify({ query: 'emergency', k: 1 })));
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.reranked).toBe(false);
    expect(body.hits).toHaveLength(1);
    expect(body.hits[0].vector_id).toBe(0);
  });

  it('rejects a body that is not JSON', async () => {
    const response = await POST(searchRequest('query=emergency'));

    expect(response.status).toBe(400);
    expect((await response.json()).error).toBe('Validation failed');
  });

  it('rejects an empty query', async () => {
    const response = await POST(searchRequest(JSON.stringify({ query: '   ' })));

    expect(response.status).toBe(400);
  });

  it('answers 409 when the index was built with another embedder', async () => {
    jest
      .mocked(getRetrievalService)
      .mockRejectedValue(
        new ConfigMismatchError('Query embedder does not match index: model b != a', { model_name: 'a' }, { model_name: 'b' })
      );

    const response = await POST(searchRequest(JSON.stringify({ query: 'emergency' })));

    expect(response.status).toBe(409);
    expect((await response.json()).expected).toEqual({ model_name: 'a' });
  });

  it('answers 500 when the index cannot be loaded', async () => {
    jest.mocked(getRetrievalService).mockRejectedValue(new Error('Cannot read data/indices/index_config.json'));

    const response = await POST(searchRequest(JSON.stringify({ query: 'emergency' })));

    expect(response.status).toBe(500);
    expect((await response.json()).error).toBe('Failed to search alignments');
  });
});
