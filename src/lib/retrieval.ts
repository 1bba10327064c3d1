import type { AppConfig } from "./config";
import type { Embedder } from "./embeddings";
import { RerankError } from "./errors";
import type { LoadedIndex } from "./indexer";
import type { Judge } from "./openai";
import { rerank, RerankOptions } from "./reranker";
import { FilterMode, partFilter, search, SearchOptions } from "./searcher";
import type { RerankedHit, RerankFailure, SearchHit } from "../types/schemas";

export interface RetrievalRequest {
  query: string;
  k?: number;
  part?: string;
  filterMode?: FilterMode;
  rerank?: boolean;
}

export interface RetrievalResponse {
  query: string;
  hits: Array<SearchHit | RerankedHit>;
  reranked: boolean;
  rerankFailures: RerankFailure[];
  fallbackReason?: string;
}

export interface SearchAndRerankOptions {
  search?: SearchOptions;
  /** Candidates fetched for the judge */
  rerankTopK?: number;
  rerank?: RerankOptions;
}

/**
 * Similarity search, then optional judge re-ranking. A rerank that scores
 * too few candidates falls back to the similarity order.
 */
export async function searchAndRerank(
  query: string,
  loaded: LoadedIndex,
  embedder: Embedder,
  judge: Judge | undefined,
  options: SearchAndRerankOptions = {}
): Promise<RetrievalResponse> {
  const searchOptions = options.search ?? {};

  if (!judge) {
    const hits = await search(query, loaded, embedder, searchOptions);
    return { query, hits, reranked: false, rerankFailures: [] };
  }

  const candidates = await search(query, loaded, embedder, {
    ...searchOptions,
    k: options.rerankTopK ?? searchOptions.k,
  });
  const topN = options.rerank?.topN ?? searchOptions.k ?? candidates.length;

  try {
    const { hits, failures } = await rerank(query, candidates, judge, { ...options.rerank, topN });
    return { query, hits, reranked: true, rerankFailures: failures };
  } catch (error) {
    if (!(error instanceof RerankError)) throw error;
    console.warn(`Rerank failed, using similarity order: ${error.message}`);
    return {
      query,
      hits: candidates.slice(0, topN),
      reranked: false,
      rerankFailures: [],
      fallbackReason: error.message,
    };
  }
}

/**
 * Loaded index plus the collaborators needed to query it.
 * Constructed once; holds no mutable state.
 */
export class RetrievalService {
  constructor(
    readonly loaded: LoadedIndex,
    readonly embedder: Embedder,
    readonly judge: Judge | undefined,
    readonly config: Readonly<AppConfig>
  ) {
    Object.freeze(this);
  }

  async search(request: RetrievalRequest): Promise<RetrievalResponse> {
    const { search: settings, rerank: rerankSettings } = this.config;
    const useRerank = (request.rerank ?? rerankSettings.enabled) && this.judge !== undefined;
    const k = request.k ?? (useRerank ? rerankSettings.topN : settings.defaultTopK);

    return searchAndRerank(request.query, this.loaded, this.embedder, useRerank ? this.judge : undefined, {
      search: {
        k,
        maxTopK: settings.maxTopK,
        similarityThreshold: settings.similarityThreshold || undefined,
        filter: request.part ? partFilter(request.part) : undefined,
        filterMode: request.filterMode,
      },
      rerankTopK: Math.max(rerankSettings.topK, k),
      rerank: {
        topN: k,
        minCandidates: rerankSettings.minCandidates,
        maxConcurrency: rerankSettings.maxConcurrency,
        timeoutMs: this.config.judge.timeoutMs,
      },
    });
  }
}
