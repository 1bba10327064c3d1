/**
 * Server-side service instances for the route handlers
 *
 * Each is built on first use from the environment and then shared. The
 * objects themselves are immutable; a failed build is not cached so the
 * next request retries it.
 */

import { AppConfig, loadConfig } from "./config";
import { Corpus } from "./corpus";
import { loadIndex } from "./indexer";
import { createChatJudge, createOpenAIEmbedder } from "./openai";
import { RetrievalService } from "./retrieval";
import { assertCompatible } from "./searcher";
import { RELEVANCE_SYSTEM_PROMPT } from "./aiPrompts";

let retrievalService: Promise<RetrievalService> | null = null;
let corpus: Promise<Corpus> | null = null;

export async function createRetrievalService(config: Readonly<AppConfig>): Promise<RetrievalService> {
  const loaded = await loadIndex(config.indexDir);
  const embedder = createOpenAIEmbedder(config.embedding);
  assertCompatible(loaded.config, embedder);
  const judge = createChatJudge(config.judge, RELEVANCE_SYSTEM_PROMPT);
  return new RetrievalService(loaded, embedder, judge, config);
}

export const getRetrievalService = (): Promise<RetrievalService> => {
  if (!retrievalService) {
    retrievalService = createRetrievalService(loadConfig()).catch((error: unknown) => {
      retrievalService = null;
      throw error;
    });
  }
  return retrievalService;
};

export const getCorpus = (): Promise<Corpus> => {
  if (!corpus) {
    const config = loadConfig();
    corpus = Corpus.fromFiles(config.chunksFile, config.alignmentsFile).catch((error: unknown) => {
      corpus = null;
      throw error;
    });
  }
  return corpus;
};
