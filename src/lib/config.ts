import path from "path";
import { z } from "zod";

/**
 * Runtime configuration, read from environment variables.
 *
 * The judge is any OpenAI-compatible chat endpoint; by default a
 * self-hosted instruction model at http://JUDGE_HOST:JUDGE_PORT/v1.
 */

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  DATA_DIR: z.string().default("data"),
  CHUNKS_FILE: z.string().optional(),
  ALIGNMENTS_FILE: z.string().optional(),
  INDEX_DIR: z.string().optional(),

  OPENAI_API_KEY: z.string().optional(),
  EMBEDDING_BASE_URL: z.string().url().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().optional(),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  JUDGE_HOST: z.string().default("localhost"),
  JUDGE_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  JUDGE_BASE_URL: z.string().url().optional(),
  JUDGE_API_KEY: z.string().optional(),
  JUDGE_MODEL: z.string().default("Qwen/Qwen2.5-32B-Instruct-AWQ"),
  JUDGE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  JUDGE_MAX_TOKENS: z.coerce.number().int().positive().default(200),
  JUDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  RERANK_ENABLED: booleanFlag.default("false"),
  RERANK_TOP_K: z.coerce.number().int().positive().default(20),
  RERANK_TOP_N: z.coerce.number().int().positive().default(5),
  RERANK_MIN_CANDIDATES: z.coerce.number().int().min(0).default(1),
  RERANK_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),

  DEFAULT_TOP_K: z.coerce.number().int().positive().default(10),
  MAX_TOP_K: z.coerce.number().int().positive().default(100),
  SIMILARITY_THRESHOLD: z.coerce.number().default(0),
});

export interface AppConfig {
  dataDir: string;
  chunksFile: string;
  alignmentsFile: string;
  indexDir: string;
  embedding: {
    apiKey: string | undefined;
    baseURL: string | undefined;
    model: string;
    dimension: number | undefined;
    timeoutMs: number;
  };
  judge: {
    host: string;
    port: number;
    baseURL: string;
    apiKey: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
  };
  rerank: {
    enabled: boolean;
    topK: number;
    topN: number;
    minCandidates: number;
    maxConcurrency: number;
  };
  search: {
    defaultTopK: number;
    maxTopK: number;
    similarityThreshold: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function judgeBaseURL(host: string, port: number): string {
  return `http://${host}:${port}/v1`;
}

/**
 * Parse configuration from an environment map
 * @throws ConfigError listing every offending variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;
  const config: AppConfig = {
    dataDir: e.DATA_DIR,
    chunksFile: e.CHUNKS_FILE ?? path.join(e.DATA_DIR, "chunks.jsonl"),
    alignmentsFile: e.ALIGNMENTS_FILE ?? path.join(e.DATA_DIR, "alignment_results.validated.jsonl"),
    indexDir: e.INDEX_DIR ?? path.join(e.DATA_DIR, "indices"),
    embedding: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.EMBEDDING_BASE_URL,
      model: e.EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIMENSION,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    judge: {
      host: e.JUDGE_HOST,
      port: e.JUDGE_PORT,
      baseURL: e.JUDGE_BASE_URL ?? judgeBaseURL(e.JUDGE_HOST, e.JUDGE_PORT),
      // Self-hosted servers ignore the key but the client requires one
      apiKey: e.JUDGE_API_KEY ?? "EMPTY",
      model: e.JUDGE_MODEL,
      temperature: e.JUDGE_TEMPERATURE,
      maxTokens: e.JUDGE_MAX_TOKENS,
      timeoutMs: e.JUDGE_TIMEOUT_MS,
    },
    rerank: {
      enabled: e.RERANK_ENABLED,
      topK: e.RERANK_TOP_K,
      topN: e.RERANK_TOP_N,
      minCandidates: e.RERANK_MIN_CANDIDATES,
      maxConcurrency: e.RERANK_MAX_CONCURRENCY,
    },
    search: {
      defaultTopK: e.DEFAULT_TOP_K,
      maxTopK: e.MAX_TOP_K,
      similarityThreshold: e.SIMILARITY_THRESHOLD,
    },
  };

  return Object.freeze(config);
}
