import OpenAI from "openai";
import type { AppConfig } from "./config";
import type { Embedder } from "./embeddings";

/**
 * OpenAI-compatible clients for the embedding and judge services
 * Both accept a base URL so self-hosted servers can stand in for OpenAI
 */

export interface JudgeCallOptions {
  /** Aborts the underlying request */
  signal?: AbortSignal;
}

export type Judge = (prompt: string, options?: JudgeCallOptions) => Promise<string>;

interface ClientOptions {
  apiKey: string | undefined;
  baseURL?: string;
  timeoutMs: number;
}

/**
 * Get or initialize OpenAI client
 */
function getOpenAIClient({ apiKey, baseURL, timeoutMs }: ClientOptions): OpenAI {
  if (!apiKey && !baseURL) {
    throw new Error("OPENAI_API_KEY not configured");
  }

  return new OpenAI({
    apiKey: apiKey ?? "EMPTY",
    baseURL,
    timeout: timeoutMs,
    maxRetries: 0,
  });
}

export function createOpenAIEmbedder(config: AppConfig["embedding"]): Embedder {
  const client = getOpenAIClient(config);
  const { model, dimension } = config;

  return {
    modelName: model,
    dimension,
    async embed(texts: string[]): Promise<number[][]> {
      if (texts.length === 0) return [];

      const response = await client.embeddings.create({
        model,
        input: texts,
        ...(dimension ? { dimensions: dimension } : {}),
      });

      return [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);
    },
  };
}

/**
 * Judge backed by a chat completion endpoint
 * @returns The raw reply text; callers parse it
 */
export function createChatJudge(config: AppConfig["judge"], systemPrompt?: string): Judge {
  const client = getOpenAIClient(config);

  return async (prompt: string, options: JudgeCallOptions = {}): Promise<string> => {
    const response = await client.chat.completions.create(
      {
        model: config.model,
        messages: [
          ...(systemPrompt ? [{ role: "system" as const, content: systemPrompt }] : []),
          { role: "user" as const, content: prompt },
        ],
        temperature: config.temperature,
        max_tokens: config.maxTokens,
      },
      { signal: options.signal }
    );

    const result = response.choices[0]?.message?.content;
    if (!result) {
      throw new Error("Judge returned an empty response");
    }
    return result;
  };
}
