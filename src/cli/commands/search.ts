import { Command } from "commander";
import { RELEVANCE_SYSTEM_PROMPT } from "../../lib/aiPrompts";
import { loadConfig } from "../../lib/config";
import { loadIndex } from "../../lib/indexer";
import { createChatJudge, createOpenAIEmbedder } from "../../lib/openai";
import { RetrievalService } from "../../lib/retrieval";
import { assertCompatible } from "../../lib/searcher";
import { formatSearchResponse } from "../format";
import { parseChoice, parsePositiveInt, writeStdout } from "../utils/terminal";

interface SearchCommandOptions {
  indexDir?: string;
  k?: string;
  part?: string;
  filterMode: string;
  rerank: boolean;
}

export function searchCommand(): Command {
  return new Command("search")
    .description("Search validated alignments by meaning")
    .argument("<query>", "Query text")
    .option("--index-dir <dir>", "Index directory (default: INDEX_DIR)")
    .option("-k, --k <n>", "Number of results (default: DEFAULT_TOP_K)")
    .option("--part <part>", "Restrict results to one part, e.g. 001")
    .option("--filter-mode <mode>", "pre or post", "post")
    .option("--rerank", "Re-order candidates with the relevance judge", false)
    .action(async (query: string, options: SearchCommandOptions) => {
      const config = loadConfig();
      const filterMode = parseChoice(options.filterMode, ["pre", "post"] as const, "--filter-mode");
      const k = options.k === undefined ? undefined : parsePositiveInt(options.k, "-k");

      const loaded = await loadIndex(options.indexDir ?? config.indexDir);
      const embedder = createOpenAIEmbedder(config.embedding);
      assertCompatible(loaded.config, embedder);
      const judge = options.rerank ? createChatJudge(config.judge, RELEVANCE_SYSTEM_PROMPT) : undefined;

      const service = new RetrievalService(loaded, embedder, judge, config);
      const response = await service.search({
        query,
        k,
        part: options.part,
        filterMode,
        rerank: options.rerank,
      });

      writeStdout(formatSearchResponse(response));
    });
}
