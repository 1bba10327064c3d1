import { readFile } from "fs/promises";
import { Command } from "commander";
import { loadConfig } from "../../lib/config";
import { buildIndex, saveIndex } from "../../lib/indexer";
import { readAlignments } from "../../lib/jsonl";
import { createOpenAIEmbedder } from "../../lib/openai";
import { hashContent } from "../../lib/utils";
import { INDEX_VARIANTS, TEXT_FIELDS } from "../../types/schemas";
import { formatBuildStats } from "../format";
import { parseChoice, parsePositiveInt, writeStdout } from "../utils/terminal";

interface BuildIndexOptions {
  outputDir?: string;
  textField: string;
  model?: string;
  batchSize: string;
  variant: string;
  nlist: string;
  nprobe: string;
  normalize: boolean;
}

export function buildIndexCommand(): Command {
  return new Command("build-index")
    .description("Embed alignments and write a searchable index")
    .argument("<input>", "Alignments JSONL file")
    .option("--output-dir <dir>", "Index directory (default: INDEX_DIR)")
    .option("--text-field <field>", "Field to embed: src_text or tgt_text", "src_text")
    .option("--model <name>", "Embedding model (default: EMBEDDING_MODEL)")
    .option("--batch-size <n>", "Texts per embedding request", "32")
    .option("--variant <variant>", "auto, flat-ip, flat-l2 or ivf", "auto")
    .option("--nlist <n>", "IVF cluster count", "100")
    .option("--nprobe <n>", "IVF clusters probed per query", "10")
    .option("--no-normalize", "Keep raw embedding norms (uses flat-l2)")
    .action(async (input: string, options: BuildIndexOptions) => {
      const config = loadConfig();
      const outputDir = options.outputDir ?? config.indexDir;

      const textField = parseChoice(options.textField, TEXT_FIELDS, "--text-field");
      const variant = parseChoice(options.variant, ["auto", ...INDEX_VARIANTS] as const, "--variant");
      const batchSize = parsePositiveInt(options.batchSize, "--batch-size");
      const nlist = parsePositiveInt(options.nlist, "--nlist");
      const nprobe = parsePositiveInt(options.nprobe, "--nprobe");

      const [raw, { records }] = await Promise.all([readFile(input), readAlignments(input)]);
      const embedder = createOpenAIEmbedder({
        ...config.embedding,
        model: options.model ?? config.embedding.model,
      });

      const built = await buildIndex(records, embedder, {
        textField,
        batchSize,
        normalize: options.normalize,
        variant,
        nlist,
        nprobe,
        sourceHash: hashContent(raw),
      });
      await saveIndex(outputDir, built);

      writeStdout(formatBuildStats(built.stats, outputDir));
    });
}
