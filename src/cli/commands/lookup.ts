import { Command } from "commander";
import { loadConfig } from "../../lib/config";
import { Corpus } from "../../lib/corpus";
import { formatLookupResult } from "../format";
import { writeStdout } from "../utils/terminal";

export function lookupCommand(): Command {
  return new Command("lookup")
    .description("Find the validated alignment containing a text excerpt")
    .argument("<excerpt>", "Text to look up, English or Italian")
    .option("--chunks <file>", "Chunks JSONL (default: CHUNKS_FILE)")
    .option("--alignments <file>", "Validated alignments JSONL (default: ALIGNMENTS_FILE)")
    .action(async (excerpt: string, options: { chunks?: string; alignments?: string }) => {
      const config = loadConfig();
      const corpus = await Corpus.fromFiles(
        options.chunks ?? config.chunksFile,
        options.alignments ?? config.alignmentsFile
      );
      writeStdout(formatLookupResult(corpus.lookup(excerpt)));
    });
}
