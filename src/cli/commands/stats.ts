import { Command } from "commander";
import { summarizeAlignments } from "../../lib/corpus";
import { readAlignments } from "../../lib/jsonl";
import { formatAlignmentSummary } from "../format";
import { writeStdout } from "../utils/terminal";

export function statsCommand(): Command {
  return new Command("stats")
    .description("Show alignment type, part and validation counts")
    .argument("<alignments>", "Alignments JSONL file")
    .action(async (file: string) => {
      const { records, skipped } = await readAlignments(file);
      writeStdout(formatAlignmentSummary(summarizeAlignments(records)));
      if (skipped > 0) writeStdout(`Skipped ${skipped} invalid records`);
    });
}
