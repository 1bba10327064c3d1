import { writeFile } from "fs/promises";
import { Command } from "commander";
import { VALIDATION_SYSTEM_PROMPT } from "../../lib/aiPrompts";
import { AppConfig, judgeBaseURL, loadConfig } from "../../lib/config";
import { readAlignments, toJSONL } from "../../lib/jsonl";
import { createChatJudge } from "../../lib/openai";
import { formatSummary, validateAlignments } from "../../lib/validationJudge";
import { LANGUAGES } from "../../types/schemas";
import { parseChoice, parsePositiveInt, writeStdout } from "../utils/terminal";

interface ValidateCommandOptions {
  host?: string;
  port?: string;
  srcLang: string;
  tgtLang: string;
  maxRecords?: string;
  concurrency: string;
  verbose: boolean;
}

/**
 * --host and --port override JUDGE_HOST and JUDGE_PORT one at a time;
 * without either, the configured base URL is used as is
 */
export function resolveJudgeBaseURL(
  options: { host?: string; port?: string },
  judge: AppConfig["judge"]
): string {
  if (options.host === undefined && options.port === undefined) {
    return judge.baseURL;
  }
  const port = options.port === undefined ? judge.port : parsePositiveInt(options.port, "--port");
  return judgeBaseURL(options.host ?? judge.host, port);
}

export function validateCommand(): Command {
  return new Command("validate")
    .description("Ask the judge model whether each alignment is a valid match")
    .argument("<input>", "Alignments JSONL file")
    .argument("<output>", "Validated JSONL file to write")
    .option("--host <host>", "Judge server host (default: JUDGE_HOST)")
    .option("--port <port>", "Judge server port (default: JUDGE_PORT)")
    .option("--src-lang <code>", "Source language", "en")
    .option("--tgt-lang <code>", "Target language", "it")
    .option("--max-records <n>", "Validate only the first n records")
    .option("--concurrency <n>", "Judge requests in flight", "1")
    .option("--verbose", "Log a running summary", false)
    .action(async (input: string, output: string, options: ValidateCommandOptions) => {
      const config = loadConfig();
      const srcLanguage = parseChoice(options.srcLang, LANGUAGES, "--src-lang");
      const tgtLanguage = parseChoice(options.tgtLang, LANGUAGES, "--tgt-lang");
      const maxRecords =
        options.maxRecords === undefined ? undefined : parsePositiveInt(options.maxRecords, "--max-records");
      const concurrency = parsePositiveInt(options.concurrency, "--concurrency");

      const baseURL = resolveJudgeBaseURL(options, config.judge);
      const judge = createChatJudge({ ...config.judge, baseURL }, VALIDATION_SYSTEM_PROMPT);

      const { records } = await readAlignments(input);
      const result = await validateAlignments(records, judge, {
        srcLanguage,
        tgtLanguage,
        maxRecords,
        concurrency,
        timeoutMs: config.judge.timeoutMs,
        verbose: options.verbose,
      });

      await writeFile(output, toJSONL(result.records), "utf-8");
      writeStdout(`Wrote ${result.records.length} records to ${output}`);
      writeStdout(formatSummary(result.summary));
    });
}
