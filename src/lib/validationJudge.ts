import { z } from "zod";
import { buildValidationPrompt, extractJsonObject } from "./aiPrompts";
import { errorMessage } from "./errors";
import type { Judge } from "./openai";
import { mapWithConcurrency, withTimeout } from "./utils";
import type { Alignment, ValidationVerdict } from "../types/schemas";

/**
 * Validation judge
 * Asks an instruction model whether each alignment's target text is a
 * retrievable match for its source text and writes the verdict back.
 */

export interface ValidateOptions {
  srcLanguage?: string;
  tgtLanguage?: string;
  /** Only the first maxRecords records are processed and returned */
  maxRecords?: number;
  concurrency?: number;
  timeoutMs?: number;
  verbose?: boolean;
  logEvery?: number;
}

export interface ValidationSummary {
  processed: number;
  valid: number;
  invalid: number;
  errored: number;
  meanConfidence: number | null;
}

const judgeVerdictSchema = z.object({
  is_valid_alignment: z.union([
    z.boolean(),
    z.enum(["true", "false"]).transform((value) => value === "true"),
  ]),
  confidence: z.coerce.number().refine(Number.isFinite, "confidence must be a number"),
  reason: z.string().default(""),
});

/**
 * Parse the judge reply into a successful verdict
 * @throws Error when the reply holds no usable verdict
 */
export function parseVerdict(reply: string): ValidationVerdict {
  const result = judgeVerdictSchema.safeParse(extractJsonObject(reply));
  if (!result.success) {
    throw new Error(`Unparsable verdict: ${reply.slice(0, 120)}`);
  }

  const { is_valid_alignment, confidence, reason } = result.data;
  return {
    is_valid_alignment,
    confidence: Math.min(1, Math.max(0, confidence)),
    reason,
    validation_success: true,
    error: null,
  };
}

export function failedVerdict(error: unknown): ValidationVerdict {
  return {
    is_valid_alignment: false,
    confidence: 0,
    reason: "",
    validation_success: false,
    error: errorMessage(error),
  };
}

export class SummaryTracker {
  private processed = 0;
  private valid = 0;
  private invalid = 0;
  private errored = 0;
  private confidenceSum = 0;

  record(verdict: ValidationVerdict): void {
    this.processed++;
    if (!verdict.validation_success) {
      this.errored++;
      return;
    }
    this.confidenceSum += verdict.confidence;
    if (verdict.is_valid_alignment) this.valid++;
    else this.invalid++;
  }

  summary(): ValidationSummary {
    const successful = this.valid + this.invalid;
    return {
      processed: this.processed,
      valid: this.valid,
      invalid: this.invalid,
      errored: this.errored,
      meanConfidence: successful > 0 ? this.confidenceSum / successful : null,
    };
  }
}

export function formatSummary(summary: ValidationSummary): string {
  const mean = summary.meanConfidence === null ? "n/a" : summary.meanConfidence.toFixed(3);
  return `processed=${summary.processed} valid=${summary.valid} invalid=${summary.invalid} errored=${summary.errored} mean_confidence=${mean}`;
}

/**
 * Validate alignments one judge call each. Judge errors become failed
 * verdicts on that record; the batch always completes.
 */
export async function validateAlignments(
  alignments: readonly Alignment[],
  judge: Judge,
  options: ValidateOptions = {}
): Promise<{ records: Alignment[]; summary: ValidationSummary }> {
  const {
    srcLanguage = "en",
    tgtLanguage = "it",
    maxRecords,
    concurrency = 1,
    timeoutMs = 30_000,
    verbose = false,
    logEvery = 10,
  } = options;

  const selected = maxRecords === undefined ? alignments : alignments.slice(0, Math.max(0, maxRecords));
  const tracker = new SummaryTracker();

  console.log(`Validating ${selected.length} alignments (${srcLanguage} -> ${tgtLanguage})`);

  const records = await mapWithConcurrency(selected, concurrency, async (alignment, i) => {
    let verdict: ValidationVerdict;
    try {
      const prompt = buildValidationPrompt({
        srcLanguage,
        tgtLanguage,
        srcText: alignment.src_text,
        tgtText: alignment.tgt_text,
      });
      const reply = await withTimeout(
        (signal) => judge(prompt, { signal }),
        timeoutMs,
        `Validation judge for record ${i}`
      );
      verdict = parseVerdict(reply);
    } catch (error) {
      console.error(`Validation failed for record ${i}:`, errorMessage(error));
      verdict = failedVerdict(error);
    }

    tracker.record(verdict);
    const done = tracker.summary();
    if (verbose && done.processed % logEvery === 0) {
      console.log(`[${done.processed}/${selected.length}] ${formatSummary(done)}`);
    }

    return { ...alignment, validation: verdict };
  });

  const summary = tracker.summary();
  console.log(`Validation complete: ${formatSummary(summary)}`);
  return { records, summary };
}
