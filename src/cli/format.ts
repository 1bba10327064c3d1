import type { AlignmentSummary } from "../lib/corpus";
import type { RetrievalResponse } from "../lib/retrieval";
import { truncate } from "../lib/utils";
import type { BuildStats, LookupResult } from "../types/schemas";

export function formatBuildStats(stats: BuildStats, outputDir: string): string {
  return [
    `Index written to ${outputDir}`,
    `  model:      ${stats.model_name}`,
    `  field:      ${stats.text_field}`,
    `  variant:    ${stats.index_variant}`,
    `  dimension:  ${stats.embedding_dim}`,
    `  indexed:    ${stats.num_indexed} of ${stats.num_alignments} (${stats.num_skipped} skipped)`,
  ].join("\n");
}

export function formatSearchResponse(response: RetrievalResponse, width = 120): string {
  if (response.hits.length === 0) {
    return `No results for "${response.query}"`;
  }

  const lines = response.hits.map((hit, i) => {
    const judge = "judge_score" in hit ? ` judge=${hit.judge_score.toFixed(2)}` : "";
    return [
      `${i + 1}. [${hit.record.part}] #${hit.vector_id} score=${hit.score.toFixed(4)}${judge}`,
      `   EN: ${truncate(hit.record.src_text, width)}`,
      `   IT: ${truncate(hit.record.tgt_text, width)}`,
    ].join("\n");
  });

  if (response.fallbackReason) {
    lines.push(`(rerank skipped: ${response.fallbackReason})`);
  }
  return lines.join("\n");
}

export function formatLookupResult(result: LookupResult): string {
  if (!result.found) {
    return `Not found: ${result.reason}`;
  }
  const match = result.exact ? "exact" : `nearest chunk ${result.matched_chunk_id}`;
  return [
    `Found in part ${result.part} (chunk ${result.query_chunk_id}, ${result.language}, ${match})`,
    `  type:       ${result.alignment_type}`,
    `  confidence: ${result.confidence.toFixed(2)}`,
    `  EN: ${result.src_text}`,
    `  IT: ${result.tgt_text}`,
  ].join("\n");
}

export function formatAlignmentSummary(summary: AlignmentSummary): string {
  const mean = summary.meanConfidence === null ? "n/a" : summary.meanConfidence.toFixed(3);
  const lines = [
    `Alignments: ${summary.total}`,
    `  validated:   ${summary.validated} (valid ${summary.valid}, invalid ${summary.invalid})`,
    `  errored:     ${summary.errored}`,
    `  unvalidated: ${summary.unvalidated}`,
    `  mean confidence: ${mean}`,
    "By type:",
    ...Object.entries(summary.byType).map(([type, count]) => `  ${type}: ${count}`),
    "By part:",
    ...Object.entries(summary.byPart).map(([part, count]) => `  ${part}: ${count}`),
  ];
  return lines.join("\n");
}
