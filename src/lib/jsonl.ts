import fs from "fs/promises";
import type { ZodType, ZodTypeDef } from "zod";
import {
  Alignment,
  alignmentSchema,
  Chunk,
  chunkSchema,
  ValidatedAlignment,
} from "../types/schemas";

export interface ParsedJSONL {
  values: unknown[];
  malformed: number;
}

export interface LoadedRecords<T> {
  records: T[];
  skipped: number;
}

/**
 * Parse JSONL text (one JSON object per line)
 * @returns Parsed values plus the number of lines that were not valid JSON
 */
export function parseJSONL(text: string): ParsedJSONL {
  let normalizedText = text;

  // Handle files saved as a JSON string or array.
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "string") {
      normalizedText = parsed;
    } else if (Array.isArray(parsed)) {
      return { values: parsed, malformed: 0 };
    } else if (parsed && typeof parsed === "object") {
      return { values: [parsed], malformed: 0 };
    }
  } catch {
    // Not a single JSON document; treat as JSONL text.
  }

  const lines = normalizedText.split(/\r?\n/).filter((line) => line.trim().length > 0);

  const values: unknown[] = [];
  let malformed = 0;
  lines.forEach((line, index) => {
    try {
      values.push(JSON.parse(line));
    } catch (error) {
      malformed++;
      console.warn(`Skipping invalid JSON at line ${index + 1}:`, error);
    }
  });

  return { values, malformed };
}

/**
 * Validate parsed values against a schema, dropping the ones that fail
 */
export function validateRecords<T>(
  values: unknown[],
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): LoadedRecords<T> {
  const records: T[] = [];
  let skipped = 0;

  values.forEach((value, index) => {
    const result = schema.safeParse(value);
    if (result.success) {
      records.push(result.data);
    } else {
      skipped++;
      console.warn(
        `Skipping ${label} record ${index + 1}: ${result.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
          .join("; ")}`
      );
    }
  });

  return { records, skipped };
}

export async function readJSONLFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  label: string
): Promise<LoadedRecords<T>> {
  const text = await fs.readFile(filePath, "utf-8");
  const { values, malformed } = parseJSONL(text);
  const { records, skipped } = validateRecords(values, schema, label);

  console.log(`Loaded ${records.length} ${label} records from ${filePath}`);
  if (malformed + skipped > 0) {
    console.warn(`Skipped ${malformed + skipped} ${label} lines in ${filePath}`);
  }

  return { records, skipped: malformed + skipped };
}

export function readChunks(filePath: string): Promise<LoadedRecords<Chunk>> {
  return readJSONLFile(filePath, chunkSchema, "chunk");
}

export function readAlignments(filePath: string): Promise<LoadedRecords<Alignment>> {
  return readJSONLFile(filePath, alignmentSchema, "alignment");
}

export function toJSONL(records: readonly unknown[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n") + (records.length ? "\n" : "");
}

export function isValidated(alignment: Alignment): alignment is ValidatedAlignment {
  return alignment.validation?.validation_success === true;
}
