import { createHash } from "crypto";
import { TimeoutError } from "./errors";

/**
 * Compute SHA-256 hash of file content
 * Recorded in the index config so a build can be traced to its input
 */
export function hashContent(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Generate ISO-8601 timestamp
 */
export function getCurrentTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Run a call with a deadline. On timeout the call's signal is aborted and
 * the result rejects with a TimeoutError. The timer is always cleared.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Map over items with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workers = Array.from(
    { length: Math.min(Math.max(1, limit), items.length) },
    () => worker()
  );
  await Promise.all(workers);

  return results;
}

/**
 * Split [0, total) into consecutive [start, end) ranges of at most `size`
 */
export function batchRanges(total: number, size: number): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  const step = Math.max(1, Math.floor(size));
  for (let start = 0; start < total; start += step) {
    ranges.push([start, Math.min(start + step, total)]);
  }
  return ranges;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.substring(0, max)}...` : text;
}
