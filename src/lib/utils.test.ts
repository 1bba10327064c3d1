import { createHash } from "crypto";
import { TimeoutError } from "./errors";
import {
  batchRanges,
  hashContent,
  mapWithConcurrency,
  truncate,
  withTimeout,
} from "./utils";

describe("hashContent", () => {
  it("hashes text with sha256", () => {
    const text = '{"part":"001"}\n';

    expect(hashContent(text)).toBe(createHash("sha256").update(text).digest("hex"));
  });

  it("hashes bytes and text with the same content alike", () => {
    expect(hashContent(Buffer.from("alpha beta"))).toBe(hashContent("alpha beta"));
  });
});

describe("batchRanges", () => {
  it("splits a total into half-open ranges", () => {
    expect(batchRanges(7, 3)).toEqual([
      [0, 3],
      [3, 6],
      [6, 7],
    ]);
  });

  it("returns no ranges for an empty input", () => {
    expect(batchRanges(0, 32)).toEqual([]);
  });
});

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(async () => 42, 1000, "answer")).resolves.toBe(42);
  });

  it("rejects with a TimeoutError when the call never settles", async () => {
    const never = () => new Promise<number>(() => undefined);

    await expect(withTimeout(never, 10, "judge call")).rejects.toBeInstanceOf(TimeoutError);
    await expect(withTimeout(never, 10, "judge call")).rejects.toThrow(
      "judge call timed out after 10ms"
    );
  });

  it("aborts the call's signal on timeout", async () => {
    let received: AbortSignal | undefined;

    await expect(
      withTimeout(
        (signal) => {
          received = signal;
          return new Promise<number>(() => undefined);
        },
        10,
        "judge call"
      )
    ).rejects.toThrow(TimeoutError);

    expect(received?.aborted).toBe(true);
  });

  it("leaves the signal alone when the call finishes in time", async () => {
    let received: AbortSignal | undefined;

    await withTimeout(async (signal) => {
      received = signal;
      return "done";
    }, 1000, "judge call");

    expect(received?.aborted).toBe(false);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });

  it("handles an empty list", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe("truncate", () => {
  it("appends an ellipsis only when the text is cut", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
    expect(truncate("abc", 3)).toBe("abc");
  });
});
