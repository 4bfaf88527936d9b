import { performance } from "node:perf_hooks";
import { analyzeSession } from "./analyzers/index.js";
import { parseLogFile } from "./parsers/file.js";
import { createSession } from "./session.js";

export type TimingSummary = {
  avgMs: number;
  minMs: number;
  maxMs: number;
};

export type BenchmarkResult = {
  file: string;
  iterations: number;
  entryCount: number;
  parse: TimingSummary;
  analyze: TimingSummary;
};

export type BenchmarkOptions = {
  /** Called after each parse iteration, 1-based. */
  onProgress?: (iteration: number, total: number) => void;
  /** Injectable clock in milliseconds. */
  now?: () => number;
};

export function summarizeTimings(samples: readonly number[]): TimingSummary {
  if (samples.length === 0) {
    return { avgMs: 0, minMs: 0, maxMs: 0 };
  }
  let total = 0;
  let minMs = Infinity;
  let maxMs = -Infinity;
  for (const sample of samples) {
    total += sample;
    minMs = Math.min(minMs, sample);
    maxMs = Math.max(maxMs, sample);
  }
  return { avgMs: total / samples.length, minMs, maxMs };
}

/**
 * Times `iterations` parses of `file`, then `iterations` runs of all three
 * analyzers over the parsed session. One untimed parse runs first as a
 * warm-up. Dropped lines are not reported.
 */
export async function runBenchmark(
  file: string,
  iterations: number,
  options: BenchmarkOptions = {},
): Promise<BenchmarkResult> {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new RangeError(`iterations must be a positive integer, got ${iterations}`);
  }
  const now = options.now ?? (() => performance.now());
  const quiet = { onWarning: () => undefined };

  const parseTimes: number[] = [];
  let entries = await parseLogFile(file, quiet);
  for (let i = 0; i < iterations; i++) {
    const start = now();
    entries = await parseLogFile(file, quiet);
    parseTimes.push(now() - start);
    options.onProgress?.(i + 1, iterations);
  }

  const session = createSession("bench", entries);
  const analyzeTimes: number[] = [];
  for (let i = 0; i < iterations; i++) {
    const start = now();
    analyzeSession(session);
    analyzeTimes.push(now() - start);
  }

  return {
    file,
    iterations,
    entryCount: entries.length,
    parse: summarizeTimings(parseTimes),
    analyze: summarizeTimings(analyzeTimes),
  };
}
