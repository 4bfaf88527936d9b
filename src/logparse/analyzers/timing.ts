import type { LogEntry, LogSession, TimingStats } from "../types.js";
import type { Analyzer } from "./types.js";

function calculateDuration(entries: readonly LogEntry[]): number {
  if (entries.length === 0) {
    return 0;
  }
  let min = Infinity;
  let max = -Infinity;
  for (const entry of entries) {
    const ms = entry.timestamp.getTime();
    min = Math.min(min, ms);
    max = Math.max(max, ms);
  }
  return (max - min) / 1000;
}

/**
 * Averages adjacent deltas in arrival order. Out-of-order input shows up in
 * the result; entries are not sorted first.
 */
function avgTimeBetweenEntries(entries: readonly LogEntry[]): number {
  if (entries.length < 2) {
    return 0;
  }
  let totalMs = 0;
  for (let i = 1; i < entries.length; i++) {
    const prev = entries[i - 1];
    const next = entries[i];
    if (prev && next) {
      totalMs += next.timestamp.getTime() - prev.timestamp.getTime();
    }
  }
  return totalMs / 1000 / (entries.length - 1);
}

export class TimingAnalyzer implements Analyzer<TimingStats> {
  readonly name = "TimingAnalyzer";

  analyze(session: LogSession): TimingStats {
    return {
      totalDurationSecs: calculateDuration(session.entries),
      entryCount: session.entries.length,
      avgTimeBetweenEntries: avgTimeBetweenEntries(session.entries),
    };
  }
}
