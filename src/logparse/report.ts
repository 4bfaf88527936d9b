import type { BenchmarkResult, TimingSummary } from "./bench.js";
import type { AgentStats, EntryType, LogEntry, LogPattern, TimingStats } from "./types.js";

const PREVIEW_LENGTH = 60;

export const RULE = "-".repeat(80);
export const DOUBLE_RULE = "=".repeat(80);

const ENTRY_TYPE_LABELS: Record<EntryType, string> = {
  "agent-invocation": "AgentInvocation",
  info: "Info",
  warning: "Warning",
  error: "Error",
  decision: "Decision",
  unknown: "Unknown",
};

export function entryTypeLabel(entryType: EntryType): string {
  return ENTRY_TYPE_LABELS[entryType];
}

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC.
 */
export function formatTimestamp(timestamp: Date): string {
  return timestamp.toISOString().slice(0, 19).replace("T", " ");
}

export function truncateMessage(message: string, max = PREVIEW_LENGTH): string {
  return message.length > max ? `${message.slice(0, max)}...` : message;
}

/**
 * One-line preview with agent and duration detail lines when present.
 */
export function formatEntry(entry: LogEntry, index: number): string[] {
  const when = formatTimestamp(entry.timestamp);
  const lines = [
    `[${index}] ${when} | ${entryTypeLabel(entry.entryType)} | ${truncateMessage(entry.message)}`,
  ];
  if (entry.agentName !== undefined) {
    lines.push(`    Agent: ${entry.agentName}`);
  }
  if (entry.durationMs !== undefined) {
    lines.push(`    Duration: ${entry.durationMs}ms`);
  }
  return lines;
}

export function formatEntryTypeCounts(counts: ReadonlyArray<[EntryType, number]>): string[] {
  return counts.map(([entryType, count]) => `  ${entryTypeLabel(entryType)}: ${count}`);
}

export function formatTimingStats(stats: TimingStats): string[] {
  return [
    "Timing Statistics:",
    `  Total duration: ${stats.totalDurationSecs.toFixed(2)} seconds`,
    `  Entry count: ${stats.entryCount}`,
    `  Avg time between entries: ${stats.avgTimeBetweenEntries.toFixed(2)}s`,
  ];
}

/**
 * Agents are listed by name.
 */
export function formatAgentStats(stats: readonly AgentStats[]): string[] {
  const lines = ["Agent Statistics:"];
  if (stats.length === 0) {
    lines.push("  No agent invocations found");
    return lines;
  }
  const sorted = [...stats].sort((a, b) => a.name.localeCompare(b.name));
  for (const agent of sorted) {
    lines.push(
      `  ${agent.name}`,
      `    Invocations: ${agent.invocationCount}`,
      `    Total duration: ${agent.totalDurationMs}ms`,
      `    Avg duration: ${agent.avgDurationMs.toFixed(2)}ms`,
    );
  }
  return lines;
}

export function describePattern(pattern: LogPattern): string {
  switch (pattern.kind) {
    case "error-burst":
      return `Error burst: ${pattern.count} errors in ${pattern.durationSecs.toFixed(2)}s`;
    case "long-gap":
      return `Long gap: ${pattern.durationSecs.toFixed(2)}s without entries`;
    case "agent-activity":
      return `High agent activity: ${pattern.agent} (${pattern.count} invocations)`;
    case "no-agent-activity":
      return "No agent activity in session";
  }
}

export function formatPatterns(patterns: readonly LogPattern[]): string[] {
  if (patterns.length === 0) {
    return ["Pattern Detection:", "  No significant patterns detected"];
  }
  return ["Pattern Detection:", ...patterns.map((p) => `  ${describePattern(p)}`)];
}

function formatSummary(label: string, summary: TimingSummary): string[] {
  return [
    `${label}:`,
    `  Average time: ${summary.avgMs.toFixed(2)}ms`,
    `  Min time: ${summary.minMs.toFixed(2)}ms`,
    `  Max time: ${summary.maxMs.toFixed(2)}ms`,
  ];
}

export function formatBenchmark(result: BenchmarkResult): string[] {
  return [
    "Benchmark Results:",
    `  Iterations: ${result.iterations}`,
    `  Entries per parse: ${result.entryCount}`,
    ...formatSummary("Parse time", result.parse).map((line) => `  ${line}`),
    ...formatSummary("Analyzer time (all 3 analyzers)", result.analyze).map((line) => `  ${line}`),
  ];
}
