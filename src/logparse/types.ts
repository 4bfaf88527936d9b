/**
 * Kind of a parsed log line, derived from its level keyword.
 */
export type EntryType = "agent-invocation" | "info" | "warning" | "error" | "decision" | "unknown";

/**
 * One parsed log line.
 */
export type LogEntry = {
  readonly timestamp: Date;
  readonly entryType: EntryType;
  readonly message: string;
  readonly agentName?: string;
  /** Non-negative whole milliseconds. */
  readonly durationMs?: number;
};

/**
 * Ordered entries as they appeared in the source. Entries are never re-sorted.
 */
export type LogSession = {
  readonly id: string;
  readonly entries: readonly LogEntry[];
  readonly startTime: Date;
  readonly endTime?: Date;
};

export type TimingStats = {
  totalDurationSecs: number;
  entryCount: number;
  avgTimeBetweenEntries: number;
};

/**
 * Per-agent accumulator for one analysis pass.
 */
export class AgentStats {
  invocationCount = 0;
  totalDurationMs = 0;
  avgDurationMs = 0;

  constructor(readonly name: string) {}

  addDuration(durationMs: number): void {
    this.invocationCount += 1;
    this.totalDurationMs += durationMs;
    this.avgDurationMs = this.totalDurationMs / this.invocationCount;
  }

  /**
   * Counts an invocation with no known duration. Total and average are left
   * as they are, so the average is only refreshed by the next addDuration.
   */
  recordInvocation(): void {
    this.invocationCount += 1;
  }
}

export type LogPattern =
  | { kind: "error-burst"; count: number; durationSecs: number }
  | { kind: "long-gap"; durationSecs: number }
  | { kind: "agent-activity"; agent: string; count: number }
  | { kind: "no-agent-activity" };

export type PatternKind = LogPattern["kind"];

/**
 * Detected patterns: error bursts, long gaps, agent activity, then at most
 * one no-agent-activity marker.
 */
export type PatternAnalysis = {
  patterns: LogPattern[];
};

/**
 * Builds a frozen entry. Durations must be non-negative integers.
 */
export function createLogEntry(fields: {
  timestamp: Date;
  entryType: EntryType;
  message: string;
  agentName?: string;
  durationMs?: number;
}): LogEntry {
  const { durationMs } = fields;
  if (durationMs !== undefined && (!Number.isInteger(durationMs) || durationMs < 0)) {
    throw new RangeError(`durationMs must be a non-negative integer, got ${durationMs}`);
  }
  const entry: LogEntry = {
    timestamp: fields.timestamp,
    entryType: fields.entryType,
    message: fields.message,
    ...(fields.agentName !== undefined ? { agentName: fields.agentName } : {}),
    ...(durationMs !== undefined ? { durationMs } : {}),
  };
  return Object.freeze(entry);
}
