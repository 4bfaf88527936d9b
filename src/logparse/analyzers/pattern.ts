import type { LogEntry, LogPattern, LogSession, PatternAnalysis } from "../types.js";
import { secondsBetween, type Analyzer } from "./types.js";

const BURST_WINDOW = 3;

export type PatternThresholds = {
  /** Errors per second at or above which a window of three errors is a burst. */
  errorBurstThreshold: number;
  /** Seconds between adjacent entries above which a gap is reported. */
  longGapThreshold: number;
  /** Invocation count at or above which an agent is reported. */
  agentActivityThreshold: number;
};

export const DEFAULT_PATTERN_THRESHOLDS: Readonly<PatternThresholds> = {
  errorBurstThreshold: 5.0,
  longGapThreshold: 300.0,
  agentActivityThreshold: 10,
};

/**
 * Detects error bursts, long gaps, busy agents and sessions with no agent
 * activity.
 */
export class PatternAnalyzer implements Analyzer<PatternAnalysis> {
  readonly name = "PatternAnalyzer";
  readonly thresholds: Readonly<PatternThresholds>;

  constructor(thresholds: Partial<PatternThresholds> = {}) {
    this.thresholds = {
      errorBurstThreshold:
        thresholds.errorBurstThreshold ?? DEFAULT_PATTERN_THRESHOLDS.errorBurstThreshold,
      longGapThreshold: thresholds.longGapThreshold ?? DEFAULT_PATTERN_THRESHOLDS.longGapThreshold,
      agentActivityThreshold:
        thresholds.agentActivityThreshold ?? DEFAULT_PATTERN_THRESHOLDS.agentActivityThreshold,
    };
  }

  /**
   * Slides a window of three over the error entries only. Every qualifying
   * window is reported, so overlapping bursts repeat.
   */
  detectErrorBursts(entries: readonly LogEntry[]): LogPattern[] {
    const errors = entries.filter((e) => e.entryType === "error");
    const patterns: LogPattern[] = [];

    for (let start = 0; start + BURST_WINDOW <= errors.length; start++) {
      const first = errors[start];
      const last = errors[start + BURST_WINDOW - 1];
      if (!first || !last) {
        continue;
      }
      const durationSecs = secondsBetween(first.timestamp, last.timestamp);
      if (durationSecs > 0 && BURST_WINDOW / durationSecs >= this.thresholds.errorBurstThreshold) {
        patterns.push({ kind: "error-burst", count: BURST_WINDOW, durationSecs });
      }
    }

    return patterns;
  }

  detectLongGaps(entries: readonly LogEntry[]): LogPattern[] {
    const patterns: LogPattern[] = [];
    for (let i = 1; i < entries.length; i++) {
      const prev = entries[i - 1];
      const next = entries[i];
      if (!prev || !next) {
        continue;
      }
      const gap = secondsBetween(prev.timestamp, next.timestamp);
      if (gap > this.thresholds.longGapThreshold) {
        patterns.push({ kind: "long-gap", durationSecs: gap });
      }
    }
    return patterns;
  }

  detectAgentActivity(entries: readonly LogEntry[]): LogPattern[] {
    const counts = new Map<string, number>();
    for (const entry of entries) {
      if (entry.agentName !== undefined) {
        counts.set(entry.agentName, (counts.get(entry.agentName) ?? 0) + 1);
      }
    }

    const patterns: LogPattern[] = [];
    for (const [agent, count] of counts) {
      if (count >= this.thresholds.agentActivityThreshold) {
        patterns.push({ kind: "agent-activity", agent, count });
      }
    }
    return patterns;
  }

  detectNoAgentActivity(entries: readonly LogEntry[]): LogPattern | null {
    if (entries.length === 0) {
      return null;
    }
    const hasAgents = entries.some((e) => e.agentName !== undefined);
    return hasAgents ? null : { kind: "no-agent-activity" };
  }

  analyze(session: LogSession): PatternAnalysis {
    const patterns = [
      ...this.detectErrorBursts(session.entries),
      ...this.detectLongGaps(session.entries),
      ...this.detectAgentActivity(session.entries),
    ];

    const noAgents = this.detectNoAgentActivity(session.entries);
    if (noAgents) {
      patterns.push(noAgents);
    }

    return { patterns };
  }
}
