import { AgentStats, type LogEntry, type LogSession } from "../types.js";
import type { Analyzer } from "./types.js";

/**
 * Aggregates invocations per agent name.
 *
 * `analyze` uses a fresh accumulator on every call. The `process` /
 * `getAgentStats` / `clear` methods keep a running accumulator on the
 * instance for callers that fold several sessions together.
 *
 * Results come out in first-sighting order; sort by name where order matters.
 */
export class AgentAnalyzer implements Analyzer<AgentStats[]> {
  readonly name = "AgentAnalyzer";
  private readonly agentMap = new Map<string, AgentStats>();

  process(entries: readonly LogEntry[]): void {
    accumulate(this.agentMap, entries);
  }

  getAgentStats(agentName: string): AgentStats | undefined {
    const stats = this.agentMap.get(agentName);
    return stats ? copyStats(stats) : undefined;
  }

  getAllStats(): AgentStats[] {
    return Array.from(this.agentMap.values(), copyStats);
  }

  clear(): void {
    this.agentMap.clear();
  }

  analyze(session: LogSession): AgentStats[] {
    const agentMap = new Map<string, AgentStats>();
    accumulate(agentMap, session.entries);
    return Array.from(agentMap.values());
  }
}

function accumulate(agentMap: Map<string, AgentStats>, entries: readonly LogEntry[]): void {
  for (const entry of entries) {
    if (entry.agentName === undefined) {
      continue;
    }
    let stats = agentMap.get(entry.agentName);
    if (!stats) {
      stats = new AgentStats(entry.agentName);
      agentMap.set(entry.agentName, stats);
    }
    if (entry.durationMs !== undefined) {
      stats.addDuration(entry.durationMs);
    } else {
      stats.recordInvocation();
    }
  }
}

function copyStats(stats: AgentStats): AgentStats {
  const copy = new AgentStats(stats.name);
  copy.invocationCount = stats.invocationCount;
  copy.totalDurationMs = stats.totalDurationMs;
  copy.avgDurationMs = stats.avgDurationMs;
  return copy;
}
