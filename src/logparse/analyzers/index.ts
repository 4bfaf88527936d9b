import type { AgentStats, LogSession, PatternAnalysis, TimingStats } from "../types.js";
import { AgentAnalyzer } from "./agent.js";
import { PatternAnalyzer, type PatternThresholds } from "./pattern.js";
import { TimingAnalyzer } from "./timing.js";

export { AgentAnalyzer } from "./agent.js";
export { CompositeAnalyzer, type AnalyzerOutcome } from "./composite.js";
export {
  DEFAULT_PATTERN_THRESHOLDS,
  PatternAnalyzer,
  type PatternThresholds,
} from "./pattern.js";
export { TimingAnalyzer } from "./timing.js";
export { secondsBetween, type Analyzer } from "./types.js";

export type SessionAnalysis = {
  timing: TimingStats;
  agents: AgentStats[];
  patterns: PatternAnalysis;
};

/**
 * Runs the timing, agent and pattern analyzers over one session.
 */
export function analyzeSession(
  session: LogSession,
  options: { thresholds?: Partial<PatternThresholds> } = {},
): SessionAnalysis {
  return {
    timing: new TimingAnalyzer().analyze(session),
    agents: new AgentAnalyzer().analyze(session),
    patterns: new PatternAnalyzer(options.thresholds).analyze(session),
  };
}
