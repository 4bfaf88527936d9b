/**
 * Session log parsing and analysis.
 *
 * Parses `[<timestamp>] <LEVEL>: <message>` lines into typed entries,
 * skipping malformed lines with a warning, and derives timing statistics,
 * per-agent aggregates and patterns (error bursts, long gaps, busy agents,
 * sessions without agents) from a session.
 *
 * @example
 * ```ts
 * import { analyzeSession, createSession, parseLogFile } from "./logparse/index.js";
 *
 * const entries = await parseLogFile("session.log", {
 *   onWarning: (w) => console.warn(`line ${w.lineNumber}: ${w.reason}`),
 * });
 *
 * const { timing, agents, patterns } = analyzeSession(createSession("s1", entries));
 * console.log(`${timing.entryCount} entries over ${timing.totalDurationSecs}s`);
 * ```
 */

// Entry model
export {
  AgentStats,
  createLogEntry,
  type EntryType,
  type LogEntry,
  type LogPattern,
  type LogSession,
  type PatternAnalysis,
  type PatternKind,
  type TimingStats,
} from "./types.js";

// Errors
export {
  FileNotFoundError,
  InvalidTimestampError,
  LineParseError,
  LogParseError,
  LogReadError,
  MalformedEntryError,
} from "./errors.js";

// Parsers
export {
  entryTypeForLevel,
  logWarning,
  parseLines,
  parseLogLine,
  parseLogText,
  parseTimestamp,
  splitLines,
  type ParseOptions,
  type ParseWarning,
  type WarningSink,
} from "./parsers/index.js";
export {
  parseLogFile,
  parseLogFiles,
  type BatchParseResult,
  type FailedFile,
  type FileParseOptions,
  type ParsedFile,
} from "./parsers/file.js";
export { readLogFile, type LogFileContents } from "./file-reader.js";
export { findLogFiles, LOG_EXTENSION } from "./discovery.js";

// Sessions
export {
  countEntryTypes,
  createSession,
  filterEntries,
  filterSince,
  type EntryFilter,
} from "./session.js";

// Analyzers
export {
  AgentAnalyzer,
  CompositeAnalyzer,
  DEFAULT_PATTERN_THRESHOLDS,
  PatternAnalyzer,
  TimingAnalyzer,
  analyzeSession,
  type Analyzer,
  type AnalyzerOutcome,
  type PatternThresholds,
  type SessionAnalysis,
} from "./analyzers/index.js";

// Reporting and benchmarks
export {
  describePattern,
  formatAgentStats,
  formatEntry,
  formatPatterns,
  formatTimingStats,
} from "./report.js";
export { runBenchmark, summarizeTimings, type BenchmarkResult } from "./bench.js";
