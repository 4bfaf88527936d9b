import type { LogEntry } from "../types.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { LineParseError } from "../errors.js";
import { parseLogLine } from "./line.js";

export { parseLogLine, entryTypeForLevel } from "./line.js";
export { parseTimestamp } from "./timestamp.js";

const log = createSubsystemLogger("logparse/parser");

/**
 * A line that was dropped during resilient parsing.
 */
export type ParseWarning = {
  sourceFile?: string;
  /** 1-based position of the line in its source, blank lines included. */
  lineNumber: number;
  reason: string;
  error: LineParseError;
};

/**
 * Receives warnings for dropped lines. Fire-and-forget.
 */
export type WarningSink = (warning: ParseWarning) => void;

export type ParseOptions = {
  /** Used in warnings only. */
  sourceFile?: string;
  /** Defaults to a warn on the `logparse/parser` logger. */
  onWarning?: WarningSink;
};

export const logWarning: WarningSink = (warning) => {
  const where = warning.sourceFile
    ? `${warning.sourceFile}:${warning.lineNumber}`
    : `line ${warning.lineNumber}`;
  log.warn(`Skipping ${where}: ${warning.reason}`);
};

/**
 * Parses lines in order, skipping blank ones. A line that fails to parse is
 * reported to the warning sink and dropped; any other error propagates.
 */
export function parseLines(lines: readonly string[], options: ParseOptions = {}): LogEntry[] {
  const onWarning = options.onWarning ?? logWarning;
  const entries: LogEntry[] = [];

  lines.forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    const lineNumber = index + 1;
    try {
      entries.push(parseLogLine(line, lineNumber));
    } catch (err) {
      if (!(err instanceof LineParseError)) {
        throw err;
      }
      onWarning({
        sourceFile: options.sourceFile,
        lineNumber,
        reason: err.message,
        error: err,
      });
    }
  });

  return entries;
}

/**
 * Splits text on `\n` or `\r\n`. A trailing newline does not yield a line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function parseLogText(text: string, options: ParseOptions = {}): LogEntry[] {
  return parseLines(splitLines(text), options);
}
