import { MalformedEntryError } from "../errors.js";
import { createLogEntry, type EntryType, type LogEntry } from "../types.js";
import { parseTimestamp } from "./timestamp.js";

const LEVEL_MAP: Record<string, EntryType> = {
  INFO: "info",
  WARN: "warning",
  WARNING: "warning",
  ERROR: "error",
  AGENT: "agent-invocation",
  DECISION: "decision",
};

/**
 * Maps a level keyword to an entry type, case-insensitively.
 */
export function entryTypeForLevel(level: string): EntryType {
  return LEVEL_MAP[level.trim().toUpperCase()] ?? "unknown";
}

/**
 * Parses one `[<timestamp>] <LEVEL>: <message>` line.
 *
 * Agent name and duration are never filled in here; the message is kept
 * verbatim (trimmed) and nothing is extracted from it.
 *
 * @throws MalformedEntryError when the bracketed timestamp is missing
 * @throws InvalidTimestampError when the timestamp is unreadable
 */
export function parseLogLine(line: string, lineNumber?: number): LogEntry {
  if (!line.startsWith("[")) {
    throw new MalformedEntryError("line does not start with '['", lineNumber);
  }

  const close = line.indexOf("]");
  if (close === -1) {
    throw new MalformedEntryError("missing closing ']' after timestamp", lineNumber);
  }

  const timestamp = parseTimestamp(line.slice(1, close), lineNumber);
  const rest = line.slice(close + 1).trim();

  const colon = rest.indexOf(":");
  if (colon === -1) {
    return createLogEntry({ timestamp, entryType: "unknown", message: rest });
  }

  return createLogEntry({
    timestamp,
    entryType: entryTypeForLevel(rest.slice(0, colon)),
    message: rest.slice(colon + 1).trim(),
  });
}
