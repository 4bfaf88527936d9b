import type { LogEntry } from "../types.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { LogParseError } from "../errors.js";
import { readLogFile } from "../file-reader.js";
import { parseLogText, type ParseOptions } from "./index.js";

const log = createSubsystemLogger("logparse/parser");

export type FileParseOptions = Omit<ParseOptions, "sourceFile">;

/**
 * Parses a log file into entries, in file order.
 *
 * Malformed lines are reported through `options.onWarning` and skipped; only
 * file-level failures reject the promise.
 *
 * @throws FileNotFoundError when the file is missing
 * @throws LogReadError when the file cannot be read
 */
export async function parseLogFile(
  filePath: string,
  options: FileParseOptions = {},
): Promise<LogEntry[]> {
  const { text } = await readLogFile(filePath);
  const entries = parseLogText(text, { ...options, sourceFile: filePath });
  log.debug(`Parsed ${entries.length} entries from ${filePath}`);
  return entries;
}

export type ParsedFile = {
  path: string;
  entries: LogEntry[];
};

export type FailedFile = {
  path: string;
  error: LogParseError;
};

export type BatchParseResult = {
  files: ParsedFile[];
  failures: FailedFile[];
  /** Entries of every parsed file, concatenated in file order. */
  entries: LogEntry[];
};

/**
 * Parses files one after another. A file that cannot be read is logged and
 * listed in `failures`; the remaining files are still parsed.
 */
export async function parseLogFiles(
  filePaths: readonly string[],
  options: FileParseOptions = {},
): Promise<BatchParseResult> {
  const result: BatchParseResult = { files: [], failures: [], entries: [] };

  for (const filePath of filePaths) {
    try {
      const entries = await parseLogFile(filePath, options);
      result.files.push({ path: filePath, entries });
      for (const entry of entries) {
        result.entries.push(entry);
      }
    } catch (err) {
      if (!(err instanceof LogParseError)) {
        throw err;
      }
      log.warn(`Failed to parse ${filePath}: ${err.message}`);
      result.failures.push({ path: filePath, error: err });
    }
  }

  return result;
}
