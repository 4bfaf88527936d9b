import fs from "node:fs/promises";
import { FileNotFoundError, LogReadError, errnoCode } from "./errors.js";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Result of reading a whole log file.
 */
export type LogFileContents = {
  path: string;
  /** File size in bytes. */
  size: number;
  text: string;
};

/**
 * Reads a log file as UTF-8.
 *
 * @throws FileNotFoundError when nothing exists at the path
 * @throws LogReadError for any other I/O failure (directories included)
 */
export async function readLogFile(filePath: string): Promise<LogFileContents> {
  const stat = await fs.stat(filePath).catch((err: unknown) => {
    if (MISSING_CODES.has(errnoCode(err) ?? "")) {
      throw new FileNotFoundError(filePath);
    }
    throw new LogReadError(filePath, err);
  });

  if (!stat.isFile()) {
    throw new LogReadError(filePath, new Error("not a regular file"));
  }

  try {
    const text = await fs.readFile(filePath, "utf8");
    return { path: filePath, size: stat.size, text };
  } catch (err) {
    if (MISSING_CODES.has(errnoCode(err) ?? "")) {
      throw new FileNotFoundError(filePath);
    }
    throw new LogReadError(filePath, err);
  }
}
