import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FileNotFoundError, LogReadError, errnoCode } from "./errors.js";

const log = createSubsystemLogger("logparse/discovery");

export const LOG_EXTENSION = ".log";

/**
 * Lists `*.log` files directly inside `dir`, sorted by path. Subdirectories
 * are not descended into.
 *
 * @throws FileNotFoundError when the directory does not exist
 * @throws LogReadError when it cannot be listed
 */
export async function findLogFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new FileNotFoundError(dir);
    }
    throw new LogReadError(dir, err);
  }

  const files = entries
    .filter((entry) => entry.isFile() && path.extname(entry.name) === LOG_EXTENSION)
    .map((entry) => path.join(dir, entry.name))
    .sort();

  log.debug(`Found ${files.length} log files`, { dir });
  return files;
}
