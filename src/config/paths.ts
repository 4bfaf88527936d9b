import path from "node:path";
import { loadSettings } from "./settings.js";

/**
 * Resolves the logs directory: explicit override, then `LOGPARSE_LOGS_DIR`,
 * then the default runtime logs location. Relative paths resolve against cwd.
 */
export function resolveLogsDir(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const dir = override?.trim() ? override.trim() : loadSettings(env).logsDir;
  return path.resolve(dir);
}
