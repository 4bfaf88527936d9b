import { z, type ZodError } from "zod";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ["pretty", "json", "hidden"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export const DEFAULT_LOGS_DIR = ".claude/runtime/logs";

const settingsSchema = z.object({
  LOGPARSE_LOGS_DIR: z.string().min(1).default(DEFAULT_LOGS_DIR),
  LOGPARSE_LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  LOGPARSE_LOG_FORMAT: z.enum(LOG_FORMATS).default("pretty"),
  LOGPARSE_ERROR_BURST_THRESHOLD: z.coerce.number().positive().default(5),
  LOGPARSE_LONG_GAP_SECS: z.coerce.number().positive().default(300),
  LOGPARSE_AGENT_ACTIVITY_THRESHOLD: z.coerce.number().int().positive().default(10),
});

/**
 * Runtime settings resolved from environment variables.
 */
export type Settings = {
  logsDir: string;
  logLevel: LogLevelName;
  logFormat: LogFormat;
  thresholds: {
    errorBurstThreshold: number;
    longGapThreshold: number;
    agentActivityThreshold: number;
  };
};

/**
 * Thrown when an environment variable fails validation.
 */
export class SettingsError extends Error {
  public readonly zodError: ZodError;

  constructor(zodError: ZodError) {
    const brief = zodError.issues.map((i) => `  [${i.path.join(".")}] ${i.message}`).join("\n");
    super(`Invalid logparse settings:\n${brief}`);
    this.name = "SettingsError";
    this.zodError = zodError;
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}

/**
 * Drops empty strings so that `FOO=` falls back to the default.
 */
function compactEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}

/**
 * Validates `LOGPARSE_*` variables and returns typed settings.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(compactEnv(env));
  if (!parsed.success) {
    throw new SettingsError(parsed.error);
  }
  const data = parsed.data;
  return {
    logsDir: data.LOGPARSE_LOGS_DIR,
    logLevel: data.LOGPARSE_LOG_LEVEL,
    logFormat: data.LOGPARSE_LOG_FORMAT,
    thresholds: {
      errorBurstThreshold: data.LOGPARSE_ERROR_BURST_THRESHOLD,
      longGapThreshold: data.LOGPARSE_LONG_GAP_SECS,
      agentActivityThreshold: data.LOGPARSE_AGENT_ACTIVITY_THRESHOLD,
    },
  };
}
