import { Logger, type ILogObj, type ILogObjMeta } from "tslog";
import {
  LOG_LEVELS,
  SettingsError,
  loadSettings,
  type LogFormat,
  type LogLevelName,
} from "../config/settings.js";

export type LogMeta = Record<string, unknown>;

/**
 * A log call as seen by attached transports.
 */
export type LogRecord = {
  subsystem?: string;
  level: string;
  message: string;
};

export type LogTransport = (record: LogRecord) => void;

/**
 * Logger scoped to one subsystem, e.g. "logparse/parser".
 */
export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
};

const ROOT_NAME = "logparse";

/** tslog numbers its levels 0 (silly) through 6 (fatal). */
export function levelToId(level: LogLevelName): number {
  return LOG_LEVELS.indexOf(level);
}

function resolveInitialOptions(): { minLevel: number; type: LogFormat } {
  try {
    const settings = loadSettings();
    return { minLevel: levelToId(settings.logLevel), type: settings.logFormat };
  } catch (err) {
    // The CLI reports invalid settings itself; logging stays on defaults.
    if (err instanceof SettingsError) {
      return { minLevel: levelToId("info"), type: "pretty" };
    }
    throw err;
  }
}

const initial = resolveInitialOptions();

const rootLogger = new Logger<ILogObj>({
  name: ROOT_NAME,
  type: initial.type,
  minLevel: initial.minLevel,
});

const subLoggers = new Set<Logger<ILogObj>>();
const transports = new Set<LogTransport>();

function toRecord(logObj: ILogObj & ILogObjMeta): LogRecord {
  const meta = logObj._meta;
  const values: unknown[] = Object.values(logObj);
  return {
    subsystem: meta?.name,
    level: meta?.logLevelName ?? "UNKNOWN",
    message: values.filter((value): value is string => typeof value === "string").join(" "),
  };
}

function dispatch(logObj: ILogObj & ILogObjMeta): void {
  if (transports.size === 0) {
    return;
  }
  const record = toRecord(logObj);
  for (const transport of transports) {
    transport(record);
  }
}

function track(logger: Logger<ILogObj>): void {
  // Sub-loggers may inherit the parent's transports.
  if (!logger.settings.attachedTransports.includes(dispatch)) {
    logger.attachTransport(dispatch);
  }
  subLoggers.add(logger);
}

track(rootLogger);

function emit(
  logger: Logger<ILogObj>,
  level: "debug" | "info" | "warn" | "error",
  message: string,
  meta?: LogMeta,
): void {
  if (meta) {
    logger[level](message, meta);
  } else {
    logger[level](message);
  }
}

/**
 * Creates a logger whose output carries the subsystem name.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = rootLogger.getSubLogger({ name: subsystem });
  track(logger);

  return {
    subsystem,
    debug: (message, meta) => emit(logger, "debug", message, meta),
    info: (message, meta) => emit(logger, "info", message, meta),
    warn: (message, meta) => emit(logger, "warn", message, meta),
    error: (message, meta) => emit(logger, "error", message, meta),
  };
}

/**
 * Changes the minimum level of every logger created so far.
 */
export function setLogLevel(level: LogLevelName): void {
  const minLevel = levelToId(level);
  for (const logger of subLoggers) {
    logger.settings.minLevel = minLevel;
  }
}

/**
 * Forwards every record that passes the level filter to `transport`.
 * Returns a function that detaches it.
 */
export function attachLogTransport(transport: LogTransport): () => void {
  transports.add(transport);
  return () => {
    transports.delete(transport);
  };
}
