/**
 * Base class for every failure raised while reading or parsing logs.
 */
export class LogParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogParseError";
    Object.setPrototypeOf(this, LogParseError.prototype);
  }
}

/**
 * Thrown when a log file or logs directory does not exist.
 */
export class FileNotFoundError extends LogParseError {
  public readonly path: string;

  constructor(filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    this.path = filePath;
    Object.setPrototypeOf(this, FileNotFoundError.prototype);
  }
}

/**
 * Thrown when a file exists but cannot be read.
 */
export class LogReadError extends LogParseError {
  public readonly path: string;
  public override readonly cause: unknown;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${filePath}: ${reason}`);
    this.name = "LogReadError";
    this.path = filePath;
    this.cause = cause;
    Object.setPrototypeOf(this, LogReadError.prototype);
  }
}

/**
 * A single line could not be turned into an entry. The file parser downgrades
 * these to warnings.
 */
export class LineParseError extends LogParseError {
  public readonly lineNumber: number | undefined;

  constructor(message: string, lineNumber?: number) {
    super(message);
    this.name = "LineParseError";
    this.lineNumber = lineNumber;
    Object.setPrototypeOf(this, LineParseError.prototype);
  }
}

export class InvalidTimestampError extends LineParseError {
  public readonly text: string;

  constructor(text: string, lineNumber?: number) {
    super(`Invalid timestamp: ${text}`, lineNumber);
    this.name = "InvalidTimestampError";
    this.text = text;
    Object.setPrototypeOf(this, InvalidTimestampError.prototype);
  }
}

export class MalformedEntryError extends LineParseError {
  public readonly details: string;

  constructor(details: string, lineNumber?: number) {
    super(
      lineNumber === undefined
        ? `Malformed entry: ${details}`
        : `Malformed entry at line ${lineNumber}: ${details}`,
      lineNumber,
    );
    this.name = "MalformedEntryError";
    this.details = details;
    Object.setPrototypeOf(this, MalformedEntryError.prototype);
  }
}

/**
 * Reads `code` off a Node system error.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
