import { InvalidTimestampError } from "../errors.js";

const RFC3339_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;
const NAIVE_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/;
const ZULU_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?Z$/;

type DateTimeParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millis: number;
};

function toParts(match: RegExpExecArray): DateTimeParts | null {
  const [, year, month, day, hour, minute, second, fraction] = match;
  if (!year || !month || !day || !hour || !minute || !second) {
    return null;
  }
  return {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
    // Digits past milliseconds are truncated.
    millis: fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0,
  };
}

/**
 * Converts calendar fields to epoch millis, or null if any field is out of range.
 * Years below 100 are kept as written. A leap second (`:60`) is clamped to
 * the last millisecond of its minute.
 */
function utcMillis(parts: DateTimeParts): number | null {
  if (parts.month < 1 || parts.month > 12 || parts.day < 1) {
    return null;
  }
  if (parts.hour > 23 || parts.minute > 59 || parts.second > 60) {
    return null;
  }
  const leapSecond = parts.second === 60;
  const date = new Date(0);
  date.setUTCFullYear(parts.year, parts.month - 1, parts.day);
  date.setUTCHours(
    parts.hour,
    parts.minute,
    leapSecond ? 59 : parts.second,
    leapSecond ? 999 : parts.millis,
  );
  // 2024-02-30 rolls over into March; reject instead.
  if (date.getUTCDate() !== parts.day) {
    return null;
  }
  return date.getTime();
}

function offsetMinutes(offset: string): number | null {
  if (offset === "Z" || offset === "z") {
    return 0;
  }
  const sign = offset.startsWith("-") ? -1 : 1;
  const hours = Number(offset.slice(1, 3));
  const minutes = Number(offset.slice(4, 6));
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
}

function parseRfc3339(text: string): Date | null {
  const match = RFC3339_RE.exec(text);
  if (!match) {
    return null;
  }
  const parts = toParts(match);
  const offset = match[8];
  if (!parts || !offset) {
    return null;
  }
  const local = utcMillis(parts);
  const minutes = offsetMinutes(offset);
  if (local === null || minutes === null) {
    return null;
  }
  return new Date(local - minutes * 60_000);
}

function parseWith(re: RegExp, text: string): Date | null {
  const match = re.exec(text);
  if (!match) {
    return null;
  }
  const parts = toParts(match);
  if (!parts) {
    return null;
  }
  const ms = utcMillis(parts);
  return ms === null ? null : new Date(ms);
}

const LAYERS: Array<(text: string) => Date | null> = [
  parseRfc3339,
  (text) => parseWith(NAIVE_RE, text),
  (text) => parseWith(ZULU_RE, text),
];

/**
 * Parses a bracketed log timestamp. Tries RFC 3339 with an offset, then a
 * naive `YYYY-MM-DDTHH:MM:SS[.f]` read as UTC, then the same with a trailing `Z`.
 *
 * @throws InvalidTimestampError when no layer accepts the text
 */
export function parseTimestamp(text: string, lineNumber?: number): Date {
  for (const layer of LAYERS) {
    const parsed = layer(text);
    if (parsed) {
      return parsed;
    }
  }
  throw new InvalidTimestampError(text, lineNumber);
}
