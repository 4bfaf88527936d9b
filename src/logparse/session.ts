import type { EntryType, LogEntry, LogSession } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Wraps entries in a session. Start is the first entry's timestamp (now when
 * empty) and end is the last entry's; neither is re-derived from min/max.
 */
export function createSession(
  id: string,
  entries: readonly LogEntry[],
  now: () => Date = () => new Date(),
): LogSession {
  const first = entries[0];
  const last = entries[entries.length - 1];
  return {
    id,
    entries,
    startTime: first ? first.timestamp : now(),
    ...(last ? { endTime: last.timestamp } : {}),
  };
}

/**
 * Counts entries per type, most frequent first. Ties keep first-seen order.
 */
export function countEntryTypes(entries: readonly LogEntry[]): Array<[EntryType, number]> {
  const counts = new Map<EntryType, number>();
  for (const entry of entries) {
    counts.set(entry.entryType, (counts.get(entry.entryType) ?? 0) + 1);
  }
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
}

export type EntryFilter = {
  /** Substring of the agent name (case-sensitive). */
  agent?: string;
  /** Substring of the message (case-insensitive). */
  contains?: string;
};

/**
 * Keeps entries matching every filter that is set. Entries without an agent
 * name never match an agent filter.
 */
export function filterEntries(entries: readonly LogEntry[], filter: EntryFilter): LogEntry[] {
  const needle = filter.contains?.toLowerCase();
  return entries.filter((entry) => {
    const agentMatch =
      filter.agent === undefined ||
      (entry.agentName !== undefined && entry.agentName.includes(filter.agent));
    const textMatch = needle === undefined || entry.message.toLowerCase().includes(needle);
    return agentMatch && textMatch;
  });
}

/**
 * Keeps entries from the last `days` days relative to `now`.
 */
export function filterSince(
  entries: readonly LogEntry[],
  days: number,
  now: Date = new Date(),
): LogEntry[] {
  const cutoff = now.getTime() - days * DAY_MS;
  return entries.filter((entry) => entry.timestamp.getTime() >= cutoff);
}
