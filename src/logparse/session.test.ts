import { describe, expect, it } from "vitest";
import { countEntryTypes, createSession, filterEntries, filterSince } from "./session.js";
import { createLogEntry, type EntryType, type LogEntry } from "./types.js";

function entry(iso: string, entryType: EntryType, message = "", agentName?: string): LogEntry {
  return createLogEntry({ timestamp: new Date(iso), entryType, message, agentName });
}

describe("createSession", () => {
  it("takes start and end from the first and last entries", () => {
    const entries = [
      entry("2024-01-01T00:00:05Z", "info"),
      entry("2024-01-01T00:00:00Z", "info"),
      entry("2024-01-01T00:00:03Z", "info"),
    ];
    const session = createSession("s1", entries);

    expect(session.id).toBe("s1");
    expect(session.entries).toBe(entries);
    expect(session.startTime.toISOString()).toBe("2024-01-01T00:00:05.000Z");
    expect(session.endTime?.toISOString()).toBe("2024-01-01T00:00:03.000Z");
  });

  it("falls back to now and no end for an empty session", () => {
    const now = new Date("2025-06-01T12:00:00Z");
    const session = createSession("empty", [], () => now);

    expect(session.startTime).toBe(now);
    expect(session.endTime).toBeUndefined();
    expect("endTime" in session).toBe(false);
  });
});

describe("countEntryTypes", () => {
  it("counts per type, most frequent first", () => {
    const types: EntryType[] = ["info", "error", "info", "warning", "error", "info"];
    const entries = types.map((t) => entry("2024-01-01T00:00:00Z", t));

    expect(countEntryTypes(entries)).toEqual([
      ["info", 3],
      ["error", 2],
      ["warning", 1],
    ]);
  });

  it("returns nothing for no entries", () => {
    expect(countEntryTypes([])).toEqual([]);
  });
});

describe("filterEntries", () => {
  const entries = [
    entry("2024-01-01T00:00:00Z", "agent-invocation", "Designing API", "architect"),
    entry("2024-01-01T00:00:01Z", "agent-invocation", "Build OK", "builder"),
    entry("2024-01-01T00:00:02Z", "info", "design review"),
  ];

  it("matches agent names by substring", () => {
    expect(filterEntries(entries, { agent: "arch" }).map((e) => e.message)).toEqual([
      "Designing API",
    ]);
  });

  it("matches message text case-insensitively", () => {
    expect(filterEntries(entries, { contains: "DESIGN" }).map((e) => e.message)).toEqual([
      "Designing API",
      "design review",
    ]);
  });

  it("requires every filter to match", () => {
    const matched = filterEntries(entries, { agent: "build", contains: "ok" });
    expect(matched.map((e) => e.message)).toEqual(["Build OK"]);
    expect(filterEntries(entries, { agent: "Arch" })).toEqual([]);
  });

  it("keeps everything without filters", () => {
    expect(filterEntries(entries, {})).toHaveLength(3);
  });
});

describe("filterSince", () => {
  it("keeps entries at or after the cutoff", () => {
    const entries = [
      entry("2024-01-07T23:59:59Z", "info", "old"),
      entry("2024-01-08T00:00:00Z", "info", "edge"),
      entry("2024-01-09T00:00:00Z", "info", "new"),
    ];
    const kept = filterSince(entries, 2, new Date("2024-01-10T00:00:00Z"));

    expect(kept.map((e) => e.message)).toEqual(["edge", "new"]);
  });
});

describe("createLogEntry", () => {
  it("rejects negative or fractional durations", () => {
    const timestamp = new Date(0);
    const fields = { timestamp, entryType: "info", message: "" } as const;
    expect(() => createLogEntry({ ...fields, durationMs: -1 })).toThrow(RangeError);
    expect(() => createLogEntry({ ...fields, durationMs: 1.5 })).toThrow(RangeError);
  });

  it("omits absent optional fields", () => {
    const created = createLogEntry({ timestamp: new Date(0), entryType: "info", message: "x" });
    expect(Object.keys(created)).toEqual(["timestamp", "entryType", "message"]);
  });
});
