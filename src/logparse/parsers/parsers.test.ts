import { describe, expect, it } from "vitest";
import { InvalidTimestampError, LineParseError, MalformedEntryError } from "../errors.js";
import type { ParseWarning } from "./index.js";
import { parseLines, parseLogText, splitLines } from "./index.js";
import { entryTypeForLevel, parseLogLine } from "./line.js";
import { parseTimestamp } from "./timestamp.js";

describe("parsers", () => {
  describe("parseLogLine", () => {
    it("parses a well-formed line", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z] INFO: Server started");

      expect(entry.timestamp.toISOString()).toBe("2024-01-01T12:00:00.000Z");
      expect(entry.entryType).toBe("info");
      expect(entry.message).toBe("Server started");
      expect(entry.agentName).toBeUndefined();
      expect(entry.durationMs).toBeUndefined();
    });

    it.each([
      ["INFO", "info"],
      ["WARN", "warning"],
      ["WARNING", "warning"],
      ["ERROR", "error"],
      ["AGENT", "agent-invocation"],
      ["DECISION", "decision"],
      ["warning", "warning"],
      ["Agent", "agent-invocation"],
      ["TRACE", "unknown"],
    ] as const)("maps level %s to %s", (level, expected) => {
      const entry = parseLogLine(`[2024-01-01T12:00:00Z] ${level}: message body`);
      expect(entry.entryType).toBe(expected);
      expect(entry.message).toBe("message body");
    });

    it("trims around the level and message", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z]   error :   disk full  ");
      expect(entry.entryType).toBe("error");
      expect(entry.message).toBe("disk full");
    });

    it("splits on the first colon only", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z] DECISION: route: fast path");
      expect(entry.entryType).toBe("decision");
      expect(entry.message).toBe("route: fast path");
    });

    it("uses the first closing bracket as the timestamp delimiter", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z] INFO: [nested] value");
      expect(entry.message).toBe("[nested] value");
    });

    it("treats a remainder without a colon as an unknown entry", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z]  just some text ");
      expect(entry.entryType).toBe("unknown");
      expect(entry.message).toBe("just some text");
    });

    it("rejects lines that do not start with a bracket", () => {
      expect(() => parseLogLine("INFO: no timestamp")).toThrow(MalformedEntryError);
      expect(() => parseLogLine(" [2024-01-01T12:00:00Z] INFO: x")).toThrow(MalformedEntryError);
    });

    it("rejects lines without a closing bracket", () => {
      expect(() => parseLogLine("[2024-01-01T12:00:00Z INFO: x")).toThrow(
        "Malformed entry: missing closing ']' after timestamp",
      );
    });

    it("rejects unreadable timestamps", () => {
      let caught: unknown;
      try {
        parseLogLine("[yesterday] INFO: x", 7);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InvalidTimestampError);
      expect(caught).toBeInstanceOf(LineParseError);
      expect(caught).toMatchObject({ text: "yesterday", lineNumber: 7 });
    });

    it("returns frozen entries", () => {
      const entry = parseLogLine("[2024-01-01T12:00:00Z] INFO: x");
      expect(Object.isFrozen(entry)).toBe(true);
    });
  });

  describe("entryTypeForLevel", () => {
    it("falls back to unknown", () => {
      expect(entryTypeForLevel("")).toBe("unknown");
      expect(entryTypeForLevel("debug")).toBe("unknown");
    });
  });

  describe("parseTimestamp", () => {
    it("applies RFC 3339 offsets", () => {
      expect(parseTimestamp("2024-03-05T10:20:30+02:00").toISOString()).toBe(
        "2024-03-05T08:20:30.000Z",
      );
      expect(parseTimestamp("2024-03-05T10:20:30-05:30").toISOString()).toBe(
        "2024-03-05T15:50:30.000Z",
      );
    });

    it("accepts a space separator with an offset", () => {
      expect(parseTimestamp("2024-03-05 10:20:30Z").toISOString()).toBe(
        "2024-03-05T10:20:30.000Z",
      );
    });

    it("reads naive timestamps as UTC", () => {
      expect(parseTimestamp("2024-03-05T10:20:30").toISOString()).toBe(
        "2024-03-05T10:20:30.000Z",
      );
    });

    it("truncates fractions to milliseconds", () => {
      expect(parseTimestamp("2024-03-05T10:20:30.123456").toISOString()).toBe(
        "2024-03-05T10:20:30.123Z",
      );
      expect(parseTimestamp("2024-03-05T10:20:30.5Z").toISOString()).toBe(
        "2024-03-05T10:20:30.500Z",
      );
    });

    it("keeps years below 100 as written", () => {
      const parsed = parseTimestamp("0050-06-01T00:00:00Z");
      expect(parsed.getUTCFullYear()).toBe(50);
      expect(parsed.toISOString()).toBe("0050-06-01T00:00:00.000Z");
      expect(parseTimestamp("0000-01-01T12:00:00").toISOString()).toBe("0000-01-01T12:00:00.000Z");
    });

    it("clamps a leap second to the end of its minute", () => {
      expect(parseTimestamp("2016-12-31T23:59:60Z").toISOString()).toBe(
        "2016-12-31T23:59:59.999Z",
      );
      expect(parseTimestamp("2016-12-31T23:59:60.5").toISOString()).toBe(
        "2016-12-31T23:59:59.999Z",
      );
    });

    it.each([
      "2024-02-30T00:00:00Z",
      "2024-01-01T24:00:00Z",
      "2024-01-01T23:59:61Z",
      "2024-13-01T00:00:00",
      "noon",
      "",
    ])("rejects %j", (text) => {
      expect(() => parseTimestamp(text)).toThrow(InvalidTimestampError);
    });
  });

  describe("parseLines", () => {
    it("skips blank lines and reports malformed ones", () => {
      const warnings: ParseWarning[] = [];
      const entries = parseLines(
        [
          "[2024-01-01T00:00:00Z] INFO: a",
          "",
          "garbage",
          "   ",
          "[2024-01-01T00:00:01Z] ERROR: b",
          "[bad] INFO: c",
        ],
        { onWarning: (w) => warnings.push(w) },
      );

      expect(entries.map((e) => e.message)).toEqual(["a", "b"]);
      expect(warnings.map((w) => [w.lineNumber, w.reason])).toEqual([
        [3, "Malformed entry at line 3: line does not start with '['"],
        [6, "Invalid timestamp: bad"],
      ]);
      expect(warnings[0]?.sourceFile).toBeUndefined();
    });

    it("keeps input order even when timestamps go backwards", () => {
      const entries = parseLines(
        ["[2024-01-01T00:00:10Z] INFO: later", "[2024-01-01T00:00:00Z] INFO: earlier"],
        { onWarning: () => undefined },
      );
      expect(entries.map((e) => e.message)).toEqual(["later", "earlier"]);
    });
  });

  describe("splitLines", () => {
    it("handles CRLF and a trailing newline", () => {
      expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
      expect(splitLines("")).toEqual([]);
    });
  });

  describe("parseLogText", () => {
    it("tags warnings with the source file", () => {
      const warnings: ParseWarning[] = [];
      parseLogText("nope\n", { sourceFile: "run.log", onWarning: (w) => warnings.push(w) });
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.sourceFile).toBe("run.log");
      expect(warnings[0]?.lineNumber).toBe(1);
    });
  });
});
