import type { Command } from "commander";
import { parseLogFile } from "../../logparse/parsers/file.js";
import { RULE, formatEntry, formatEntryTypeCounts } from "../../logparse/report.js";
import { countEntryTypes } from "../../logparse/session.js";
import { printLines } from "../output.js";

const PREVIEW_COUNT = 10;

export function registerParseCommand(program: Command): void {
  program
    .command("parse")
    .description("Parse a single session log")
    .argument("<file>", "Path to the log file")
    .action(async (file: string) => {
      console.log(`Parsing session: ${file}`);

      const entries = await parseLogFile(file);

      console.log(`\nParsed ${entries.length} log entries:`);
      console.log(RULE);
      entries.slice(0, PREVIEW_COUNT).forEach((entry, idx) => {
        printLines(formatEntry(entry, idx + 1));
      });

      if (entries.length > PREVIEW_COUNT) {
        console.log(`\n... and ${entries.length - PREVIEW_COUNT} more entries`);
      }

      console.log("\nSummary:");
      console.log(`  Total entries: ${entries.length}`);
      printLines(formatEntryTypeCounts(countEntryTypes(entries)));
    });
}
