import type { Command } from "commander";
import { resolveLogsDir } from "../../config/paths.js";
import { loadSettings } from "../../config/settings.js";
import { analyzeSession } from "../../logparse/analyzers/index.js";
import { findLogFiles } from "../../logparse/discovery.js";
import { parseLogFiles } from "../../logparse/parsers/file.js";
import {
  DOUBLE_RULE,
  formatAgentStats,
  formatPatterns,
  formatTimingStats,
} from "../../logparse/report.js";
import { createSession, filterSince } from "../../logparse/session.js";
import { parsePositiveInt, printLines } from "../output.js";

type AnalyzeOptions = {
  logsDir?: string;
  since?: string;
};

export function registerAnalyzeCommand(program: Command): void {
  program
    .command("analyze")
    .description("Analyze logs and generate statistics")
    .option("-l, --logs-dir <dir>", "Path to logs directory")
    .option("-s, --since <days>", "Only analyze entries from the last N days")
    .action(async (options: AnalyzeOptions) => {
      const settings = loadSettings();
      const logsDir = resolveLogsDir(options.logsDir);
      const sinceDays =
        options.since === undefined ? undefined : parsePositiveInt(options.since, "--since");

      console.log(`Analyzing logs in: ${logsDir}`);
      if (sinceDays !== undefined) {
        console.log(`Only analyzing last ${sinceDays} days`);
      }

      const files = await findLogFiles(logsDir);
      if (files.length === 0) {
        console.log("No .log files found in directory");
        return;
      }

      console.log(`\nFound ${files.length} log files to analyze`);
      console.log(DOUBLE_RULE);

      const batch = await parseLogFiles(files);
      for (const parsed of batch.files) {
        console.log(`Parsed ${parsed.path}: ${parsed.entries.length} entries`);
      }

      const entries =
        sinceDays === undefined ? batch.entries : filterSince(batch.entries, sinceDays);
      if (entries.length === 0) {
        console.log("\nNo entries found to analyze");
        return;
      }

      const analysis = analyzeSession(createSession("aggregate", entries), {
        thresholds: settings.thresholds,
      });

      console.log(`\n${DOUBLE_RULE}`);
      console.log("ANALYSIS RESULTS");
      console.log(DOUBLE_RULE);
      console.log("");
      printLines(formatTimingStats(analysis.timing));
      console.log("");
      printLines(formatAgentStats(analysis.agents));
      console.log("");
      printLines(formatPatterns(analysis.patterns.patterns));
      console.log(`\n${DOUBLE_RULE}`);
    });
}
