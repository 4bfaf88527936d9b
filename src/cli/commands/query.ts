import type { Command } from "commander";
import { resolveLogsDir } from "../../config/paths.js";
import { findLogFiles } from "../../logparse/discovery.js";
import { parseLogFiles } from "../../logparse/parsers/file.js";
import { RULE, entryTypeLabel, formatTimestamp } from "../../logparse/report.js";
import { filterEntries } from "../../logparse/session.js";

const MAX_RESULTS = 20;

type QueryOptions = {
  agent?: string;
  contains?: string;
  logsDir?: string;
};

export function registerQueryCommand(program: Command): void {
  program
    .command("query")
    .description("Query logs with filters")
    .option("-a, --agent <name>", "Filter by agent name")
    .option("-c, --contains <text>", "Search for text in messages")
    .option("-l, --logs-dir <dir>", "Path to logs directory")
    .action(async (options: QueryOptions) => {
      console.log("Querying logs");

      const files = await findLogFiles(resolveLogsDir(options.logsDir));
      const batch = await parseLogFiles(files);
      const matches = filterEntries(batch.entries, {
        agent: options.agent,
        contains: options.contains,
      });

      console.log("\nQuery Filters:");
      if (options.agent !== undefined) {
        console.log(`  Agent: ${options.agent}`);
      }
      if (options.contains !== undefined) {
        console.log(`  Contains: ${options.contains}`);
      }

      console.log(`\nFound ${matches.length} matching entries:`);
      console.log(RULE);

      matches.slice(0, MAX_RESULTS).forEach((entry, idx) => {
        console.log(
          `[${idx + 1}] ${formatTimestamp(entry.timestamp)} | ${entryTypeLabel(entry.entryType)}`,
        );
        console.log(`    ${entry.message}`);
        if (entry.agentName !== undefined) {
          console.log(`    Agent: ${entry.agentName}`);
        }
        console.log("");
      });

      if (matches.length > MAX_RESULTS) {
        console.log(`... and ${matches.length - MAX_RESULTS} more entries`);
      }
    });
}
