import { Command } from "commander";
import { setLogLevel } from "../logging/subsystem.js";
import { registerAnalyzeCommand } from "./commands/analyze.js";
import { registerBenchCommand } from "./commands/bench.js";
import { registerParseCommand } from "./commands/parse.js";
import { registerQueryCommand } from "./commands/query.js";

export const APP_NAME = "agent-logparse";
export const APP_VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description("Parse agent session logs and report timing, agent and error patterns")
    .version(APP_VERSION)
    .option("-v, --verbose", "Enable debug logging")
    .hook("preAction", (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogLevel("debug");
      }
    });

  registerParseCommand(program);
  registerAnalyzeCommand(program);
  registerQueryCommand(program);
  registerBenchCommand(program);

  return program;
}
