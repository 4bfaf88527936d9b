import type { Command } from "commander";
import { resolveLogsDir } from "../../config/paths.js";
import { runBenchmark } from "../../logparse/bench.js";
import { findLogFiles } from "../../logparse/discovery.js";
import { DOUBLE_RULE, formatBenchmark } from "../../logparse/report.js";
import { parsePositiveInt, printLines } from "../output.js";

type BenchOptions = {
  iterations: string;
  logsDir?: string;
};

export function registerBenchCommand(program: Command): void {
  program
    .command("bench")
    .description("Run performance benchmarks")
    .option("-i, --iterations <n>", "Number of iterations", "100")
    .option("-l, --logs-dir <dir>", "Path to logs directory")
    .action(async (options: BenchOptions) => {
      const iterations = parsePositiveInt(options.iterations, "--iterations");
      console.log(`Running benchmarks with ${iterations} iterations`);

      const [file] = await findLogFiles(resolveLogsDir(options.logsDir));
      if (!file) {
        console.log("No log files found for benchmarking");
        return;
      }

      console.log(`Benchmarking with file: ${file}`);
      console.log(DOUBLE_RULE);

      const result = await runBenchmark(file, iterations, {
        onProgress: (done, total) => {
          if (done % 50 === 0 || done === total) {
            console.log(`  ${done}/${total}`);
          }
        },
      });

      console.log(`\n${DOUBLE_RULE}`);
      printLines(formatBenchmark(result));
      console.log(DOUBLE_RULE);
    });
}
