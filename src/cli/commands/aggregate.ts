/**
 * Aggregate command - combine trajectory files into one ensemble.
 */

import {
  extractCLIOptions,
  loadConfigWithOverrides,
} from "../../config/index.js";
import { buildEnsembleReport } from "../../ensemble/summary.js";
import { runAggregation } from "../../pipeline/run.js";
import {
  generateRunId,
  getResultsDir,
  logger,
  writeJson,
} from "../../utils/index.js";
import { outputReport } from "../formatters.js";
import { extractConfigPath, handleCLIError } from "../helpers.js";

import type { ReportOptions } from "../../ensemble/summary.js";
import type { Command } from "commander";

/**
 * Register the aggregate command on the program.
 */
export function registerAggregateCommand(program: Command): void {
  program
    .command("aggregate")
    .description("Aggregate trajectory files, one partition per file")
    .argument(
      "<files...>",
      "Trajectory files (JSON, YAML or JSON Lines)",
    )
    .optionsGroup("Input Options:")
    .option("-c, --config <path>", "Path to config file")
    .optionsGroup("Stopping Options:")
    .option("--ntraj <n>", "Trajectory count per partition", parseInt)
    .option(
      "--target-tol <tol>",
      "Target tolerance: atol or atol,rtol (requires --ntraj)",
    )
    .optionsGroup("Accumulation Options:")
    .option("--store-states", "Average the state at every time")
    .option("--store-final-state", "Average the final state")
    .option("--keep-runs", "Retain every trajectory")
    .option(
      "--steady-state <n>",
      "Report the steady state over the last n times (0: all)",
      parseInt,
    )
    .optionsGroup("Output Options:")
    .option("-o, --output <format>", "Output format: json|yaml|cli")
    .option("--save", "Write the report to results/<run-id>/ensemble.json")
    .option("-v, --verbose", "Detailed progress output")
    .action((files: string[], options: Record<string, unknown>) => {
      try {
        const cliOptions = extractCLIOptions(options);
        const configPath = extractConfigPath(options);
        const config = loadConfigWithOverrides(configPath, cliOptions);

        if (config.verbose) {
          logger.configure({ level: "debug" });
        }

        const { ensemble, partitions } = runAggregation(files, config);

        const reportOptions: ReportOptions = {
          includeRuns: config.output.include_runs,
        };
        if (config.output.steady_state_window !== undefined) {
          reportOptions.steadyStateWindow = config.output.steady_state_window;
        }
        const report = buildEnsembleReport(ensemble, reportOptions);

        if (config.output.save) {
          const resultsDir = getResultsDir(generateRunId());
          writeJson(`${resultsDir}/ensemble.json`, report);
          logger.success(`Report saved to ${resultsDir}/ensemble.json`);
        }

        outputReport(report, config.output.format, partitions);
      } catch (err) {
        handleCLIError(err);
      }
    });
}
