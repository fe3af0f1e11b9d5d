/**
 * Validate command - check trajectory files without aggregating them.
 */

import { OutputFormatSchema } from "../../config/index.js";
import {
  checkTrajectoryFile,
  readTrajectoryFile,
} from "../../io/trajectory-file.js";
import { logger, toYaml } from "../../utils/index.js";
import { formatValidation } from "../formatters.js";
import { handleCLIError } from "../helpers.js";

import type { Command } from "commander";

/**
 * Register the validate command on the program.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Parse and shape-check trajectory files")
    .argument("<files...>", "Trajectory files (JSON, YAML or JSON Lines)")
    .option("-o, --output <format>", "Output format: json|yaml|cli", "cli")
    .action((files: string[], options: Record<string, unknown>) => {
      try {
        const format = OutputFormatSchema.parse(options["output"]);
        const checks = files.map((file) =>
          checkTrajectoryFile(readTrajectoryFile(file)),
        );

        if (format === "cli") {
          console.log(formatValidation(checks));
        } else if (format === "yaml") {
          console.log(toYaml(checks));
        } else {
          console.log(JSON.stringify(checks, null, 2));
        }

        const failed = checks.filter((check) => check.issues.length > 0);
        if (failed.length > 0) {
          throw new Error(
            `${String(failed.length)} of ${String(checks.length)} file(s) failed validation`,
          );
        }
        logger.success(`${String(checks.length)} file(s) valid`);
      } catch (err) {
        handleCLIError(err);
      }
    });
}
