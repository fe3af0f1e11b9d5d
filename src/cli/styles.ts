/**
 * Commander help styling.
 *
 * @internal CLI helper - not part of public API
 */
import chalk from "chalk";

import type { Command } from "commander";

/**
 * Apply colored help output to a program and, through inheritance, to
 * every command registered on it afterwards.
 *
 * @param program - Commander program instance to configure
 */
export function configureHelpStyles(program: Command): void {
  program.configureHelp({
    styleTitle: (str) => chalk.bold.cyan(str),
    styleUsage: (str) => chalk.bold(str),
    styleCommandText: (str) => chalk.green(str),
    styleCommandDescription: (str) => chalk.dim(str),
    styleDescriptionText: (str) => str,
    styleOptionText: (str) => chalk.yellow(str),
    styleArgumentText: (str) => chalk.magenta(str),
    styleSubcommandText: (str) => chalk.green(str),
  });
  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(str));
    },
  });
}
