/**
 * CLI command registration.
 */

import { registerAggregateCommand } from "./aggregate.js";
import { registerValidateCommand } from "./validate.js";

import type { Command } from "commander";

/**
 * Register every CLI command on the program.
 */
export function registerAllCommands(program: Command): void {
  program.commandsGroup("Aggregation:");
  registerAggregateCommand(program);

  program.commandsGroup("Inspection:");
  registerValidateCommand(program);
}
