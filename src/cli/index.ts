/**
 * CLI program setup.
 *
 * Creates the Commander program, registers every command and exports it
 * for the entry point to parse.
 */
import { createRequire } from "node:module";

import { Command } from "commander";

import { registerAllCommands } from "./commands/index.js";
import { configureHelpStyles } from "./styles.js";

const require = createRequire(import.meta.url);
const packageJson = require("../../package.json") as { version: string };

/**
 * Build a fresh program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  configureHelpStyles(program);

  program
    .name("ensemble-agg")
    .description(
      "Streaming aggregation of stochastic trajectory ensembles: averages, spreads, stopping and merges",
    )
    .version(packageJson.version);

  registerAllCommands(program);

  return program;
}

/**
 * The CLI program instance.
 * Import this and call `.parse()` to run the CLI.
 */
export const program = createProgram();
