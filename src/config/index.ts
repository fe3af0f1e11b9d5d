/**
 * Configuration loading.
 *
 * Reads the YAML config file (when there is one), applies CLI overrides and
 * validates the result.
 */

import { existsSync } from "node:fs";

import { EnsembleConfigSchema } from "./schema.js";
import { readYaml } from "../utils/file-io.js";
import { logger } from "../utils/logging.js";

import type { CLIOptions } from "./cli-schema.js";
import type { EnsembleConfig, StoppingConfig } from "./schema.js";
import type { StoppingPolicy } from "../types/index.js";

export * from "./schema.js";
export { CLIOptionsSchema, extractCLIOptions } from "./cli-schema.js";
export type { CLIOptions } from "./cli-schema.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

/**
 * Validate a raw configuration object.
 *
 * @throws Error listing every invalid path
 */
export function parseConfig(raw: unknown): EnsembleConfig {
  const result = EnsembleConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Load and validate a config file.
 *
 * @param configPath - YAML file path
 * @throws Error if the file is missing or invalid
 */
export function loadConfig(configPath: string): EnsembleConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  return parseConfig(readYaml(configPath));
}

/**
 * Raw config with CLI overrides applied on top.
 */
export function applyCLIOverrides(
  raw: Record<string, unknown>,
  cliOptions: CLIOptions,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const stopping = section(raw, "stopping");
  const output = section(raw, "output");

  if (cliOptions.ntraj !== undefined) {
    stopping["ntraj"] = cliOptions.ntraj;
  }
  const tol = cliOptions.targetTol;
  if (tol) {
    stopping["target_tol"] = tol.length === 1 ? tol[0] : tol;
  }
  if (cliOptions.storeStates) {
    merged["store_states"] = true;
  }
  if (cliOptions.storeFinalState) {
    merged["store_final_state"] = true;
  }
  if (cliOptions.keepRuns) {
    merged["keep_runs"] = true;
    output["include_runs"] = true;
  }
  if (cliOptions.steadyState !== undefined) {
    output["steady_state_window"] = cliOptions.steadyState;
  }
  if (cliOptions.output !== undefined) {
    output["format"] = cliOptions.output;
  }
  if (cliOptions.save) {
    output["save"] = true;
  }
  if (cliOptions.verbose) {
    merged["verbose"] = true;
  }

  merged["stopping"] = stopping;
  merged["output"] = output;
  return merged;
}

/**
 * Load configuration with CLI overrides.
 *
 * @param configPath - Optional YAML file; defaults apply without one
 * @param cliOptions - Validated CLI options
 * @returns Validated configuration
 */
export function loadConfigWithOverrides(
  configPath: string | undefined,
  cliOptions: CLIOptions,
): EnsembleConfig {
  let raw: Record<string, unknown> = {};
  if (configPath !== undefined) {
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    const loaded = readYaml(configPath);
    if (isRecord(loaded)) {
      raw = loaded;
    } else if (loaded !== null && loaded !== undefined) {
      throw new Error(`Invalid configuration: ${configPath} is not a mapping`);
    }
    logger.debug(`Loaded config from ${configPath}`);
  }
  return parseConfig(applyCLIOverrides(raw, cliOptions));
}

/**
 * Stopping policy described by a stopping config section.
 */
export function resolveStoppingPolicy(stopping: StoppingConfig): StoppingPolicy {
  const { ntraj, target_tol: targetTol } = stopping;
  if (ntraj === undefined) {
    return { kind: "unbounded" };
  }
  if (targetTol === undefined) {
    return { kind: "fixed", ntraj };
  }
  return { kind: "tolerance", ntraj, targetTol };
}
