/**
 * CLI helper functions.
 */
import { logger } from "../utils/logging.js";

/**
 * Handle CLI errors consistently across all commands.
 *
 * Logs the error message and exits with code 1.
 * This function never returns (process.exit terminates execution).
 *
 * @param err - Error to handle (can be Error instance or any other value)
 */
export function handleCLIError(err: unknown): never {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

/**
 * Extract config file path from CLI options.
 *
 * @param options - Raw options from Commander.js
 * @param defaultPath - Path used when `--config` is not given
 * @returns Config file path, or undefined to run on defaults
 */
export function extractConfigPath(
  options: Record<string, unknown>,
  defaultPath?: string,
): string | undefined {
  return typeof options["config"] === "string"
    ? options["config"]
    : defaultPath;
}
