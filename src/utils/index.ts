/**
 * Utility re-exports.
 */

export {
  addArrays,
  arraysEqual,
  diff,
  zeros,
} from "./array.js";

export {
  ensureDir,
  generateRunId,
  getResultsDir,
  parseJsonLines,
  readJson,
  readText,
  readYaml,
  toYaml,
  writeJson,
} from "./file-io.js";

export { logger, parseLogLevel } from "./logging.js";
export type { LogLevel, LoggerConfig } from "./logging.js";
