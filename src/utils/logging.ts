/**
 * Console logger with level filtering and colored output.
 *
 * All output goes to stderr so that reports printed on stdout
 * (JSON, YAML) can be piped without log noise.
 */

import chalk from "chalk";

/**
 * Supported log levels, most verbose first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  level: LogLevel;
  /** Prefix each line with an ISO timestamp */
  timestamps: boolean;
}

/**
 * Parse a log level from an arbitrary string (e.g. an environment variable).
 *
 * @param raw - Raw value
 * @returns Matching level, or undefined when not recognized
 */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

const config: LoggerConfig = {
  level: parseLogLevel(process.env["ENSEMBLE_LOG_LEVEL"]) ?? "info",
  timestamps: false,
};

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.level];
}

function formatMeta(meta: Record<string, unknown> | undefined): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  const parts = Object.entries(meta).map(([key, value]) => {
    const rendered =
      value instanceof Error ? value.message : JSON.stringify(value);
    return `${key}=${rendered ?? "undefined"}`;
  });
  return ` ${chalk.dim(parts.join(" "))}`;
}

function write(line: string): void {
  const prefix = config.timestamps
    ? `${chalk.dim(new Date().toISOString())} `
    : "";
  process.stderr.write(`${prefix}${line}\n`);
}

export const logger = {
  /**
   * Update logger configuration. Unspecified fields are left as they are.
   */
  configure(update: Partial<LoggerConfig>): void {
    if (update.level !== undefined) {
      config.level = update.level;
    }
    if (update.timestamps !== undefined) {
      config.timestamps = update.timestamps;
    }
  },

  /** Current effective level. */
  get level(): LogLevel {
    return config.level;
  },

  debug(message: string, meta?: Record<string, unknown>): void {
    if (enabled("debug")) {
      write(`${chalk.gray("[debug]")} ${message}${formatMeta(meta)}`);
    }
  },

  info(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      write(`${chalk.blue("ℹ")} ${message}${formatMeta(meta)}`);
    }
  },

  success(message: string, meta?: Record<string, unknown>): void {
    if (enabled("info")) {
      write(`${chalk.green("✔")} ${message}${formatMeta(meta)}`);
    }
  },

  warn(message: string, meta?: Record<string, unknown>): void {
    if (enabled("warn")) {
      write(`${chalk.yellow("⚠")} ${message}${formatMeta(meta)}`);
    }
  },

  error(message: string, meta?: Record<string, unknown>): void {
    if (enabled("error")) {
      write(`${chalk.red("✖")} ${message}${formatMeta(meta)}`);
    }
  },

  /**
   * Progress line, e.g. `[3/10] partition-a.json: 120 trajectories`.
   */
  progress(current: number, total: number, message: string): void {
    if (enabled("info")) {
      write(
        `${chalk.cyan(`[${String(current)}/${String(total)}]`)} ${message}`,
      );
    }
  },

  /**
   * Section header for a phase of work.
   */
  stageHeader(title: string, itemCount?: number): void {
    if (!enabled("info")) {
      return;
    }
    const suffix =
      itemCount !== undefined ? chalk.dim(` (${String(itemCount)} items)`) : "";
    write("");
    write(`${chalk.bold.cyan(title)}${suffix}`);
    write(chalk.dim("─".repeat(40)));
  },
};

export type Logger = typeof logger;
