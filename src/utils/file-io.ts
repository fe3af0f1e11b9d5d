/**
 * File I/O utilities.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { nanoid } from "nanoid";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

/**
 * Ensure a directory exists, creating it if necessary.
 *
 * @param dirPath - Path to directory
 */
export function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read a JSON file.
 *
 * @param filePath - Path to file
 * @returns Parsed JSON content
 * @throws Error if file doesn't exist or isn't valid JSON
 */
export function readJson(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  return JSON.parse(content) as unknown;
}

/**
 * Write a JSON file.
 *
 * @param filePath - Path to file
 * @param data - Data to write
 * @param pretty - Whether to format with indentation (default: true)
 */
export function writeJson(
  filePath: string,
  data: unknown,
  pretty = true,
): void {
  ensureDir(path.dirname(filePath));
  const content = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  writeFileSync(filePath, content, "utf-8");
}

/**
 * Read a YAML file.
 *
 * @param filePath - Path to file
 * @returns Parsed YAML content
 * @throws Error if file doesn't exist or isn't valid YAML
 */
export function readYaml(filePath: string): unknown {
  const content = readFileSync(filePath, "utf-8");
  return parseYaml(content) as unknown;
}

/**
 * Serialize data as YAML text.
 */
export function toYaml(data: unknown): string {
  return stringifyYaml(data);
}

/**
 * Read a text file.
 *
 * @param filePath - Path to file
 * @returns File content
 */
export function readText(filePath: string): string {
  return readFileSync(filePath, "utf-8");
}

/**
 * Parse JSON Lines content: one JSON value per non-blank line.
 *
 * @param content - Raw file content
 * @returns Parsed values in line order
 * @throws Error naming the 1-based line number of the first invalid line
 */
export function parseJsonLines(content: string): unknown[] {
  const values: unknown[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    try {
      values.push(JSON.parse(line) as unknown);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid JSON on line ${String(index + 1)}: ${reason}`);
    }
  });
  return values;
}

/**
 * Generate a unique run ID.
 *
 * Format: YYYYMMDD-HHMMSS-XXXX (timestamp + random suffix)
 *
 * @returns Unique run ID
 */
export function generateRunId(): string {
  const now = new Date();

  const datePart = [
    now.getFullYear(),
    String(now.getMonth() + 1).padStart(2, "0"),
    String(now.getDate()).padStart(2, "0"),
  ].join("");

  const timePart = [
    String(now.getHours()).padStart(2, "0"),
    String(now.getMinutes()).padStart(2, "0"),
    String(now.getSeconds()).padStart(2, "0"),
  ].join("");

  const randomPart = nanoid(4);

  return `${datePart}-${timePart}-${randomPart}`;
}

/**
 * Get the results directory for a run.
 *
 * @param runId - Run ID
 * @returns Results directory path
 */
export function getResultsDir(runId: string): string {
  return path.join(process.cwd(), "results", runId);
}
