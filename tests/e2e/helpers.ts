/**
 * Fixtures for end-to-end runs of the CLI.
 *
 * @module tests/e2e/helpers
 */

import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

import type { TrajectorySample } from "../../src/types/index.js";

export function createWorkDir(): string {
  return mkdtempSync(path.join(tmpdir(), "ensemble-e2e-"));
}

export function createTrajectory(seed: number, values: number[]): TrajectorySample {
  return {
    seed,
    times: [0, 1],
    expect: [values],
    collapse_events: [{ time: 0.5, channel: seed % 2 }],
  };
}

/**
 * Write a JSON document partition.
 */
export function writeDocument(
  dir: string,
  name: string,
  trajectories: TrajectorySample[],
): string {
  const filePath = path.join(dir, name);
  writeFileSync(
    filePath,
    JSON.stringify({ observables: ["x"], num_collapse: 2, trajectories }),
  );
  return filePath;
}

/**
 * Write a JSON Lines partition with a header line.
 */
export function writeLines(
  dir: string,
  name: string,
  trajectories: TrajectorySample[],
): string {
  const filePath = path.join(dir, name);
  const lines = [
    JSON.stringify({ observables: ["x"], num_collapse: 2 }),
    ...trajectories.map((t) => JSON.stringify(t)),
  ];
  writeFileSync(filePath, `${lines.join("\n")}\n`);
  return filePath;
}
