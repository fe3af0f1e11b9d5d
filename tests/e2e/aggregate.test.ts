/**
 * End-to-end runs of the CLI over trajectory files on disk.
 *
 * Commands are parsed by the real program; only the logger is replaced so
 * that stderr stays quiet.
 *
 * @module tests/e2e/aggregate
 */

import { readdirSync, rmSync } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createProgram } from "../../src/cli/index.js";
import { readJson } from "../../src/utils/file-io.js";
import { logger } from "../../src/utils/logging.js";

import {
  createTrajectory,
  createWorkDir,
  writeDocument,
  writeLines,
} from "./helpers.js";

vi.mock("../../src/utils/logging.js", () => ({
  logger: {
    configure: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
    stageHeader: vi.fn(),
  },
}));

describe("ensemble-agg", () => {
  let dir: string;
  let first: string;
  let second: string;

  function stdout(spy: { mock: { calls: unknown[][] } }): string {
    return spy.mock.calls.map(([line]) => String(line)).join("\n");
  }

  beforeEach(() => {
    dir = createWorkDir();
    first = writeDocument(dir, "a.json", [
      createTrajectory(1, [1, 2]),
      createTrajectory(2, [3, 4]),
    ]);
    second = writeLines(dir, "b.jsonl", [createTrajectory(3, [5, 6])]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.clearAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("aggregates and merges every partition", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createProgram().parse(["aggregate", first, second, "-o", "json"], { from: "user" });

    const report: unknown = JSON.parse(stdout(log));
    expect(report).toMatchObject({
      num_trajectories: 3,
      end_condition: "merged",
      observables: ["x"],
      times: [0, 1],
      average_expect: { x: [3, 4] },
      seeds: [1, 2, 3],
      collapse: { num_collapse: 2, counts: [1, 2] },
    });
  });

  it("stops each partition at the trajectory count", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createProgram().parse(["aggregate", first, second, "--ntraj", "1", "-o", "json"], {
      from: "user",
    });

    expect(JSON.parse(stdout(log))).toMatchObject({
      num_trajectories: 2,
      seeds: [1, 3],
      average_expect: { x: [3, 4] },
    });
    expect(logger.info).toHaveBeenCalledWith(
      `${first}: ntraj_reached after 1 of 2 trajectories`,
    );
  });

  it("prints a summary with the partition table", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    createProgram().parse(["aggregate", first, second], { from: "user" });

    const output = stdout(log);
    expect(output).toContain("Trajectories:       3\n");
    expect(output).toContain(`  ${first}: 2/2 (unknown)\n`);
    expect(output).toContain(`  ${second}: 1/1 (unknown)`);
  });

  it("saves the report under the results directory", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(process, "cwd").mockReturnValue(dir);

    createProgram().parse(["aggregate", first, "--save", "-o", "json"], { from: "user" });

    const runs = readdirSync(path.join(dir, "results"));
    expect(runs).toHaveLength(1);
    const saved = readJson(path.join(dir, "results", runs[0] ?? "", "ensemble.json"));
    expect(saved).toMatchObject({ num_trajectories: 2, seeds: [1, 2] });
  });

  it("fails validation for inconsistent files", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit");
    });
    const broken = writeDocument(dir, "broken.json", [
      createTrajectory(1, [1, 2]),
      { seed: 2, times: [0, 1], expect: [[3]] },
    ]);

    expect(() =>
      createProgram().parse(["validate", first, broken], { from: "user" }),
    ).toThrow("process.exit");

    expect(stdout(log)).toBe(
      [
        `ok ${first}: 2 trajectories, 1 observables, 2 times`,
        `FAILED ${broken}: 2 trajectories, 1 observables, 2 times`,
        "  - trajectory 1 (2): row 0 has 1 values for 2 times",
      ].join("\n"),
    );
    expect(logger.error).toHaveBeenCalledWith("1 of 2 file(s) failed validation");
  });
});
