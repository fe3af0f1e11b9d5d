/**
 * Trajectory file loading.
 *
 * Supported layouts:
 * - JSON or YAML document `{ observables?, num_collapse?, solver?, trajectories }`
 * - JSON or YAML list of trajectories
 * - JSON Lines (`.jsonl`, `.ndjson`): one trajectory per line, optionally
 *   preceded by a header line without `times` carrying the document fields
 *
 * Complex numbers may be written as `[re, im]`, `{ re, im }` or a plain
 * real number.
 */

import path from "node:path";

import { z } from "zod";

import { arraysEqual } from "../utils/array.js";
import { parseJsonLines, readJson, readText, readYaml } from "../utils/file-io.js";
import { logger } from "../utils/logging.js";

import type {
  CollapseEvent,
  QuantumState,
  TrajectorySample,
} from "../types/index.js";

// =============================================================================
// Schemas
// =============================================================================

export const ComplexSchema = z.union([
  z.number().transform((re) => ({ re, im: 0 })),
  z.tuple([z.number(), z.number()]).transform(([re, im]) => ({ re, im })),
  z.object({ re: z.number(), im: z.number().default(0) }),
]);

export const QuantumStateSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("ket"),
    amplitudes: z.array(ComplexSchema).min(1),
  }),
  z.object({
    type: z.literal("oper"),
    matrix: z.array(z.array(ComplexSchema).min(1)).min(1),
  }),
]);

export const CollapseEventSchema = z.union([
  z.object({
    time: z.number().finite(),
    channel: z.number().int().nonnegative(),
  }),
  z
    .tuple([z.number().finite(), z.number().int().nonnegative()])
    .transform(([time, channel]) => ({ time, channel })),
]);

export const TrajectorySchema = z.object({
  seed: z.union([z.string(), z.number()]).optional(),
  times: z.array(z.number().finite()).min(1),
  expect: z.array(z.array(z.number())).default([]),
  states: z.array(QuantumStateSchema).optional(),
  final_state: QuantumStateSchema.optional(),
  collapse_events: z.array(CollapseEventSchema).optional(),
  reweight_trace: z.array(z.number()).optional(),
});

const HeaderSchema = z.object({
  observables: z.array(z.string().min(1)).optional(),
  num_collapse: z.number().int().nonnegative().optional(),
  solver: z.string().optional(),
});

export const TrajectoryDocumentSchema = z.union([
  HeaderSchema.extend({ trajectories: z.array(TrajectorySchema) }),
  z.array(TrajectorySchema).transform((trajectories) => ({
    trajectories,
    observables: undefined,
    num_collapse: undefined,
    solver: undefined,
  })),
]);

type ParsedTrajectory = z.infer<typeof TrajectorySchema>;

// =============================================================================
// Loading
// =============================================================================

/**
 * Contents of one trajectory file.
 */
export interface TrajectoryFile {
  source: string;
  observables: string[] | undefined;
  numCollapse: number | undefined;
  solver: string | undefined;
  trajectories: TrajectorySample[];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join(", ");
}

function toTrajectory(
  parsed: ParsedTrajectory,
  fallbackSeed: string,
): TrajectorySample {
  const trajectory: TrajectorySample = {
    seed: parsed.seed ?? fallbackSeed,
    times: parsed.times,
    expect: parsed.expect,
  };
  const states: QuantumState[] | undefined = parsed.states;
  if (states) {
    trajectory.states = states;
  }
  if (parsed.final_state) {
    trajectory.final_state = parsed.final_state;
  }
  const events: CollapseEvent[] | undefined = parsed.collapse_events;
  if (events) {
    trajectory.collapse_events = events;
  }
  if (parsed.reweight_trace) {
    trajectory.reweight_trace = parsed.reweight_trace;
  }
  return trajectory;
}

/**
 * Validate a parsed document.
 *
 * Trajectories without a seed get `<file name>#<index>`.
 *
 * @param raw - Parsed JSON or YAML value
 * @param source - File path, used in seeds and error messages
 * @throws Error listing every invalid path
 */
export function parseTrajectoryDocument(
  raw: unknown,
  source: string,
): TrajectoryFile {
  const result = TrajectoryDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid trajectory file ${source}: ${formatIssues(result.error)}`,
    );
  }

  const { data } = result;
  const base = path.basename(source);
  return {
    source,
    observables: data.observables,
    numCollapse: data.num_collapse,
    solver: data.solver,
    trajectories: data.trajectories.map((t, i) =>
      toTrajectory(t, `${base}#${String(i)}`),
    ),
  };
}

function isHeaderLine(value: unknown): boolean {
  return typeof value === "object" && value !== null && !("times" in value);
}

/**
 * Validate JSON Lines content.
 *
 * @param content - Raw file content
 * @param source - File path, used in seeds and error messages
 */
export function parseTrajectoryLines(
  content: string,
  source: string,
): TrajectoryFile {
  const values = parseJsonLines(content);
  const [first, ...rest] = values;
  if (first !== undefined && isHeaderLine(first)) {
    const header = HeaderSchema.safeParse(first);
    if (!header.success) {
      throw new Error(
        `Invalid trajectory file ${source}: header: ${formatIssues(header.error)}`,
      );
    }
    return parseTrajectoryDocument(
      { ...header.data, trajectories: rest },
      source,
    );
  }
  return parseTrajectoryDocument(values, source);
}

/**
 * Read a trajectory file, choosing the format from its extension.
 *
 * @param filePath - `.json`, `.yaml`/`.yml` or `.jsonl`/`.ndjson`
 */
export function readTrajectoryFile(filePath: string): TrajectoryFile {
  const ext = path.extname(filePath).toLowerCase();
  let file: TrajectoryFile;
  if (ext === ".jsonl" || ext === ".ndjson") {
    file = parseTrajectoryLines(readText(filePath), filePath);
  } else if (ext === ".yaml" || ext === ".yml") {
    file = parseTrajectoryDocument(readYaml(filePath), filePath);
  } else {
    file = parseTrajectoryDocument(readJson(filePath), filePath);
  }
  logger.debug(
    `Read ${String(file.trajectories.length)} trajectories from ${filePath}`,
  );
  return file;
}

// =============================================================================
// Shape check
// =============================================================================

/**
 * Result of checking a file's trajectories against one another.
 */
export interface TrajectoryFileCheck {
  source: string;
  trajectories: number;
  observables: number;
  timePoints: number;
  issues: string[];
}

/**
 * Check that every trajectory shares the first one's times and expectation
 * layout. Does not aggregate anything.
 */
export function checkTrajectoryFile(file: TrajectoryFile): TrajectoryFileCheck {
  const issues: string[] = [];
  const [first] = file.trajectories;
  const times = first?.times ?? [];
  const rows = file.observables?.length ?? first?.expect.length ?? 0;

  file.trajectories.forEach((trajectory, i) => {
    const label = `trajectory ${String(i)} (${JSON.stringify(trajectory.seed)})`;
    if (!arraysEqual(trajectory.times, times)) {
      issues.push(`${label}: times differ from the first trajectory`);
    }
    if (trajectory.expect.length !== rows) {
      issues.push(
        `${label}: ${String(trajectory.expect.length)} expectation rows, expected ${String(rows)}`,
      );
    }
    trajectory.expect.forEach((row, k) => {
      if (row.length !== trajectory.times.length) {
        issues.push(
          `${label}: row ${String(k)} has ${String(row.length)} values for ${String(trajectory.times.length)} times`,
        );
      }
    });
    if (trajectory.states && trajectory.states.length !== trajectory.times.length) {
      issues.push(
        `${label}: ${String(trajectory.states.length)} states for ${String(trajectory.times.length)} times`,
      );
    }
    const numCollapse = file.numCollapse;
    if (numCollapse !== undefined) {
      for (const event of trajectory.collapse_events ?? []) {
        if (event.channel >= numCollapse) {
          issues.push(
            `${label}: collapse channel ${String(event.channel)} out of range [0, ${String(numCollapse)})`,
          );
        }
      }
    }
  });

  return {
    source: file.source,
    trajectories: file.trajectories.length,
    observables: rows,
    timePoints: times.length,
    issues,
  };
}
