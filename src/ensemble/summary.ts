/**
 * Ensemble reporting.
 *
 * Turns an ensemble into a plain snake_case object for JSON/YAML output and
 * into a human-readable summary for the terminal.
 */

import { trace } from "../quantum/state.js";

import type { Ensemble } from "./ensemble.js";
import type {
  Complex,
  EndCondition,
  OperState,
  Seed,
} from "../types/index.js";

/**
 * Complex number as written in trajectory files.
 */
export type SerializedComplex = [re: number, im: number];

export interface CollapseReport {
  num_collapse: number;
  /** Collapse count per channel, over all runs */
  counts: number[];
  /** `[channel][time bin]` */
  photocurrent: number[][];
}

export interface TraceReport {
  average: number[];
  std: number[];
}

/**
 * Serializable snapshot of an ensemble.
 */
export interface EnsembleReport {
  solver?: string;
  num_trajectories: number;
  end_condition: EndCondition;
  estimated_ntraj?: number;
  observables: string[];
  times: number[];
  average_expect: Record<string, number[]>;
  std_expect: Record<string, number[]>;
  runs_expect?: Record<string, number[][]>;
  seeds: Seed[];
  steady_state?: SerializedComplex[][];
  average_final_state?: SerializedComplex[][];
  collapse?: CollapseReport;
  trace?: TraceReport;
}

export interface ReportOptions {
  /** Include the steady state averaged over this many final times (0: all) */
  steadyStateWindow?: number;
  /** Include per-run expectation values when runs are kept */
  includeRuns?: boolean;
}

function serializeComplex(value: Complex): SerializedComplex {
  return [value.re, value.im];
}

function serializeOperator(op: OperState): SerializedComplex[][] {
  return op.matrix.map((row) => row.map(serializeComplex));
}

/**
 * Build a plain report object.
 *
 * @param ensemble - Ensemble to report on
 * @param options - Optional sections
 * @returns Report ready for JSON or YAML serialization
 */
export function buildEnsembleReport(
  ensemble: Ensemble,
  options: ReportOptions = {},
): EnsembleReport {
  const { stats } = ensemble;
  const report: EnsembleReport = {
    num_trajectories: stats.num_trajectories,
    end_condition: stats.end_condition,
    observables: [...ensemble.observables],
    times: ensemble.times,
    average_expect: ensemble.averageEData,
    std_expect: ensemble.stdEData,
    seeds: ensemble.seeds,
  };

  if (ensemble.solver !== undefined) {
    report.solver = ensemble.solver;
  }
  if (stats.estimated_ntraj !== undefined) {
    report.estimated_ntraj = stats.estimated_ntraj;
  }

  const runs = options.includeRuns ? ensemble.runsEData : undefined;
  if (runs) {
    report.runs_expect = runs;
  }

  if (options.steadyStateWindow !== undefined) {
    const steady = ensemble.steadyState(options.steadyStateWindow);
    if (steady) {
      report.steady_state = serializeOperator(steady);
    }
  }

  const finalState = ensemble.averageFinalState;
  if (finalState) {
    report.average_final_state = serializeOperator(finalState);
  }

  const numCollapse = ensemble.numCollapse;
  if (numCollapse !== undefined) {
    const counts = Array.from({ length: numCollapse }, () => 0);
    for (const channels of ensemble.colWhich ?? []) {
      for (const channel of channels) {
        counts[channel] = (counts[channel] ?? 0) + 1;
      }
    }
    report.collapse = {
      num_collapse: numCollapse,
      counts,
      photocurrent: ensemble.photocurrent ?? [],
    };
  }

  const averageTrace = ensemble.averageTrace;
  if (averageTrace) {
    report.trace = {
      average: averageTrace,
      std: ensemble.stdTrace ?? [],
    };
  }

  return report;
}

/**
 * Short multi-line description, used by `Ensemble.toString()`.
 *
 * @example
 * ```
 * <Ensemble
 *   Time interval: [0, 1] (2 steps)
 *   Number of observables: 1
 *   State not saved.
 *   Number of trajectories: 3
 *   Trajectories not saved.
 *   End condition: unknown
 * >
 * ```
 */
export function describeEnsemble(ensemble: Ensemble): string {
  const lines = ["<Ensemble"];
  if (ensemble.solver !== undefined) {
    lines.push(`  Solver: ${ensemble.solver}`);
  }

  const { times } = ensemble;
  const first = times[0];
  const last = times[times.length - 1];
  if (first !== undefined && last !== undefined) {
    lines.push(
      `  Time interval: [${String(first)}, ${String(last)}] (${String(times.length)} steps)`,
    );
  }

  lines.push(`  Number of observables: ${String(ensemble.observables.length)}`);
  if (ensemble.averageStates) {
    lines.push("  States saved.");
  } else if (ensemble.averageFinalState) {
    lines.push("  Final state saved.");
  } else {
    lines.push("  State not saved.");
  }

  lines.push(`  Number of trajectories: ${String(ensemble.numTrajectories)}`);
  lines.push(
    ensemble.keepsRuns ? "  Trajectories saved." : "  Trajectories not saved.",
  );
  lines.push(`  End condition: ${ensemble.endCondition}`);
  lines.push(">");
  return lines.join("\n");
}

function formatPair(mean: number | undefined, std: number | undefined): string {
  return `${(mean ?? NaN).toFixed(4)} ± ${(std ?? NaN).toFixed(4)}`;
}

function realTrace(matrix: SerializedComplex[][]): number {
  return trace({
    type: "oper",
    matrix: matrix.map((row) => row.map(([re, im]) => ({ re, im }))),
  }).re;
}

/**
 * Format a report for CLI display.
 *
 * Observables are shown at the last time point.
 */
export function formatEnsembleSummary(report: EnsembleReport): string {
  const lines: string[] = [
    "Ensemble Summary:",
    "─".repeat(40),
    "",
    `Trajectories:       ${String(report.num_trajectories)}`,
    `End Condition:      ${report.end_condition}`,
  ];

  if (report.estimated_ntraj !== undefined) {
    lines.push(`Estimated Total:    ${String(report.estimated_ntraj)}`);
  }
  lines.push(`Time Points:        ${String(report.times.length)}`);

  if (report.observables.length > 0) {
    lines.push("");
    lines.push("Observables (final time):");
    for (const key of report.observables) {
      const means = report.average_expect[key] ?? [];
      const stds = report.std_expect[key] ?? [];
      lines.push(
        `  ${`${key}:`.padEnd(18)}${formatPair(means[means.length - 1], stds[stds.length - 1])}`,
      );
    }
  }

  if (report.steady_state) {
    lines.push("");
    lines.push(
      `Steady State:       ${String(report.steady_state.length)}x${String(report.steady_state.length)} (trace ${realTrace(report.steady_state).toFixed(4)})`,
    );
  }

  if (report.collapse) {
    lines.push("");
    lines.push("Collapses:");
    report.collapse.counts.forEach((count, channel) => {
      lines.push(`  ${`Channel ${String(channel)}:`.padEnd(18)}${String(count)}`);
    });
  }

  if (report.trace) {
    const { average, std } = report.trace;
    lines.push("");
    lines.push(
      `Trace (final time): ${formatPair(average[average.length - 1], std[std.length - 1])}`,
    );
  }

  return lines.join("\n");
}
