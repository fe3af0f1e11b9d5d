/**
 * CLI output formatters.
 *
 * Reports go to stdout; logs go to stderr through the logger.
 */
import YAML from "yaml";

import { formatEnsembleSummary } from "../ensemble/summary.js";

import type { OutputFormat } from "../config/index.js";
import type { EnsembleReport } from "../ensemble/summary.js";
import type { TrajectoryFileCheck } from "../io/trajectory-file.js";
import type { PartitionResult } from "../pipeline/run.js";

/**
 * Partition table shown under the CLI summary.
 */
export function formatPartitions(partitions: readonly PartitionResult[]): string {
  const lines = ["Partitions:"];
  for (const partition of partitions) {
    lines.push(
      `  ${partition.source}: ${String(partition.consumed)}/${String(partition.available)} (${partition.ensemble.endCondition})`,
    );
  }
  return lines.join("\n");
}

/**
 * Print an aggregation report in the requested format.
 */
export function outputReport(
  report: EnsembleReport,
  format: OutputFormat,
  partitions: readonly PartitionResult[] = [],
): void {
  switch (format) {
    case "json":
      console.log(JSON.stringify(report, null, 2));
      return;
    case "yaml":
      console.log(YAML.stringify(report));
      return;
    case "cli":
      console.log("\n" + formatEnsembleSummary(report));
      if (partitions.length > 1) {
        console.log("\n" + formatPartitions(partitions));
      }
      console.log("");
      return;
  }
}

/**
 * One line per checked file, followed by its issues.
 */
export function formatValidation(checks: readonly TrajectoryFileCheck[]): string {
  const lines: string[] = [];
  for (const check of checks) {
    const status = check.issues.length === 0 ? "ok" : "FAILED";
    lines.push(
      `${status} ${check.source}: ${String(check.trajectories)} trajectories, ${String(check.observables)} observables, ${String(check.timePoints)} times`,
    );
    for (const issue of check.issues) {
      lines.push(`  - ${issue}`);
    }
  }
  return lines.join("\n");
}
