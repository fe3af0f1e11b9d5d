/**
 * Aggregation run over trajectory files.
 *
 * Each file is one partition, aggregated into its own ensemble the way an
 * independent worker would. The partial ensembles are then combined with a
 * reduce-tree merge.
 */

import { resolveStoppingPolicy } from "../config/index.js";
import { Ensemble } from "../ensemble/ensemble.js";
import { reduceEnsembles } from "../ensemble/merge.js";
import { readTrajectoryFile, type TrajectoryFile } from "../io/trajectory-file.js";
import { logger } from "../utils/logging.js";

import type { EnsembleConfig } from "../config/index.js";
import type { EnsembleOptions, TrackingOptions } from "../types/index.js";

/**
 * Outcome of aggregating one partition.
 */
export interface PartitionResult {
  source: string;
  ensemble: Ensemble;
  /** Trajectories added before the partition stopped */
  consumed: number;
  /** Trajectories present in the file */
  available: number;
}

export interface AggregationResult {
  ensemble: Ensemble;
  partitions: PartitionResult[];
}

/**
 * Observable keys for a file: configured keys first, then the file's own,
 * then positional keys ("0", "1", ...) matching the first trajectory.
 */
export function resolveObservables(
  config: EnsembleConfig,
  file: TrajectoryFile,
): string[] {
  if (config.observables) {
    return [...config.observables];
  }
  if (file.observables) {
    return [...file.observables];
  }
  const rows = file.trajectories[0]?.expect.length ?? 0;
  return Array.from({ length: rows }, (_, i) => String(i));
}

/**
 * Ensemble options for one partition.
 */
export function buildEnsembleOptions(
  config: EnsembleConfig,
  file: TrajectoryFile,
): EnsembleOptions {
  const tracking: TrackingOptions = { trace: config.tracking.trace };
  const numCollapse = config.tracking.num_collapse ?? file.numCollapse;
  if (numCollapse !== undefined) {
    tracking.numCollapse = numCollapse;
  }

  const options: EnsembleOptions = {
    observables: resolveObservables(config, file),
    storeFinalState: config.store_final_state,
    keepRunsResults: config.keep_runs,
    stopping: resolveStoppingPolicy(config.stopping),
    tracking,
  };
  if (config.store_states !== undefined) {
    options.storeStates = config.store_states;
  }
  const solver = config.solver ?? file.solver;
  if (solver !== undefined) {
    options.solver = solver;
  }
  return options;
}

/**
 * Aggregate one partition, stopping as soon as the ensemble reports that
 * no more trajectories are needed.
 */
export function aggregatePartition(
  file: TrajectoryFile,
  config: EnsembleConfig,
): PartitionResult {
  const ensemble = Ensemble.create(buildEnsembleOptions(config, file));

  let consumed = 0;
  for (const trajectory of file.trajectories) {
    const remaining = ensemble.add(trajectory);
    consumed += 1;
    if (remaining <= 0) {
      break;
    }
  }

  if (consumed < file.trajectories.length) {
    logger.info(
      `${file.source}: ${ensemble.endCondition} after ${String(consumed)} of ${String(file.trajectories.length)} trajectories`,
    );
  }

  return {
    source: file.source,
    ensemble,
    consumed,
    available: file.trajectories.length,
  };
}

/**
 * Aggregate every file and merge the partitions.
 *
 * @param filePaths - Trajectory files, one partition each
 * @param config - Validated configuration
 * @throws Error if no files are given or a file cannot be read
 * @throws EnsembleError subclasses for shape, configuration or merge failures
 */
export function runAggregation(
  filePaths: readonly string[],
  config: EnsembleConfig,
): AggregationResult {
  if (filePaths.length === 0) {
    throw new Error("No trajectory files given");
  }

  logger.stageHeader("Aggregating trajectories", filePaths.length);

  const partitions = filePaths.map((filePath, index) => {
    const partition = aggregatePartition(readTrajectoryFile(filePath), config);
    logger.progress(
      index + 1,
      filePaths.length,
      `${filePath}: ${String(partition.consumed)} trajectories`,
    );
    return partition;
  });

  const ensemble = reduceEnsembles(partitions.map((p) => p.ensemble));
  logger.success(
    `Aggregated ${String(ensemble.numTrajectories)} trajectories from ${String(partitions.length)} partition(s)`,
  );

  return { ensemble, partitions };
}
