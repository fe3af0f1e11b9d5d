/**
 * Ensemble - streaming aggregation of independent trajectories.
 *
 * Trajectories are added one at a time, in any order. The ensemble keeps
 * running sums only (plus the raw runs when asked to), so nothing already
 * added is ever read again. Averages, standard deviations and averaged
 * states are projected from those sums on demand.
 *
 * An ensemble is owned by a single caller. Parallel work uses one ensemble
 * per worker, combined afterwards with {@link Ensemble.merge}.
 */

import {
  createAccumulators,
  intersectFeatures,
  mergeAccumulators,
  restrictAccumulators,
  type Accumulators,
  type EnsembleFeatures,
} from "./accumulators.js";
import {
  averagePhotocurrent,
  collapseChannels,
  collapseTimes,
  createCollapseProcessor,
  runsPhotocurrent,
} from "./collapse.js";
import {
  ConfigurationError,
  IncompatibleAggregationsError,
  ShapeMismatchError,
} from "./errors.js";
import { createTraceProcessor } from "./martingale.js";
import { meanOf, stdOf } from "./moments.js";
import { ProcessorPipeline } from "./pipeline.js";
import {
  createExpectProcessor,
  createFinalStateProcessor,
  createRunsProcessor,
  createStatesProcessor,
  finalStateOf,
  type AccumulatorContext,
} from "./processors.js";
import { createStoppingCriterion, type StoppingCriterion } from "./stopping.js";
import { describeEnsemble } from "./summary.js";
import {
  divideOperator,
  stateDimension,
  sumOperators,
} from "../quantum/state.js";
import { arraysEqual } from "../utils/array.js";
import { logger } from "../utils/logging.js";

import type {
  CollapseEvent,
  EndCondition,
  EnsembleOptions,
  EnsembleStats,
  OperState,
  QuantumState,
  Seed,
  TrajectoryProcessor,
  TrajectorySample,
  TrajectoryShape,
} from "../types/index.js";

interface ActiveState {
  phase: "active";
  shape: TrajectoryShape;
  accumulators: Accumulators;
}

/**
 * Accumulators exist only once the first trajectory has fixed the shape.
 */
type Lifecycle = { phase: "uninitialized" } | ActiveState;

interface EnsembleInit {
  observables: readonly string[];
  solver: string | undefined;
  features: EnsembleFeatures;
  criterion: StoppingCriterion;
  processors: readonly TrajectoryProcessor[];
}

function resolveFeatures(
  options: EnsembleOptions,
  numObservables: number,
): EnsembleFeatures {
  const numCollapse = options.tracking?.numCollapse;
  if (
    numCollapse !== undefined &&
    (!Number.isInteger(numCollapse) || numCollapse < 0)
  ) {
    throw new ConfigurationError(
      `numCollapse must be a non-negative integer, got ${String(numCollapse)}`,
    );
  }

  const storeStates = options.storeStates ?? numObservables === 0;
  return {
    storeStates,
    storeFinalState: storeStates || (options.storeFinalState ?? false),
    keepRuns: options.keepRunsResults ?? false,
    numCollapse,
    trace: options.tracking?.trace ?? false,
  };
}

function assertUniqueObservables(observables: readonly string[]): void {
  const seen = new Set<string>();
  for (const key of observables) {
    if (seen.has(key)) {
      throw new ConfigurationError(`Duplicate observable key: ${key}`);
    }
    seen.add(key);
  }
}

function sameKeys(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((key, i) => key === b[i]);
}

export class Ensemble {
  /** Observable keys, in `expect` row order */
  readonly observables: readonly string[];
  readonly solver: string | undefined;

  readonly #features: EnsembleFeatures;
  readonly #criterion: StoppingCriterion;
  readonly #pipeline = new ProcessorPipeline<AccumulatorContext>();
  readonly #hasCustomProcessors: boolean;

  #lifecycle: Lifecycle = { phase: "uninitialized" };
  #numTrajectories = 0;
  #seeds: Seed[] = [];
  #endCondition: EndCondition;
  #estimatedNtraj: number | undefined;

  private constructor(init: EnsembleInit) {
    this.observables = [...init.observables];
    this.solver = init.solver;
    this.#features = init.features;
    this.#criterion = init.criterion;
    this.#endCondition = init.criterion.initialEndCondition;
    this.#estimatedNtraj = init.criterion.initialEstimate;
    this.#hasCustomProcessors = init.processors.length > 0;

    const { features } = init;
    if (features.keepRuns) {
      this.#pipeline.register(createRunsProcessor());
    }
    if (features.storeStates) {
      this.#pipeline.register(createStatesProcessor());
    }
    if (features.storeFinalState) {
      this.#pipeline.register(createFinalStateProcessor(features.storeStates));
    }
    if (this.observables.length > 0) {
      this.#pipeline.register(createExpectProcessor());
    }
    if (features.numCollapse !== undefined) {
      this.#pipeline.register(createCollapseProcessor(features.numCollapse));
    }
    if (features.trace) {
      this.#pipeline.register(createTraceProcessor());
    }
    for (const processor of init.processors) {
      this.#pipeline.register(processor);
    }
    this.#pipeline.seal();
  }

  /**
   * Create an empty ensemble.
   *
   * @throws ConfigurationError for invalid stopping or tracking options
   *
   * @example
   * ```typescript
   * const ensemble = Ensemble.create({
   *   observables: ["n"],
   *   stopping: { kind: "tolerance", ntraj: 1000, targetTol: [0.01, 0.05] },
   * });
   * for (const trajectory of runs) {
   *   if (ensemble.add(trajectory) <= 0) break;
   * }
   * ```
   */
  static create(options: EnsembleOptions = {}): Ensemble {
    const observables = options.observables ?? [];
    assertUniqueObservables(observables);
    const features = resolveFeatures(options, observables.length);
    const criterion = createStoppingCriterion(
      options.stopping ?? { kind: "unbounded" },
      observables.length,
    );

    return new Ensemble({
      observables,
      solver: options.solver,
      features,
      criterion,
      processors: options.processors ?? [],
    });
  }

  // ===========================================================================
  // Ingestion
  // ===========================================================================

  /**
   * Add one trajectory.
   *
   * The first trajectory fixes the shape (times, observable count, state
   * dimensions). A trajectory that does not fit is rejected with a
   * `ShapeMismatchError` and the ensemble is left as it was. The same holds
   * when a caller-supplied processor throws from `reduce`, except for the
   * state of the caller's own processors.
   *
   * @returns Estimated number of trajectories still needed (may be Infinity)
   */
  add(trajectory: TrajectorySample): number {
    const current = this.#lifecycle;
    const shape =
      current.phase === "active" ? current.shape : this.#deriveShape(trajectory);

    this.#checkShape(trajectory, shape);
    this.#pipeline.check(trajectory, shape);

    const active: ActiveState =
      current.phase === "active"
        ? current
        : {
            phase: "active",
            shape,
            accumulators: createAccumulators(shape, this.#features),
          };
    if (current.phase === "uninitialized") {
      logger.debug(
        `Ensemble initialized: ${String(shape.times.length)} times, ${String(shape.numObservables)} observables`,
      );
    }
    const restore: Lifecycle =
      current.phase === "active" && this.#hasCustomProcessors
        ? { ...current, accumulators: structuredClone(current.accumulators) }
        : current;
    this.#lifecycle = active;

    this.#seeds.push(trajectory.seed);
    this.#numTrajectories += 1;
    try {
      this.#pipeline.reduce(trajectory, {
        numTrajectories: this.#numTrajectories,
        shape,
        accumulators: active.accumulators,
      });
    } catch (err) {
      this.#lifecycle = restore;
      this.#seeds.pop();
      this.#numTrajectories -= 1;
      throw err;
    }

    return this.#evaluateStop(active);
  }

  #deriveShape(trajectory: TrajectorySample): TrajectoryShape {
    let stateDim: number | undefined;
    if (this.#features.storeStates) {
      const first = trajectory.states?.[0];
      if (!first) {
        throw new ShapeMismatchError(
          "States are tracked but the first trajectory carries none",
        );
      }
      stateDim = stateDimension(first);
    }

    let finalStateDim: number | undefined;
    if (this.#features.storeFinalState) {
      const finalState = finalStateOf(trajectory, this.#features.storeStates);
      if (!finalState) {
        throw new ShapeMismatchError(
          "The final state is tracked but the first trajectory carries none",
        );
      }
      finalStateDim = stateDimension(finalState);
    }

    return {
      times: [...trajectory.times],
      numObservables: this.observables.length,
      stateDim,
      finalStateDim,
    };
  }

  #checkShape(trajectory: TrajectorySample, shape: TrajectoryShape): void {
    if (!arraysEqual(trajectory.times, shape.times)) {
      throw new ShapeMismatchError(
        `trajectory ${JSON.stringify(trajectory.seed)} does not share the ensemble's times`,
      );
    }
    if (trajectory.expect.length !== shape.numObservables) {
      throw new ShapeMismatchError(
        `trajectory ${JSON.stringify(trajectory.seed)} has ${String(trajectory.expect.length)} expectation rows, expected ${String(shape.numObservables)}`,
      );
    }
    trajectory.expect.forEach((row, k) => {
      if (row.length !== shape.times.length) {
        throw new ShapeMismatchError(
          `observable ${this.observables[k] ?? String(k)} has ${String(row.length)} values for ${String(shape.times.length)} times`,
        );
      }
    });
  }

  #evaluateStop(active: ActiveState): number {
    const decision = this.#criterion.evaluate(
      this.#numTrajectories,
      active.accumulators.expect,
    );
    if (decision.estimatedNtraj !== undefined) {
      this.#estimatedNtraj = decision.estimatedNtraj;
    }
    if (
      decision.endCondition !== undefined &&
      decision.endCondition !== this.#endCondition
    ) {
      this.#endCondition = decision.endCondition;
      logger.debug(
        `End condition reached after ${String(this.#numTrajectories)} trajectories: ${decision.endCondition}`,
      );
    }
    return decision.remaining;
  }

  // ===========================================================================
  // Merge
  // ===========================================================================

  /**
   * Combine with an ensemble built from a disjoint set of trajectories.
   *
   * Sums are added, seeds concatenated (this ensemble's first). A concern
   * is kept only when both sides track it. Neither input is modified. The
   * result has no stopping policy and reports `merged` as end condition.
   *
   * @throws IncompatibleAggregationsError when observables, times, state
   *   dimensions, collapse channels or trace tracking differ
   */
  merge(other: Ensemble): Ensemble {
    this.#assertMergeable(other);

    const features = intersectFeatures(this.#features, other.#features);
    const merged = new Ensemble({
      observables: this.observables,
      solver: this.solver ?? other.solver,
      features,
      criterion: createStoppingCriterion(
        { kind: "unbounded" },
        this.observables.length,
      ),
      processors: [],
    });

    merged.#numTrajectories = this.#numTrajectories + other.#numTrajectories;
    merged.#seeds = [...this.#seeds, ...other.#seeds];
    merged.#endCondition = "merged";
    merged.#lifecycle = mergeLifecycles(this.#lifecycle, other.#lifecycle, features);

    logger.debug(
      `Merged ensembles: ${String(this.#numTrajectories)} + ${String(other.#numTrajectories)} trajectories`,
    );
    return merged;
  }

  #assertMergeable(other: Ensemble): void {
    if (!sameKeys(this.observables, other.observables)) {
      throw new IncompatibleAggregationsError(
        "Shared observables are required to merge ensembles",
      );
    }
    if (this.#features.numCollapse !== other.#features.numCollapse) {
      throw new IncompatibleAggregationsError(
        "Shared collapse channels are required to merge ensembles",
      );
    }
    if (this.#features.trace !== other.#features.trace) {
      throw new IncompatibleAggregationsError(
        "Both or neither ensemble must track the reweighting trace",
      );
    }

    const a = this.#lifecycle;
    const b = other.#lifecycle;
    if (a.phase !== "active" || b.phase !== "active") {
      return;
    }
    if (!arraysEqual(a.shape.times, b.shape.times)) {
      throw new IncompatibleAggregationsError(
        "Shared times are required to merge ensembles",
      );
    }
    if (
      a.accumulators.states &&
      b.accumulators.states &&
      a.shape.stateDim !== b.shape.stateDim
    ) {
      throw new IncompatibleAggregationsError(
        "Shared state dimensions are required to merge ensembles",
      );
    }
    if (
      a.accumulators.finalState &&
      b.accumulators.finalState &&
      a.shape.finalStateDim !== b.shape.finalStateDim
    ) {
      throw new IncompatibleAggregationsError(
        "Shared final state dimensions are required to merge ensembles",
      );
    }
  }

  // ===========================================================================
  // Projections
  // ===========================================================================

  get numTrajectories(): number {
    return this.#numTrajectories;
  }

  /** Shared time grid; empty before the first trajectory. */
  get times(): number[] {
    return this.#active ? [...this.#active.shape.times] : [];
  }

  get seeds(): Seed[] {
    return [...this.#seeds];
  }

  /** Retained trajectories; empty unless runs are kept. */
  get trajectories(): TrajectorySample[] {
    return structuredClone(this.#active?.accumulators.runs ?? []);
  }

  get endCondition(): EndCondition {
    return this.#endCondition;
  }

  get stats(): EnsembleStats {
    const stats: EnsembleStats = {
      end_condition: this.#endCondition,
      num_trajectories: this.#numTrajectories,
    };
    if (this.#estimatedNtraj !== undefined) {
      stats.estimated_ntraj = this.#estimatedNtraj;
    }
    if (this.#features.numCollapse !== undefined) {
      stats.num_collapse = this.#features.numCollapse;
    }
    return stats;
  }

  /** Processor names in execution order. */
  get processors(): string[] {
    return this.#pipeline.names;
  }

  get keepsRuns(): boolean {
    return this.#features.keepRuns;
  }

  get #active(): ActiveState | undefined {
    return this.#lifecycle.phase === "active" ? this.#lifecycle : undefined;
  }

  /**
   * Mean of each observable over trajectories, per time.
   */
  get averageExpect(): number[][] {
    const active = this.#active;
    if (!active) {
      return this.observables.map(() => []);
    }
    return active.accumulators.expect.map((m) =>
      meanOf(m, this.#numTrajectories),
    );
  }

  /**
   * Population standard deviation of each observable, per time.
   */
  get stdExpect(): number[][] {
    const active = this.#active;
    if (!active) {
      return this.observables.map(() => []);
    }
    return active.accumulators.expect.map((m) =>
      stdOf(m, this.#numTrajectories),
    );
  }

  /**
   * Values of each observable for each run, as `[observable][run][time]`.
   * Undefined unless runs are kept.
   */
  get runsExpect(): number[][][] | undefined {
    if (!this.#features.keepRuns) {
      return undefined;
    }
    const runs = this.#active?.accumulators.runs ?? [];
    return this.observables.map((_, k) =>
      runs.map((run) => [...(run.expect[k] ?? [])]),
    );
  }

  /** Runs if kept, averages otherwise. */
  get expect(): number[][] | number[][][] {
    return this.runsExpect ?? this.averageExpect;
  }

  get averageEData(): Record<string, number[]> {
    return this.#keyed(this.averageExpect);
  }

  get stdEData(): Record<string, number[]> {
    return this.#keyed(this.stdExpect);
  }

  get runsEData(): Record<string, number[][]> | undefined {
    const runs = this.runsExpect;
    return runs ? this.#keyed(runs) : undefined;
  }

  get eData(): Record<string, number[]> | Record<string, number[][]> {
    return this.runsEData ?? this.averageEData;
  }

  #keyed<T>(rows: T[]): Record<string, T> {
    return Object.fromEntries(
      this.observables.flatMap((key, k) => {
        const row = rows[k];
        return row === undefined ? [] : [[key, row] as const];
      }),
    );
  }

  /**
   * Average state at each time, as density matrices.
   */
  get averageStates(): OperState[] | undefined {
    const sums = this.#active?.accumulators.states;
    return sums?.map((sum) => divideOperator(sum, this.#numTrajectories));
  }

  /**
   * Average final state, as a density matrix.
   */
  get averageFinalState(): OperState | undefined {
    const sum = this.#active?.accumulators.finalState;
    return sum ? divideOperator(sum, this.#numTrajectories) : undefined;
  }

  /** States of every kept run, as `[run][time]`. */
  get runsStates(): QuantumState[][] | undefined {
    const runs = this.#active?.accumulators.runs;
    if (!runs?.[0]?.states) {
      return undefined;
    }
    return runs.map((run) => structuredClone(run.states ?? []));
  }

  /** Final state of every kept run. */
  get runsFinalStates(): QuantumState[] | undefined {
    const runs = this.#active?.accumulators.runs ?? [];
    const finalStates = runs.flatMap((run) => {
      const finalState = finalStateOf(run, this.#features.storeStates);
      return finalState ? [structuredClone(finalState)] : [];
    });
    return finalStates.length > 0 ? finalStates : undefined;
  }

  /** Runs states if kept, averages otherwise. */
  get states(): QuantumState[][] | OperState[] | undefined {
    return this.runsStates ?? this.averageStates;
  }

  /** Runs final states if kept, average otherwise. */
  get finalState(): QuantumState[] | OperState | undefined {
    return this.runsFinalStates ?? this.averageFinalState;
  }

  /**
   * Average of the averaged states over the last `windowSize` times.
   * Should converge to the steady state in the right circumstances.
   *
   * @param windowSize - Number of final times to average; 0 (the default)
   *   or more than the number of times averages them all
   */
  steadyState(windowSize = 0): OperState | undefined {
    const states = this.averageStates;
    if (!states || states.length === 0) {
      return undefined;
    }
    const requested = Math.trunc(windowSize);
    const window =
      requested <= 0 || requested > states.length ? states.length : requested;
    return divideOperator(sumOperators(states.slice(-window)), window);
  }

  // -- collapse tracking ------------------------------------------------------

  get numCollapse(): number | undefined {
    return this.#features.numCollapse;
  }

  /** Collapse events of every run; undefined unless collapses are tracked. */
  get collapse(): CollapseEvent[][] | undefined {
    if (this.#features.numCollapse === undefined) {
      return undefined;
    }
    return structuredClone(this.#active?.accumulators.collapse ?? []);
  }

  /** Collapse times of every run. */
  get colTimes(): number[][] | undefined {
    const records = this.collapse;
    return records ? collapseTimes(records) : undefined;
  }

  /** Collapse channels of every run. */
  get colWhich(): number[][] | undefined {
    const records = this.collapse;
    return records ? collapseChannels(records) : undefined;
  }

  /**
   * Ensemble-averaged measurement record, `[channel][time bin]`.
   */
  get photocurrent(): number[][] | undefined {
    const numCollapse = this.#features.numCollapse;
    if (numCollapse === undefined) {
      return undefined;
    }
    const active = this.#active;
    if (!active) {
      return Array.from({ length: numCollapse }, () => []);
    }
    return averagePhotocurrent(
      active.accumulators.collapse ?? [],
      active.shape.times,
      numCollapse,
      this.#numTrajectories,
    );
  }

  /**
   * Measurement record of each run, `[run][channel][time bin]`.
   */
  get runsPhotocurrent(): number[][][] | undefined {
    const numCollapse = this.#features.numCollapse;
    if (numCollapse === undefined) {
      return undefined;
    }
    const active = this.#active;
    if (!active) {
      return [];
    }
    return runsPhotocurrent(
      active.accumulators.collapse ?? [],
      active.shape.times,
      numCollapse,
    );
  }

  // -- trace tracking ---------------------------------------------------------

  get tracksTrace(): boolean {
    return this.#features.trace;
  }

  /** Average reweighting trace per time; undefined unless tracked. */
  get averageTrace(): number[] | undefined {
    if (!this.#features.trace) {
      return undefined;
    }
    const acc = this.#active?.accumulators.trace;
    return acc ? meanOf(acc.moments, this.#numTrajectories) : [];
  }

  /** Standard deviation of the reweighting trace per time. */
  get stdTrace(): number[] | undefined {
    if (!this.#features.trace) {
      return undefined;
    }
    const acc = this.#active?.accumulators.trace;
    return acc ? stdOf(acc.moments, this.#numTrajectories) : [];
  }

  /** Reweighting trace of every kept run. */
  get runsTrace(): number[][] | undefined {
    if (!this.#features.trace || !this.#features.keepRuns) {
      return undefined;
    }
    return (this.#active?.accumulators.trace?.runs ?? []).map((run) => [...run]);
  }

  /** Runs traces if kept, average otherwise. */
  get trace(): number[][] | number[] | undefined {
    return this.runsTrace ?? this.averageTrace;
  }

  toString(): string {
    return describeEnsemble(this);
  }
}

function mergeLifecycles(
  a: Lifecycle,
  b: Lifecycle,
  features: EnsembleFeatures,
): Lifecycle {
  if (a.phase === "active" && b.phase === "active") {
    return {
      phase: "active",
      shape: restrictShape(a.shape, features),
      accumulators: restrictAccumulators(
        mergeAccumulators(a.accumulators, b.accumulators),
        features,
      ),
    };
  }
  const only = a.phase === "active" ? a : b.phase === "active" ? b : undefined;
  if (!only) {
    return { phase: "uninitialized" };
  }
  return {
    phase: "active",
    shape: restrictShape(only.shape, features),
    accumulators: restrictAccumulators(only.accumulators, features),
  };
}

function restrictShape(
  shape: TrajectoryShape,
  features: EnsembleFeatures,
): TrajectoryShape {
  return {
    times: [...shape.times],
    numObservables: shape.numObservables,
    stateDim: features.storeStates ? shape.stateDim : undefined,
    finalStateDim: features.storeFinalState ? shape.finalStateDim : undefined,
  };
}
