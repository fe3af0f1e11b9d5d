/**
 * Processor pipeline for trajectory ingestion.
 *
 * An ordered list of reduction processors, each owning one concern.
 * Processors are registered while an ensemble is being built; once the
 * pipeline is sealed the list is fixed for the rest of its life.
 */

import { ConfigurationError } from "./errors.js";

import type {
  ReduceContext,
  TrajectoryProcessor,
  TrajectorySample,
  TrajectoryShape,
} from "../types/index.js";

export class ProcessorPipeline<C extends ReduceContext = ReduceContext> {
  readonly #processors: TrajectoryProcessor<C>[] = [];
  #sealed = false;

  /**
   * Append a processor. Runs after every processor registered before it.
   *
   * @throws ConfigurationError if the pipeline is already sealed
   */
  register(processor: TrajectoryProcessor<C>): this {
    if (this.#sealed) {
      throw new ConfigurationError(
        `Cannot register processor "${processor.name}" after ingestion setup`,
      );
    }
    this.#processors.push(processor);
    return this;
  }

  /**
   * Fix the processor list. Further registrations fail.
   */
  seal(): void {
    this.#sealed = true;
  }

  /** Processor names in execution order. */
  get names(): string[] {
    return this.#processors.map((p) => p.name);
  }

  /**
   * Run every processor's check. Throws on the first failure, before any
   * processor has reduced the trajectory.
   */
  check(trajectory: TrajectorySample, shape: TrajectoryShape): void {
    for (const processor of this.#processors) {
      processor.check?.(trajectory, shape);
    }
  }

  /**
   * Run every reduction in registration order.
   * Callers run {@link check} first.
   */
  reduce(trajectory: TrajectorySample, context: C): void {
    for (const processor of this.#processors) {
      processor.reduce(trajectory, context);
    }
  }
}
