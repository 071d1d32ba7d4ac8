/**
 * Error hierarchy for scenario batch execution.
 *
 * Every failure mode is a tagged error so callers can pattern match with
 * `Effect.catchTag`. Configuration and lookup errors are raised before any
 * engine call; engine run failures are reported per scenario and never stop a
 * batch.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { EngineStateSnapshot, Stage, Subsystem } from "./Types.js"

/**
 * Raised for malformed input: unknown parameter names, a scenario table without
 * its leading `scenario` column, mismatched lengths or matrix shapes.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * yield* Effect.fail(new ConfigurationError({ reason: "Unrecognised parameters", names: ["init_c_9_Squid"] }))
 * ```
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly reason: string
  readonly names?: ReadonlyArray<string>
}> {
  override get message(): string {
    return this.names && this.names.length > 0
      ? `${this.reason}: ${this.names.join(", ")}`
      : this.reason
  }
}

/**
 * Raised when results are requested before Ecopath has run.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EcopathNotRunError extends Data.TaggedError("EcopathNotRunError")<{
  readonly operation: string
  readonly state: EngineStateSnapshot
}> {
  readonly stage: Stage = "ecopath"

  override get message(): string {
    return `Ecopath must be run before ${this.operation}.\n\n${this.state.summary("ecopath")}`
  }
}

/**
 * Raised when results are requested before Ecosim has run.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EcosimNotRunError extends Data.TaggedError("EcosimNotRunError")<{
  readonly operation: string
  readonly state: EngineStateSnapshot
}> {
  readonly stage: Stage = "ecosim"

  override get message(): string {
    return `Ecosim must be run before ${this.operation}.\n\n${this.state.summary("ecosim")}`
  }
}

/**
 * Raised when results are requested before Ecotracer has run.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EcotracerNotRunError extends Data.TaggedError("EcotracerNotRunError")<{
  readonly operation: string
  readonly state: EngineStateSnapshot
}> {
  readonly stage: Stage = "ecotracer"

  override get message(): string {
    return `Ecotracer must be run before ${this.operation}.\n\n${this.state.summary("ecotracer")}`
  }
}

/**
 * Union of the stage precondition errors.
 *
 * @category Errors
 * @since 0.1.0
 */
export type StageNotReadyError = EcopathNotRunError | EcosimNotRunError | EcotracerNotRunError

/**
 * Build the stage precondition error for a stage.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const stageNotReady = (
  stage: Stage,
  operation: string,
  state: EngineStateSnapshot,
): StageNotReadyError => {
  switch (stage) {
    case "ecopath":
      return new EcopathNotRunError({ operation, state })
    case "ecosim":
      return new EcosimNotRunError({ operation, state })
    case "ecotracer":
      return new EcotracerNotRunError({ operation, state })
  }
}

/**
 * A run trigger returned `false`. Logged and recorded against the scenario;
 * the batch continues.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EngineRunFailure extends Data.TaggedError("EngineRunFailure")<{
  readonly subsystem: Subsystem
  readonly scenarioIndex: number
  readonly scenarioId: number
}> {
  override get message(): string {
    return `${this.subsystem} run failed for scenario ${this.scenarioId} (row ${this.scenarioIndex})`
  }
}

/**
 * An engine call other than a run (model load, scenario creation, duration
 * change) reported failure.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EngineOperationError extends Data.TaggedError("EngineOperationError")<{
  readonly operation: string
  readonly reason: string
}> {
  override get message(): string {
    return `${this.operation} failed: ${this.reason}`
  }
}

/**
 * A named entity could not be found.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ScenarioLookupError extends Data.TaggedError("ScenarioLookupError")<{
  readonly kind: "scenario" | "parameter" | "group" | "variable" | "model" | "result array"
  readonly name: string
}> {
  override get message(): string {
    return `Unable to find ${this.kind} named "${this.name}"`
  }
}

/**
 * A 1-based index fell outside `[1, size]`, or a 0-based store index fell
 * outside `[0, size)`.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IndexOutOfRangeError extends Data.TaggedError("IndexOutOfRangeError")<{
  readonly kind: "group" | "scenario" | "scenario row"
  readonly index: number
  readonly size: number
}> {
  override get message(): string {
    return `Given ${this.kind} index ${this.index} but there are ${this.size}`
  }
}

/**
 * A pooled worker crashed or reported a failure.
 *
 * @category Errors
 * @since 0.1.0
 */
export class WorkerError extends Data.TaggedError("WorkerError")<{
  readonly workerId: number
  readonly reason: string
  readonly scenarioIndex?: number
}> {
  override get message(): string {
    const scenario = this.scenarioIndex === undefined ? "" : ` while running row ${this.scenarioIndex}`
    return `Worker ${this.workerId} failed${scenario}: ${this.reason}`
  }
}

/**
 * A temporary model file or directory could not be removed.
 *
 * @category Errors
 * @since 0.1.0
 */
export class CleanupError extends Data.TaggedError("CleanupError")<{
  readonly path: string
  readonly reason: string
}> {
  override get message(): string {
    return `Unable to remove ${this.path}: ${this.reason}`
  }
}
