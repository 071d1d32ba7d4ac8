/**
 * Type Foundations
 *
 * Literal vocabularies and engine state shared by the parameter,
 * extraction and orchestration layers.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Engine subsystems that own settable parameters and a run trigger.
 *
 * @since 0.1.0
 * @category Literals
 */
export const Subsystem = Schema.Literal("ecosim", "ecotracer")

/**
 * @since 0.1.0
 * @category Literals
 */
export type Subsystem = typeof Subsystem.Type

/**
 * Simulation stages, in the order they must complete.
 *
 * @since 0.1.0
 * @category Literals
 */
export const Stage = Schema.Literal("ecopath", "ecosim", "ecotracer")

/**
 * @since 0.1.0
 * @category Literals
 */
export type Stage = typeof Stage.Type

/**
 * What to do with a scenario's result slice when the engine reports a failed run.
 *
 * - `invalidate`: fill the slice with `NaN` and skip extraction.
 * - `collect`: extract whatever the engine buffers hold.
 *
 * @since 0.1.0
 * @category Literals
 */
export const RunFailurePolicy = Schema.Literal("invalidate", "collect")

/**
 * @since 0.1.0
 * @category Literals
 */
export type RunFailurePolicy = typeof RunFailurePolicy.Type

const formatFlag = (name: string, value: boolean): string => `${name}: ${value}`

/**
 * Point-in-time copy of the engine's stage flags. Attached to every
 * stage-precondition error so callers can see what had and had not run.
 *
 * @since 0.1.0
 * @category Engine
 */
export class EngineStateSnapshot extends Schema.Class<EngineStateSnapshot>("EngineStateSnapshot")({
  ecopathLoaded: Schema.Boolean,
  ecopathRan: Schema.Boolean,
  ecosimLoaded: Schema.Boolean,
  ecosimRan: Schema.Boolean,
  ecotracerLoaded: Schema.Boolean,
  ecotracerRan: Schema.Boolean,
  busy: Schema.Boolean,
}) {
  /**
   * Whether the given stage has completed.
   */
  hasRun(stage: Stage): boolean {
    switch (stage) {
      case "ecopath":
        return this.ecopathRan
      case "ecosim":
        return this.ecosimRan
      case "ecotracer":
        return this.ecotracerRan
    }
  }

  /**
   * Multi-line summary of the flags relevant to a stage.
   */
  summary(stage: Stage): string {
    switch (stage) {
      case "ecopath":
        return [
          "---- Ecopath State ----",
          formatFlag("Loaded", this.ecopathLoaded),
          formatFlag("Ran", this.ecopathRan),
        ].join("\n")
      case "ecosim":
        return [
          "---- Ecosim State ----",
          formatFlag("Loaded", this.ecosimLoaded),
          formatFlag("Ran", this.ecosimRan),
          formatFlag("Busy", this.busy),
        ].join("\n")
      case "ecotracer":
        return [
          "---- Ecotracer State ----",
          formatFlag("Loaded", this.ecotracerLoaded),
          formatFlag("Ran for Ecosim", this.ecotracerRan),
        ].join("\n")
    }
  }
}
