/**
 * Engine boundary.
 *
 * The simulation engine is an opaque, synchronous and non-reentrant
 * collaborator. A session is created once per process (or per worker) from an
 * {@link EngineDriver} and threaded through every call as the {@link Engine}
 * service; nothing in this library keeps a process-wide handle.
 *
 * Result arrays returned by {@link EngineSession.resultArray} alias the
 * engine's own storage and are only valid until the next run of their stage.
 *
 * @since 0.1.0
 */

import { Context, Effect } from "effect"
import { EngineOperationError, IndexOutOfRangeError, ScenarioLookupError } from "./Errors.js"
import type { EngineStateSnapshot, Subsystem } from "./Types.js"

/**
 * Engine-owned stores that result arrays live in.
 *
 * @category Engine
 * @since 0.1.0
 */
export type ResultSource = "ecopath" | "ecosim" | "ecotracer"

/**
 * Row-major dense array as exposed by the engine.
 *
 * @category Engine
 * @since 0.1.0
 */
export interface DenseArray {
  readonly shape: ReadonlyArray<number>
  readonly data: ArrayLike<number>
}

/**
 * Settable state and run trigger of one engine subsystem.
 *
 * Group setters are batched: `values[i]` is written to group `groups[i]`
 * (1-based). Pair setters take parallel prey / predator index arrays.
 *
 * @category Engine
 * @since 0.1.0
 */
export interface SubsystemSession {
  readonly name: Subsystem
  readonly setGroupValues: (
    field: string,
    values: ReadonlyArray<number>,
    groups: ReadonlyArray<number>,
  ) => void
  readonly getGroupValues: (field: string) => ReadonlyArray<number>
  readonly setScalar: (field: string, value: number) => void
  readonly getScalar: (field: string) => number
  readonly setPairValues: (
    field: string,
    values: ReadonlyArray<number>,
    prey: ReadonlyArray<number>,
    predators: ReadonlyArray<number>,
  ) => void
  readonly getPairValue: (field: string, prey: number, predator: number) => number
  readonly scenarioNames: () => ReadonlyArray<string>
  readonly newScenario: (name: string, description: string, author: string, contact: string) => boolean
  readonly loadScenario: (index: number) => boolean
  readonly removeScenario: (index: number) => boolean
  readonly saveScenario: () => boolean
  readonly run: () => boolean
}

/**
 * A live engine instance bound to one model file.
 *
 * @category Engine
 * @since 0.1.0
 */
export interface EngineSession {
  readonly loadModel: (path: string) => boolean
  readonly closeModel: () => boolean
  readonly state: () => EngineStateSnapshot
  readonly isBalanced: () => boolean
  readonly groupNames: () => ReadonlyArray<string>
  readonly fleetNames: () => ReadonlyArray<string>
  readonly consumerCount: () => number
  readonly producerCount: () => number
  readonly country: () => string
  readonly firstYear: () => number
  readonly simulationYears: () => number
  readonly setSimulationYears: (years: number) => boolean
  readonly addForcingShape: (name: string, values: ReadonlyArray<number>) => number
  readonly ecosim: SubsystemSession
  readonly ecotracer: SubsystemSession
  readonly resultArray: (source: ResultSource, name: string) => DenseArray | undefined
}

/**
 * Factory for sessions. Worker threads import a driver by module specifier,
 * taking the module's default export.
 *
 * @category Engine
 * @since 0.1.0
 */
export interface EngineDriver {
  readonly name: string
  readonly create: () => EngineSession
}

/**
 * Narrow an unknown module export to an {@link EngineDriver}.
 *
 * @category Guards
 * @since 0.1.0
 */
export const isEngineDriver = (value: unknown): value is EngineDriver =>
  typeof value === "object" &&
  value !== null &&
  "create" in value &&
  typeof value.create === "function" &&
  "name" in value &&
  typeof value.name === "string"

/**
 * Service tag for the session used by the current process.
 *
 * @category Services
 * @since 0.1.0
 */
export class Engine extends Context.Tag("ecosim-batch/Engine")<Engine, EngineSession>() {}

/**
 * Select the accessor for a subsystem.
 *
 * @since 0.1.0
 */
export const subsystemOf = (session: EngineSession, subsystem: Subsystem): SubsystemSession =>
  subsystem === "ecosim" ? session.ecosim : session.ecotracer

/**
 * Create a session and load a model file into it.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const openSession = (
  driver: EngineDriver,
  modelPath: string,
): Effect.Effect<EngineSession, EngineOperationError> =>
  Effect.gen(function* () {
    const session = driver.create()
    if (!session.loadModel(modelPath)) {
      return yield* Effect.fail(
        new EngineOperationError({
          operation: `Loading model ${modelPath}`,
          reason: `the ${driver.name} engine rejected the model file`,
        }),
      )
    }
    return session
  })

/**
 * Load a scenario by its 1-based position.
 *
 * @since 0.1.0
 */
export const loadScenarioByIndex = (
  subsystem: SubsystemSession,
  index: number,
): Effect.Effect<void, IndexOutOfRangeError | EngineOperationError> =>
  Effect.gen(function* () {
    const count = subsystem.scenarioNames().length
    if (!Number.isInteger(index) || index < 1 || index > count) {
      return yield* Effect.fail(new IndexOutOfRangeError({ kind: "scenario", index, size: count }))
    }
    if (!subsystem.loadScenario(index)) {
      return yield* Effect.fail(
        new EngineOperationError({
          operation: `Loading ${subsystem.name} scenario ${index}`,
          reason: "the engine refused to activate the scenario",
        }),
      )
    }
  })

/**
 * Load a scenario by name.
 *
 * @since 0.1.0
 */
export const loadScenarioByName = (
  subsystem: SubsystemSession,
  name: string,
): Effect.Effect<void, ScenarioLookupError | IndexOutOfRangeError | EngineOperationError> =>
  Effect.gen(function* () {
    const position = subsystem.scenarioNames().indexOf(name)
    if (position < 0) {
      return yield* Effect.fail(new ScenarioLookupError({ kind: "scenario", name }))
    }
    yield* loadScenarioByIndex(subsystem, position + 1)
  })

/**
 * Create a scenario and make it the active one.
 *
 * @since 0.1.0
 */
export const createScenario = (
  subsystem: SubsystemSession,
  name: string,
  description: string,
): Effect.Effect<void, EngineOperationError> =>
  subsystem.newScenario(name, description, "", "")
    ? Effect.void
    : Effect.fail(
        new EngineOperationError({
          operation: `Creating ${subsystem.name} scenario "${name}"`,
          reason: "the engine refused to create the scenario",
        }),
      )

/**
 * Remove a scenario by name.
 *
 * @since 0.1.0
 */
export const removeScenarioByName = (
  subsystem: SubsystemSession,
  name: string,
): Effect.Effect<void, ScenarioLookupError | EngineOperationError> =>
  Effect.gen(function* () {
    const position = subsystem.scenarioNames().indexOf(name)
    if (position < 0) {
      return yield* Effect.fail(new ScenarioLookupError({ kind: "scenario", name }))
    }
    if (!subsystem.removeScenario(position + 1)) {
      return yield* Effect.fail(
        new EngineOperationError({
          operation: `Removing ${subsystem.name} scenario "${name}"`,
          reason: "the engine refused to remove the scenario",
        }),
      )
    }
  })
