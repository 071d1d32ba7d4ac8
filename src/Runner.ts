/**
 * Sequential scenario runner.
 *
 * The per-scenario protocol is `applyVariables(row) → run() → collect(index)`,
 * never reordered: collection reads engine buffers that the next run
 * overwrites. Worker threads run the same {@link runScenario} against their
 * own session.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { ParameterCompositor } from "./Compositor.js"
import { Engine, type EngineSession, subsystemOf } from "./Engine.js"
import {
  type ConfigurationError,
  EngineRunFailure,
  type IndexOutOfRangeError,
  type ScenarioLookupError,
  type StageNotReadyError,
} from "./Errors.js"
import { ResultManager, type ResultSet } from "./Results.js"
import { DEFAULT_VARIABLES } from "./ResultVariables.js"
import type { ScenarioTable } from "./ScenarioTable.js"
import type { RunFailurePolicy, Subsystem } from "./Types.js"

/**
 * @category Runner
 * @since 0.1.0
 */
export interface RunOptions {
  /** Result variables to collect. */
  readonly variables?: ReadonlyArray<string>
  /** Subsystem whose run trigger executes a scenario. */
  readonly stage?: Subsystem
  /**
   * What to do with the results of a scenario whose engine run reports
   * failure. Defaults to `"invalidate"`: its slice is filled with `NaN`.
   * Pass `"collect"` to extract whatever the engine produced regardless of
   * the failure. Either way the scenario is listed in `failedScenarios`.
   * `ScenarioInterface` takes its default from
   * `ECOSIM_BATCH_RUN_FAILURE_POLICY`.
   */
  readonly failurePolicy?: RunFailurePolicy
  readonly onProgress?: (done: number, total: number) => void
}

/**
 * Errors a scenario can raise. Engine run failures are not among them: they
 * are logged and recorded against the scenario.
 *
 * @category Runner
 * @since 0.1.0
 */
export type ScenarioError =
  | ConfigurationError
  | StageNotReadyError
  | ScenarioLookupError
  | IndexOutOfRangeError

/**
 * Map the table's parameter columns onto the compositor, write constants,
 * and warn about parameters left at engine defaults.
 *
 * @category Runner
 * @since 0.1.0
 */
export const prepareBatch = (
  compositor: ParameterCompositor,
  session: EngineSession,
  table: ScenarioTable,
): Effect.Effect<void, ConfigurationError> =>
  Effect.gen(function* () {
    const names = table.parameterNames
    yield* compositor.validateNames(names)
    yield* compositor.clearVariables()
    yield* compositor.setVariable(
      names,
      names.map((_, i) => i + 1),
    )
    yield* compositor.applyConstants(session)
    const unset = compositor.unsetParameterNames()
    if (unset.length > 0) {
      yield* Effect.logWarning(
        `${unset.length} parameters are neither constant nor variable and keep their engine defaults`,
      ).pipe(Effect.annotateLogs("parameters", unset.join(", ")))
    }
  })

/**
 * Run one scenario row and collect its results into slice `index`. Returns
 * whether the engine reported success.
 *
 * @category Runner
 * @since 0.1.0
 */
export const runScenario = (
  compositor: ParameterCompositor,
  results: ResultManager,
  table: ScenarioTable,
  index: number,
  options: Pick<RunOptions, "stage" | "failurePolicy"> = {},
): Effect.Effect<boolean, ScenarioError, Engine> =>
  Effect.gen(function* () {
    const session = yield* Engine
    const stage = options.stage ?? "ecotracer"
    const row = yield* table.row(index)
    yield* compositor.applyVariables(session, row)
    const succeeded = subsystemOf(session, stage).run()
    if (succeeded) {
      yield* results.collect(index)
      return true
    }
    const failure = new EngineRunFailure({ subsystem: stage, scenarioIndex: index, scenarioId: row[0] })
    yield* Effect.logWarning(failure.message).pipe(
      Effect.annotateLogs({ scenario: row[0], subsystem: stage }),
    )
    if ((options.failurePolicy ?? "invalidate") === "invalidate") {
      yield* results.invalidate(index)
    } else {
      results.markFailed(index)
      yield* results.collect(index)
    }
    return false
  })

/**
 * Run every scenario of a table in this process, in table order.
 *
 * @category Runner
 * @since 0.1.0
 */
export const runScenarios = (
  compositor: ParameterCompositor,
  table: ScenarioTable,
  options: RunOptions = {},
): Effect.Effect<ResultSet, ScenarioError, Engine> =>
  Effect.gen(function* () {
    const session = yield* Engine
    yield* prepareBatch(compositor, session, table)
    const results = yield* ResultManager.make(session, options.variables ?? DEFAULT_VARIABLES, table)
    const total = table.size
    let failures = 0
    for (let index = 0; index < total; index++) {
      const succeeded = yield* runScenario(compositor, results, table, index, options)
      if (!succeeded) failures++
      options.onProgress?.(index + 1, total)
    }
    yield* Effect.logInfo(`Ran ${total} scenarios`).pipe(Effect.annotateLogs({ failures }))
    return yield* results.toResultSet()
  })
