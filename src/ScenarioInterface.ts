/**
 * Scenario interface.
 *
 * The entry point for batch experiments on one model: it owns a private copy
 * of the model file, the engine session opened on it and the parameter
 * compositor, and runs scenario tables sequentially or across a worker pool.
 *
 * The interface is scoped. Closing its scope closes the session and removes
 * the private copy, unless the caller asked for the copy at a debug path.
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const scenarios = yield* ScenarioInterface.make({ modelPath: "bay.model", driver })
 *   yield* scenarios.setSimulationDuration(5)
 *   yield* scenarios.setConstantParameters(["env_decay_r"], [0.02])
 *   const table = yield* scenarios.emptyScenarioTable(["env_init_c"], ["init_c"], 10)
 *   const results = yield* scenarios.runScenarios(table)
 *   yield* Effect.log(results.summary())
 * }).pipe(Effect.scoped)
 * ```
 *
 * @since 0.1.0
 */

import type { ConfigError, Scope } from "effect"
import { Duration, Effect, Logger, Ref } from "effect"
import { type ParameterNameFilter, ParameterCompositor } from "./Compositor.js"
import { ScenarioConfig, type ScenarioSettings } from "./Config.js"
import {
  createScenario,
  Engine,
  type EngineDriver,
  type EngineSession,
  loadScenarioByName,
  openSession,
  type SubsystemSession,
} from "./Engine.js"
import {
  ConfigurationError,
  EngineOperationError,
  type IndexOutOfRangeError,
  ScenarioLookupError,
  type WorkerError,
} from "./Errors.js"
import { copyModel, copyPath, exists, makeTempDirectory, removeWithRetry } from "./internal/files.js"
import {
  definitions,
  EcosimDefinition,
  formatParameterNames,
  type ManagerDefinition,
} from "./Parameters.js"
import { ResultManager, type ResultSet } from "./Results.js"
import { ENVIRONMENT_GROUP, DEFAULT_VARIABLES } from "./ResultVariables.js"
import { prepareBatch, type RunOptions, runScenarios, type ScenarioError } from "./Runner.js"
import { type LongScenarioRow, ScenarioTable } from "./ScenarioTable.js"
import type { Subsystem } from "./Types.js"
import { isRunningFromSource, runPool, threadSpawner, type WorkerSpawner } from "./WorkerPool.js"

/**
 * Name of the working Ecosim scenario.
 *
 * @category Constants
 * @since 0.1.0
 */
export const ECOSIM_SCENARIO = "tmp_ecosim_scen"

/**
 * Name of the working Ecotracer scenario.
 *
 * @category Constants
 * @since 0.1.0
 */
export const ECOTRACER_SCENARIO = "tmp_ecotracer_scen"

const SCENARIO_DESCRIPTION = "Working scenario for batch runs"

/**
 * @category Scenario Interface
 * @since 0.1.0
 */
export interface ScenarioInterfaceOptions {
  readonly modelPath: string
  readonly driver: EngineDriver
  /**
   * Module specifier workers import the driver from. Required for thread
   * workers.
   */
  readonly driverModule?: string
  /** Copy the model here instead of a temporary directory, and keep it. */
  readonly debugModelPath?: string
  /** Worker spawner for parallel runs. Defaults to worker threads. */
  readonly spawner?: WorkerSpawner
  /** Parameter managers to build. Defaults to Ecotracer then Ecosim. */
  readonly managers?: ReadonlyArray<ManagerDefinition>
  /** Overrides settings read from the environment. */
  readonly settings?: Partial<ScenarioSettings>
}

/**
 * @category Scenario Interface
 * @since 0.1.0
 */
export interface ParallelRunOptions extends RunOptions {
  /** Defaults to `ECOSIM_BATCH_WORKERS`. */
  readonly workers?: number
}

/**
 * Ecosim vulnerabilities laid out like the engine's editor: one row per
 * prey group, one column per predator (consumer).
 *
 * @category Scenario Interface
 * @since 0.1.0
 */
export interface VulnerabilityMatrix {
  readonly groups: ReadonlyArray<string>
  readonly matrix: ReadonlyArray<ReadonlyArray<number>>
}

/**
 * @category Scenario Interface
 * @since 0.1.0
 */
export type ParallelRunError = ScenarioError | EngineOperationError | WorkerError

const closeSession = (session: EngineSession) =>
  Effect.suspend(() =>
    session.closeModel() ? Effect.void : Effect.logWarning("Engine refused to close the model"),
  )

const rangeOf = (from: number, count: number): Array<number> =>
  Array.from({ length: count }, (_, i) => from + i)

/**
 * @category Scenario Interface
 * @since 0.1.0
 */
export class ScenarioInterface {
  private constructor(
    readonly session: EngineSession,
    readonly modelCopy: string,
    readonly settings: ScenarioSettings,
    private readonly options: ScenarioInterfaceOptions,
    private readonly compositor: Ref.Ref<ParameterCompositor>,
  ) {}

  /**
   * Copy the model, open a session on the copy and prepare the working
   * scenarios.
   */
  static make(
    options: ScenarioInterfaceOptions,
  ): Effect.Effect<
    ScenarioInterface,
    ScenarioLookupError | IndexOutOfRangeError | EngineOperationError | ConfigError.ConfigError,
    Scope.Scope
  > {
    return Effect.gen(function* () {
      const settings: ScenarioSettings = { ...(yield* ScenarioConfig), ...options.settings }
      if (!(yield* exists(options.modelPath))) {
        return yield* Effect.fail(new ScenarioLookupError({ kind: "model", name: options.modelPath }))
      }
      let modelCopy: string
      if (options.debugModelPath !== undefined) {
        modelCopy = yield* copyModel(options.modelPath, options.debugModelPath)
        yield* Effect.logInfo(`Model copied to ${modelCopy}; the copy is kept after the interface closes`)
      } else {
        const directory = yield* Effect.acquireRelease(makeTempDirectory("ecosim-batch-"), (path) =>
          removeWithRetry(path, settings.cleanupRetries, settings.cleanupDelay),
        )
        modelCopy = yield* copyModel(options.modelPath, copyPath(directory, options.modelPath))
      }
      const session = yield* Effect.acquireRelease(openSession(options.driver, modelCopy), closeSession)
      if (session.ecosim.scenarioNames().includes(ECOSIM_SCENARIO)) {
        yield* loadScenarioByName(session.ecosim, ECOSIM_SCENARIO)
      } else {
        yield* createScenario(session.ecosim, ECOSIM_SCENARIO, SCENARIO_DESCRIPTION)
      }
      yield* createScenario(session.ecotracer, ECOTRACER_SCENARIO, SCENARIO_DESCRIPTION)
      if (!session.isBalanced()) {
        yield* Effect.logWarning("The baseline model is not balanced; scenario results may be meaningless")
      }
      const compositor = yield* Ref.make(ParameterCompositor.fromSession(session, options.managers))
      return new ScenarioInterface(session, modelCopy, settings, options, compositor)
    })
  }

  private logged<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
    return Logger.withMinimumLogLevel(effect, this.settings.logLevel)
  }

  /**
   * Current compositor. Replaced wholesale by {@link resetParameters}.
   */
  get parameters(): Effect.Effect<ParameterCompositor> {
    return Ref.get(this.compositor)
  }

  /**
   * Forget every constant and variable assignment.
   */
  resetParameters(): Effect.Effect<void> {
    return Ref.set(this.compositor, ParameterCompositor.fromSession(this.session, this.options.managers))
  }

  availableParameterNames(
    filter: ParameterNameFilter = {},
  ): Effect.Effect<Array<string>, ConfigurationError | ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.flatMap(this.parameters, (compositor) => compositor.availableParameterNames(filter))
  }

  /**
   * Catalog names for editor column titles paired with group names.
   */
  formatParameterNames(
    labels: ReadonlyArray<string>,
    groups: ReadonlyArray<string>,
    subsystem: Subsystem = "ecotracer",
  ): Effect.Effect<Array<string>, ConfigurationError | ScenarioLookupError> {
    return Effect.flatMap(this.parameters, (compositor) =>
      formatParameterNames(
        labels,
        groups,
        this.session.groupNames(),
        compositor.manager(subsystem)?.definition ?? definitions[subsystem],
      ),
    )
  }

  setSimulationDuration(years: number): Effect.Effect<void, ConfigurationError | EngineOperationError> {
    if (!Number.isInteger(years) || years < 1) {
      return Effect.fail(
        new ConfigurationError({ reason: `Simulation duration must be a positive number of years, got ${years}` }),
      )
    }
    return this.session.setSimulationYears(years)
      ? Effect.void
      : Effect.fail(
          new EngineOperationError({
            operation: `Setting the simulation duration to ${years} years`,
            reason: "the engine rejected the duration",
          }),
        )
  }

  /**
   * Parameters held at one value across every scenario.
   */
  setConstantParameters(
    names: ReadonlyArray<string>,
    values: ReadonlyArray<number>,
  ): Effect.Effect<void, ConfigurationError> {
    return Effect.flatMap(this.parameters, (compositor) => compositor.setConstant(names, values))
  }

  /**
   * Run every scenario of a table in this process.
   */
  runScenarios(table: ScenarioTable, options: RunOptions = {}): Effect.Effect<ResultSet, ScenarioError> {
    return Effect.gen(this, function* () {
      const compositor = yield* this.parameters
      return yield* runScenarios(compositor, table, {
        ...options,
        failurePolicy: options.failurePolicy ?? this.settings.runFailurePolicy,
      }).pipe(Effect.provideService(Engine, this.session))
    }).pipe((effect) => this.logged(effect))
  }

  /**
   * Run a table across a pool of workers. Each worker opens its own copy of
   * the model; while the pool runs, this interface's session is closed.
   *
   * Falls back to {@link runScenarios} for one worker, one scenario, or when
   * the compiled worker entry is unavailable.
   */
  runScenariosParallel(
    table: ScenarioTable,
    options: ParallelRunOptions = {},
  ): Effect.Effect<ResultSet, ParallelRunError> {
    return Effect.gen(this, function* () {
      const workers = options.workers ?? this.settings.workers
      if (!Number.isInteger(workers) || workers < 1) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: `Worker count must be a positive integer, got ${workers}` }),
        )
      }
      if (workers === 1 || table.size <= 1) {
        return yield* this.runScenarios(table, options)
      }
      let spawner = this.options.spawner
      if (spawner === undefined) {
        if (isRunningFromSource()) {
          yield* Effect.logWarning("Worker threads need the compiled package; running scenarios sequentially")
          return yield* this.runScenarios(table, options)
        }
        spawner = threadSpawner()
      }
      // A custom spawner may resolve the driver by name.
      const driver =
        this.options.driverModule ?? (this.options.spawner === undefined ? undefined : this.options.driver.name)
      if (driver === undefined) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: "Parallel runs on worker threads need a driverModule to import" }),
        )
      }

      const compositor = yield* this.parameters
      yield* prepareBatch(compositor, this.session, table)
      const variables = [...new Set(options.variables ?? DEFAULT_VARIABLES)]
      const buffers = yield* ResultManager.allocateShared(this.session, variables, table.size)
      const results = yield* ResultManager.make(this.session, variables, table, buffers)
      yield* this.saveScenario(this.session.ecosim)
      yield* this.saveScenario(this.session.ecotracer)
      yield* closeSession(this.session)

      const outcome = yield* Effect.exit(
        runPool({
          workers,
          spawner,
          onProgress: options.onProgress,
          recipe: {
            driver,
            modelPath: this.modelCopy,
            ecosimScenario: ECOSIM_SCENARIO,
            ecotracerScenario: ECOTRACER_SCENARIO,
            stage: options.stage ?? "ecotracer",
            parameters: compositor.snapshot(),
            variables,
            buffers,
            table,
            failurePolicy: options.failurePolicy ?? this.settings.runFailurePolicy,
            cleanupRetries: this.settings.cleanupRetries,
            cleanupDelayMillis: Duration.toMillis(this.settings.cleanupDelay),
          },
        }),
      ).pipe(
        Effect.onInterrupt(() =>
          this.reopen().pipe(
            Effect.catchAll((error) => Effect.logError(`Unable to reopen the model: ${error.message}`)),
          ),
        ),
      )
      yield* Effect.uninterruptible(this.reopen())
      const pool = yield* outcome
      yield* Effect.logInfo(`Ran ${table.size} scenarios`).pipe(
        Effect.annotateLogs({ failures: pool.failedRows.length, workers: pool.completedByWorker.size }),
      )
      return yield* results.toResultSet(pool.failedRows)
    }).pipe((effect) => this.logged(effect))
  }

  private saveScenario(subsystem: SubsystemSession): Effect.Effect<void, EngineOperationError> {
    return subsystem.saveScenario()
      ? Effect.void
      : Effect.fail(
          new EngineOperationError({
            operation: `Saving the ${subsystem.name} scenario`,
            reason: "the engine refused to save the scenario",
          }),
        )
  }

  private reopen(): Effect.Effect<void, EngineOperationError | ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      if (!this.session.loadModel(this.modelCopy)) {
        return yield* Effect.fail(
          new EngineOperationError({
            operation: `Reloading model ${this.modelCopy}`,
            reason: "the engine rejected the model file",
          }),
        )
      }
      yield* loadScenarioByName(this.session.ecosim, ECOSIM_SCENARIO)
      yield* loadScenarioByName(this.session.ecotracer, ECOTRACER_SCENARIO)
    })
  }

  /**
   * Write Ecosim group information laid out like the engine's editor: each
   * key is a column title, each value one entry per group. Consumer columns
   * are read from the consumer rows, producer columns from the producer rows
   * that follow them. Unsupported columns are skipped with a warning.
   */
  setEcosimGroupInfo(
    columns: Readonly<Record<string, ReadonlyArray<number>>>,
  ): Effect.Effect<void, ConfigurationError> {
    return Effect.gen(this, function* () {
      const consumers = this.session.consumerCount()
      const producers = this.session.producerCount()
      const known = new Map(
        EcosimDefinition.groupParameters.flatMap((entry) =>
          entry.label === undefined ? [] : [[entry.label, entry] as const],
        ),
      )
      const skipped = Object.keys(columns).filter((label) => !known.has(label))
      if (skipped.length > 0) {
        yield* Effect.logWarning("Skipping unsupported Ecosim group info columns").pipe(
          Effect.annotateLogs("columns", skipped.join(", ")),
        )
      }
      const writes: Array<{ field: string; values: Array<number>; groups: Array<number> }> = []
      for (const [label, entry] of known) {
        const values = columns[label]
        if (values === undefined) continue
        const [start, count] = entry.rows === "producers" ? [consumers, producers] : [0, consumers]
        if (values.length < start + count) {
          return yield* Effect.fail(
            new ConfigurationError({
              reason: `Column "${label}" has ${values.length} rows but at least ${start + count} are needed`,
            }),
          )
        }
        writes.push({
          field: entry.field,
          values: values.slice(start, start + count),
          groups: rangeOf(start + 1, count),
        })
      }
      for (const { field, groups, values } of writes) {
        this.session.ecosim.setGroupValues(field, values, groups)
      }
    })
  }

  /**
   * Write every Ecosim vulnerability in one batched call.
   */
  setEcosimVulnerabilities(vulnerabilities: VulnerabilityMatrix): Effect.Effect<void, ConfigurationError> {
    return Effect.gen(this, function* () {
      const groupNames = this.session.groupNames()
      const consumers = this.session.consumerCount()
      if (
        vulnerabilities.groups.length !== groupNames.length ||
        vulnerabilities.groups.some((group, i) => group !== groupNames[i])
      ) {
        return yield* Effect.fail(
          new ConfigurationError({
            reason: `Vulnerability rows [${vulnerabilities.groups.join(", ")}] do not match model groups [${groupNames.join(", ")}]`,
          }),
        )
      }
      const { matrix } = vulnerabilities
      if (matrix.length !== groupNames.length || matrix.some((row) => row.length !== consumers)) {
        return yield* Effect.fail(
          new ConfigurationError({
            reason: `Expected a vulnerability matrix of shape (${groupNames.length}, ${consumers})`,
          }),
        )
      }
      const values: Array<number> = []
      const prey: Array<number> = []
      const predators: Array<number> = []
      matrix.forEach((row, i) => {
        row.forEach((value, j) => {
          values.push(value)
          prey.push(i + 1)
          predators.push(j + 1)
        })
      })
      this.session.ecosim.setPairValues("vulnerabilities", values, prey, predators)
    })
  }

  /**
   * Register a forcing function and return its engine index. The engine
   * reads forcing shapes from position 1, so a leading 1.0 is inserted.
   */
  addForcingFunction(name: string, values: ReadonlyArray<number>): Effect.Effect<number> {
    return Effect.sync(() => this.session.addForcingShape(name, [1.0, ...values]))
  }

  /**
   * A table of `count` zeroed scenarios over the named environment
   * parameters and every group of the named Ecotracer prefixes. Group
   * columns come first.
   */
  emptyScenarioTable(
    environmentNames: ReadonlyArray<string>,
    prefixes: ReadonlyArray<string>,
    count = 1,
  ): Effect.Effect<ScenarioTable, ConfigurationError | ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      const compositor = yield* this.parameters
      const manager = compositor.manager("ecotracer")
      if (manager === undefined) {
        return yield* Effect.fail(new ScenarioLookupError({ kind: "parameter", name: "ecotracer" }))
      }
      const known = manager.environmentParameterNames()
      const unknown = environmentNames.filter((name) => !known.includes(name))
      if (unknown.length > 0) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: "Invalid environment parameter names", names: unknown }),
        )
      }
      const groupNames = yield* manager.groupParameterNames({ prefixes })
      return yield* ScenarioTable.empty([...groupNames, ...environmentNames], count)
    })
  }

  /**
   * Every Ecotracer parameter as a long-format row with no value: the
   * environment parameters under the environment pseudo-group, then each
   * group prefix per group.
   */
  longScenarioTable(): Effect.Effect<Array<LongScenarioRow>, ScenarioLookupError> {
    return Effect.gen(this, function* () {
      const compositor = yield* this.parameters
      const manager = compositor.manager("ecotracer")
      if (manager === undefined) {
        return yield* Effect.fail(new ScenarioLookupError({ kind: "parameter", name: "ecotracer" }))
      }
      const rows: Array<LongScenarioRow> = manager
        .environmentParameterNames()
        .map((parameter) => ({ scenario: 0, group: ENVIRONMENT_GROUP, parameter, value: null }))
      for (const group of this.session.groupNames()) {
        for (const parameter of manager.groupPrefixes) {
          rows.push({ scenario: 0, group, parameter, value: null })
        }
      }
      return rows
    })
  }
}
