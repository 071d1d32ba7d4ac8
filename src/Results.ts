/**
 * Result collection and result sets.
 *
 * A {@link ResultManager} binds the requested result variables to extractors
 * (one per engine array) and to scenario-indexed stores, copies each
 * scenario's results into place right after its run, and finally freezes the
 * stores into an immutable {@link ResultSet}.
 *
 * @since 0.1.0
 */

import { Clock, Effect } from "effect"
import type { EngineSession } from "./Engine.js"
import {
  ConfigurationError,
  IndexOutOfRangeError,
  ScenarioLookupError,
  type StageNotReadyError,
} from "./Errors.js"
import { rowMajorStrides, ResultExtractor } from "./Extraction.js"
import { ResultStore } from "./ResultStore.js"
import {
  categoryDimensions,
  type Dimension,
  dimensionLabels,
  ENVIRONMENT_GROUP,
  findExtractor,
  findVariable,
  type ModelSizes,
  type ResultVariable,
  type ShapeCategory,
  variableShape,
} from "./ResultVariables.js"
import type { ScenarioTable } from "./ScenarioTable.js"

// =============================================================================
// Run metadata
// =============================================================================

/**
 * Model facts captured when a manager is built, so a result set can be
 * assembled after the session is gone.
 *
 * @category Results
 * @since 0.1.0
 */
export interface RunMetadata {
  readonly country: string
  readonly firstYear: number
  readonly groupNames: ReadonlyArray<string>
  readonly fleetNames: ReadonlyArray<string>
  readonly months: number
}

/**
 * @category Results
 * @since 0.1.0
 */
export const readMetadata = (session: EngineSession): RunMetadata => ({
  country: session.country(),
  firstYear: session.firstYear(),
  groupNames: session.groupNames(),
  fleetNames: session.fleetNames(),
  months: session.simulationYears() * 12,
})

const sizesOf = (metadata: RunMetadata): ModelSizes => ({
  groups: metadata.groupNames.length,
  fleets: metadata.fleetNames.length,
  months: metadata.months,
})

const resolveVariables = (
  names: ReadonlyArray<string>,
): Effect.Effect<Array<ResultVariable>, ScenarioLookupError> =>
  Effect.forEach([...new Set(names)], (name) => {
    const variable = findVariable(name)
    return variable === undefined
      ? Effect.fail(new ScenarioLookupError({ kind: "variable", name }))
      : Effect.succeed(variable)
  })

// =============================================================================
// Labeled arrays
// =============================================================================

/**
 * A frozen variable with its dimension labels and coordinates.
 *
 * @category Results
 * @since 0.1.0
 */
export class LabeledArray {
  readonly strides: ReadonlyArray<number>

  constructor(
    readonly variable: ResultVariable,
    readonly dims: ReadonlyArray<string>,
    readonly coords: ReadonlyArray<ReadonlyArray<string | number>>,
    readonly shape: ReadonlyArray<number>,
    readonly data: Float64Array,
    readonly runDate: string,
    readonly firstYear: number,
  ) {
    this.strides = rowMajorStrides(shape)
  }

  get name(): string {
    return this.variable.exportName
  }

  get unit(): string {
    return this.variable.unit
  }

  at(...index: ReadonlyArray<number>): number {
    let position = 0
    for (let axis = 0; axis < this.shape.length; axis++) {
      position += index[axis] * this.strides[axis]
    }
    return this.data[position]
  }

  /**
   * Flatten into one record per element, keyed by dimension label plus the
   * variable's export name.
   */
  toRecords(): Array<Record<string, string | number>> {
    const records: Array<Record<string, string | number>> = []
    const counter = new Array<number>(this.shape.length).fill(0)
    for (let position = 0; position < this.data.length; position++) {
      const record: Record<string, string | number> = {}
      this.dims.forEach((dim, axis) => {
        record[dim] = this.coords[axis][counter[axis]]
      })
      record[this.name] = this.data[position]
      records.push(record)
      for (let axis = this.shape.length - 1; axis >= 0; axis--) {
        counter[axis]++
        if (counter[axis] < this.shape[axis]) break
        counter[axis] = 0
      }
    }
    return records
  }
}

const coordinates = (
  dimension: Dimension,
  table: ScenarioTable,
  metadata: RunMetadata,
): ReadonlyArray<string | number> => {
  switch (dimension) {
    case "scenario":
      return table.ids
    case "group":
      return metadata.groupNames
    case "env_group":
      return [ENVIRONMENT_GROUP, ...metadata.groupNames]
    case "fleet":
      return metadata.fleetNames
    case "time":
      return Array.from({ length: metadata.months }, (_, month) => month)
  }
}

// =============================================================================
// Result set
// =============================================================================

/**
 * Immutable outcome of a batch: the scenario table, run metadata and one
 * labeled array per collected variable.
 *
 * @category Results
 * @since 0.1.0
 */
export class ResultSet {
  constructor(
    readonly scenarios: ScenarioTable,
    readonly metadata: RunMetadata,
    readonly runDate: string,
    readonly arrays: ReadonlyMap<string, LabeledArray>,
    readonly failedScenarios: ReadonlyArray<number>,
  ) {}

  get country(): string {
    return this.metadata.country
  }

  get firstYear(): number {
    return this.metadata.firstYear
  }

  get scenarioCount(): number {
    return this.scenarios.size
  }

  get variableNames(): ReadonlyArray<string> {
    return [...this.arrays.keys()]
  }

  get(name: string): LabeledArray | undefined {
    return this.arrays.get(name)
  }

  labeledArray(name: string): Effect.Effect<LabeledArray, ScenarioLookupError> {
    const array = this.arrays.get(name)
    return array === undefined
      ? Effect.fail(new ScenarioLookupError({ kind: "variable", name }))
      : Effect.succeed(array)
  }

  /**
   * One flattened table for a shape category, with every variable of that
   * category outer-merged on the category's dimensions.
   */
  table(category: ShapeCategory): Array<Record<string, string | number>> {
    const keys = categoryDimensions[category]
    const merged = new Map<string, Record<string, string | number>>()
    for (const array of this.arrays.values()) {
      if (array.variable.category !== category) continue
      for (const record of array.toRecords()) {
        const key = keys.map((dim) => String(record[dim])).join("\u0000")
        const existing = merged.get(key)
        merged.set(key, existing === undefined ? record : { ...existing, ...record })
      }
    }
    return [...merged.values()]
  }

  /**
   * Flattened tables of every category that holds at least one variable.
   */
  tables(): Partial<Record<ShapeCategory, Array<Record<string, string | number>>>> {
    const categories = new Set([...this.arrays.values()].map((array) => array.variable.category))
    const result: Partial<Record<ShapeCategory, Array<Record<string, string | number>>>> = {}
    for (const category of categories) {
      result[category] = this.table(category)
    }
    return result
  }

  summary(): string {
    return [
      `Country: ${this.country}`,
      `Scenarios Run: ${this.scenarioCount}`,
      `First Year: ${this.firstYear}`,
      `# Varied Parameters: ${this.scenarios.parameterNames.length}`,
      `Failed Scenarios: [${this.failedScenarios.join(", ")}]`,
      `Stored Results: [${this.variableNames.join(", ")}]`,
    ].join("\n")
  }
}

// =============================================================================
// Manager
// =============================================================================

/**
 * Shared buffers of a parallel run, keyed by variable name.
 *
 * @category Results
 * @since 0.1.0
 */
export type SharedBuffers = Readonly<Record<string, SharedArrayBuffer>>

interface Binding {
  readonly variable: ResultVariable
  readonly extractor: ResultExtractor
  readonly store: ResultStore
}

/**
 * @category Results
 * @since 0.1.0
 */
export class ResultManager {
  private readonly failed = new Set<number>()

  private constructor(
    readonly table: ScenarioTable,
    readonly metadata: RunMetadata,
    private readonly extractors: ReadonlyArray<ResultExtractor>,
    private readonly bindings: ReadonlyArray<Binding>,
  ) {}

  /**
   * Bind variables to extractors and stores. Variables read from the same
   * engine array share one extractor. With `shared`, stores are views over
   * the given buffers, whose keys must match the variables exactly.
   */
  static make(
    session: EngineSession,
    variableNames: ReadonlyArray<string>,
    table: ScenarioTable,
    shared?: SharedBuffers,
  ): Effect.Effect<ResultManager, ScenarioLookupError | ConfigurationError> {
    return Effect.gen(function* () {
      const variables = yield* resolveVariables(variableNames)
      const metadata = readMetadata(session)
      const sizes = sizesOf(metadata)
      if (shared !== undefined) {
        const expected = new Set(variables.map((variable) => variable.name))
        const received = Object.keys(shared)
        if (received.length !== expected.size || received.some((name) => !expected.has(name))) {
          return yield* Effect.fail(
            new ConfigurationError({
              reason: `Shared store keys [${received.join(", ")}] do not match variables [${[...expected].join(", ")}]`,
            }),
          )
        }
      }
      const extractors = new Map<string, ResultExtractor>()
      const bindings: Array<Binding> = []
      for (const variable of variables) {
        const spec = findExtractor(variable.extractor)
        if (spec === undefined) {
          return yield* Effect.fail(new ScenarioLookupError({ kind: "result array", name: variable.extractor }))
        }
        let extractor = extractors.get(spec.id)
        if (extractor === undefined) {
          extractor = new ResultExtractor(spec, session)
          extractors.set(spec.id, extractor)
        }
        const shape = variableShape(variable, sizes, table.size)
        const buffer = shared?.[variable.name]
        const store = buffer === undefined ? ResultStore.allocate(shape) : yield* ResultStore.attach(buffer, shape)
        bindings.push({ variable, extractor, store })
      }
      return new ResultManager(table, metadata, [...extractors.values()], bindings)
    })
  }

  /**
   * Allocate one zeroed shared buffer per variable for a parallel run.
   */
  static allocateShared(
    session: EngineSession,
    variableNames: ReadonlyArray<string>,
    scenarioCount: number,
  ): Effect.Effect<Record<string, SharedArrayBuffer>, ScenarioLookupError> {
    return Effect.map(resolveVariables(variableNames), (variables) => {
      const sizes = sizesOf(readMetadata(session))
      const buffers: Record<string, SharedArrayBuffer> = {}
      for (const variable of variables) {
        const length = variableShape(variable, sizes, scenarioCount).reduce((product, size) => product * size, 1)
        buffers[variable.name] = new SharedArrayBuffer(length * Float64Array.BYTES_PER_ELEMENT)
      }
      return buffers
    })
  }

  get variableNames(): ReadonlyArray<string> {
    return this.bindings.map((binding) => binding.variable.name)
  }

  /**
   * Number of distinct engine arrays read per collection.
   */
  get extractorCount(): number {
    return this.extractors.length
  }

  store(name: string): ResultStore | undefined {
    return this.bindings.find((binding) => binding.variable.name === name)?.store
  }

  private checkIndex(index: number): Effect.Effect<void, IndexOutOfRangeError> {
    return Number.isInteger(index) && index >= 0 && index < this.table.size
      ? Effect.void
      : Effect.fail(new IndexOutOfRangeError({ kind: "scenario", index, size: this.table.size }))
  }

  /**
   * Copy the current engine results of every variable into the slice of
   * scenario `index`. Every stage precondition and every result shape is
   * checked before any buffer is touched.
   */
  collect(
    index: number,
  ): Effect.Effect<void, StageNotReadyError | ScenarioLookupError | ConfigurationError | IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      yield* this.checkIndex(index)
      for (const extractor of this.extractors) {
        yield* extractor.checkReady()
      }
      for (const extractor of this.extractors) {
        yield* extractor.refresh()
      }
      const views = yield* Effect.forEach(this.bindings, ({ extractor, store, variable }) =>
        extractor.get(variable.key).pipe(Effect.tap((view) => store.checkFits(view))),
      )
      yield* Effect.forEach(this.bindings, ({ store }, i) => store.writeScenario(index, views[i]), {
        discard: true,
      })
    })
  }

  /**
   * Fill the slice of scenario `index` with `NaN` in every store and record
   * the scenario as failed.
   */
  invalidate(index: number): Effect.Effect<void, IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      yield* this.checkIndex(index)
      for (const { store } of this.bindings) {
        yield* store.fillScenario(index, Number.NaN)
      }
      this.failed.add(index)
    })
  }

  /**
   * Record a failed scenario without touching its slice.
   */
  markFailed(index: number): void {
    this.failed.add(index)
  }

  /**
   * Freeze the stores into a result set. Failures recorded elsewhere (for
   * example by workers) can be passed in by row index.
   */
  toResultSet(failedRows: Iterable<number> = []): Effect.Effect<ResultSet> {
    return Effect.gen(this, function* () {
      const now = yield* Clock.currentTimeMillis
      const runDate = new Date(now).toISOString()
      const arrays = new Map<string, LabeledArray>()
      for (const { store, variable } of this.bindings) {
        arrays.set(
          variable.name,
          new LabeledArray(
            variable,
            variable.dimensions.map((dimension) => dimensionLabels[dimension]),
            variable.dimensions.map((dimension) => coordinates(dimension, this.table, this.metadata)),
            store.shape,
            store.freeze(),
            runDate,
            this.metadata.firstYear,
          ),
        )
      }
      const rows = [...new Set([...this.failed, ...failedRows])].sort((a, b) => a - b)
      const ids = this.table.ids
      return new ResultSet(
        this.table,
        this.metadata,
        runDate,
        arrays,
        rows.map((row) => ids[row]),
      )
    })
  }
}
