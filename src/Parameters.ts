/**
 * Parameter catalog for one engine subsystem.
 *
 * A {@link ParameterManager} enumerates every settable parameter of a
 * subsystem for the loaded model (one per prefix and functional group, one per
 * environment scalar, one per prey / predator pair), records which of them are
 * constant or read from a scenario-table column, and writes them to the engine
 * with one batched call per category.
 *
 * @since 0.1.0
 */

import { Data, Effect, Schema } from "effect"
import { type EngineSession, type SubsystemSession, subsystemOf } from "./Engine.js"
import { ConfigurationError, IndexOutOfRangeError, ScenarioLookupError } from "./Errors.js"
import { Subsystem } from "./Types.js"

// =============================================================================
// Parameter model
// =============================================================================

/**
 * How a parameter is assigned. A constant carries its value, a variable the
 * absolute scenario-table column it is read from; never both.
 *
 * @category Parameters
 * @since 0.1.0
 */
export type ParameterMode = Data.TaggedEnum<{
  Unset: {}
  Constant: { readonly value: number }
  Variable: { readonly column: number }
}>

/**
 * @category Parameters
 * @since 0.1.0
 */
export const ParameterMode = Data.taggedEnum<ParameterMode>()

/**
 * What a parameter addresses inside its category.
 *
 * @category Parameters
 * @since 0.1.0
 */
export type ParameterTarget = Data.TaggedEnum<{
  Group: { readonly group: number }
  Pair: { readonly prey: number; readonly predator: number }
  Scalar: {}
}>

/**
 * @category Parameters
 * @since 0.1.0
 */
export const ParameterTarget = Data.taggedEnum<ParameterTarget>()

/**
 * @category Parameters
 * @since 0.1.0
 */
export type ParameterKind = "group" | "environment" | "pair"

/**
 * A single named assignment unit.
 *
 * @category Parameters
 * @since 0.1.0
 */
export class Parameter extends Data.Class<{
  readonly name: string
  readonly category: number
  readonly kind: ParameterKind
  readonly target: ParameterTarget
  readonly mode: ParameterMode
}> {
  get isEnvironment(): boolean {
    return this.kind === "environment"
  }

  get isSet(): boolean {
    return this.mode._tag !== "Unset"
  }

  withMode(mode: ParameterMode): Parameter {
    return new Parameter({
      name: this.name,
      category: this.category,
      kind: this.kind,
      target: this.target,
      mode,
    })
  }
}

/**
 * Serializable assignment of one parameter, used to hand a catalog's state to
 * a worker.
 *
 * @category Schemas
 * @since 0.1.0
 */
export const ParameterAssignment = Schema.Union(
  Schema.TaggedStruct("Constant", { name: Schema.String, value: Schema.Number }),
  Schema.TaggedStruct("Variable", {
    name: Schema.String,
    column: Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)),
  }),
)

/**
 * @category Schemas
 * @since 0.1.0
 */
export type ParameterAssignment = typeof ParameterAssignment.Type

// =============================================================================
// Manager definitions
// =============================================================================

/**
 * A per-group category: one batched setter addressed by group indices.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const GroupParameterDefinition = Schema.Struct({
  prefix: Schema.String,
  field: Schema.String,
  /** Column title used for this parameter by the engine's own editor. */
  label: Schema.optional(Schema.String),
  /** Which block of groups the editor table fills for this parameter. */
  rows: Schema.optional(Schema.Literal("all", "consumers", "producers")),
})

/**
 * @category Definitions
 * @since 0.1.0
 */
export interface GroupParameterDefinition extends Schema.Schema.Type<typeof GroupParameterDefinition> {}

/**
 * @category Definitions
 * @since 0.1.0
 */
export const EnvironmentParameterDefinition = Schema.Struct({
  name: Schema.String,
  field: Schema.String,
})

/**
 * @category Definitions
 * @since 0.1.0
 */
export interface EnvironmentParameterDefinition
  extends Schema.Schema.Type<typeof EnvironmentParameterDefinition> {}

/**
 * A pairwise category, addressed by (prey, predator). Prey range over every
 * group, predators over the consumers.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const PairParameterDefinition = Schema.Struct({
  prefix: Schema.String,
  field: Schema.String,
})

/**
 * @category Definitions
 * @since 0.1.0
 */
export interface PairParameterDefinition extends Schema.Schema.Type<typeof PairParameterDefinition> {}

/**
 * Static description of the settable fields of a subsystem. Plain data, so
 * that a worker can rebuild the same catalog.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const ManagerDefinition = Schema.Struct({
  subsystem: Subsystem,
  groupParameters: Schema.Array(GroupParameterDefinition),
  environmentParameters: Schema.Array(EnvironmentParameterDefinition),
  pairParameters: Schema.Array(PairParameterDefinition),
})

/**
 * @category Definitions
 * @since 0.1.0
 */
export interface ManagerDefinition extends Schema.Schema.Type<typeof ManagerDefinition> {}

/**
 * Contaminant tracing parameters.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const EcotracerDefinition: ManagerDefinition = {
  subsystem: "ecotracer",
  groupParameters: [
    { prefix: "init_c", field: "initial_concentrations", label: "Initial conc. (t/t)" },
    {
      prefix: "immig_c",
      field: "immigration_concentrations",
      label: "Conc. in immigrating biomass (t/t)",
    },
    { prefix: "direct_abs_r", field: "direct_absorption_rates", label: "Direct absorption rate" },
    { prefix: "phys_decay_r", field: "physical_decay_rates", label: "Physical decay rate" },
    { prefix: "meta_decay_r", field: "metabolic_decay_rates", label: "Metabolic decay rate" },
    { prefix: "excretion_r", field: "excretion_rates", label: "Prop. of contaminant excreted" },
  ],
  environmentParameters: [
    { name: "env_init_c", field: "initial_env_concentration" },
    { name: "env_base_inflow_r", field: "base_inflow_rate" },
    { name: "env_decay_r", field: "env_decay_rate" },
    { name: "base_vol_ex_loss", field: "env_volume_exchange_loss" },
    { name: "env_inflow_forcing_idx", field: "contaminant_forcing_number" },
  ],
  pairParameters: [],
}

/**
 * Ecosim group information and vulnerabilities.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const EcosimDefinition: ManagerDefinition = {
  subsystem: "ecosim",
  groupParameters: [
    {
      prefix: "density_dep_catchability",
      field: "density_dep_catchability",
      label: "Density-dep. catchability: Qmax/Qo [>=1]",
      rows: "consumers",
    },
    {
      prefix: "feeding_time_adj_rate",
      field: "feeding_time_adj_rate",
      label: "Feeding time adjust rate [0,1]",
      rows: "consumers",
    },
    {
      prefix: "max_rel_feeding_time",
      field: "max_rel_feeding_time",
      label: "Max rel. feeding time",
      rows: "consumers",
    },
    { prefix: "max_rel_pb", field: "max_rel_pb", label: "Max rel. P/B", rows: "producers" },
    {
      prefix: "pred_effect_feeding_time",
      field: "pred_effect_feeding_time",
      label: "Predator effect on feeding time [0,1]",
      rows: "consumers",
    },
    {
      prefix: "other_mort_feeding_time",
      field: "other_mort_feeding_time",
      label: "Fraction of other mortality sens. to changes in feeding time",
      rows: "consumers",
    },
    {
      prefix: "qbmax_qbio",
      field: "qbmax_qbio",
      label: "QBmax/QBo (for handling time) [>1]",
      rows: "consumers",
    },
    {
      prefix: "switching_power",
      field: "switching_power",
      label: "Switching power parameter [0,2]",
      rows: "consumers",
    },
  ],
  environmentParameters: [],
  pairParameters: [{ prefix: "vuln", field: "vulnerabilities" }],
}

/**
 * Definitions keyed by subsystem.
 *
 * @category Definitions
 * @since 0.1.0
 */
export const definitions: Readonly<Record<Subsystem, ManagerDefinition>> = {
  ecosim: EcosimDefinition,
  ecotracer: EcotracerDefinition,
}

// =============================================================================
// Naming
// =============================================================================

/**
 * Width that zero-pads every index of an `n`-long list to the same length.
 *
 * @category Naming
 * @since 0.1.0
 */
export const indexWidth = (count: number): number => String(count).length

const padIndex = (index: number, width: number): string => String(index).padStart(width, "0")

/**
 * `{prefix}_{padded index}_{group name}`.
 *
 * @category Naming
 * @since 0.1.0
 * @example
 * ```ts
 * groupParameterName("init_c", 3, 100, "Mackerel") // "init_c_003_Mackerel"
 * ```
 */
export const groupParameterName = (
  prefix: string,
  index: number,
  groupCount: number,
  groupName: string,
): string => `${prefix}_${padIndex(index, indexWidth(groupCount))}_${groupName}`

/**
 * `{prefix}_{prey index}_{prey}_{predator index}_{predator}`.
 *
 * @category Naming
 * @since 0.1.0
 */
export const pairParameterName = (
  prefix: string,
  prey: number,
  predator: number,
  groupNames: ReadonlyArray<string>,
): string => {
  const width = indexWidth(groupNames.length)
  return `${prefix}_${padIndex(prey, width)}_${groupNames[prey - 1]}_${padIndex(predator, width)}_${groupNames[predator - 1]}`
}

/**
 * Map editor column titles and group names to catalog names.
 *
 * @category Naming
 * @since 0.1.0
 */
export const formatParameterNames = (
  labels: ReadonlyArray<string>,
  groups: ReadonlyArray<string>,
  groupNames: ReadonlyArray<string>,
  definition: ManagerDefinition = EcotracerDefinition,
): Effect.Effect<Array<string>, ConfigurationError | ScenarioLookupError> =>
  Effect.gen(function* () {
    if (labels.length !== groups.length) {
      return yield* Effect.fail(
        new ConfigurationError({
          reason: `Got ${labels.length} parameter labels but ${groups.length} groups`,
        }),
      )
    }
    const prefixByLabel = new Map(
      definition.groupParameters.flatMap((entry) =>
        entry.label === undefined ? [] : [[entry.label, entry.prefix] as const],
      ),
    )
    const unknownLabels = labels.filter((label) => !prefixByLabel.has(label))
    if (unknownLabels.length > 0) {
      return yield* Effect.fail(
        new ConfigurationError({ reason: "Unrecognised parameter labels", names: unknownLabels }),
      )
    }
    const names: Array<string> = []
    for (let i = 0; i < labels.length; i++) {
      const group = groups[i]
      const position = groupNames.indexOf(group)
      if (position < 0) {
        return yield* Effect.fail(new ScenarioLookupError({ kind: "group", name: group }))
      }
      const prefix = prefixByLabel.get(labels[i]) ?? labels[i]
      names.push(groupParameterName(prefix, position + 1, groupNames.length, group))
    }
    return names
  })

// =============================================================================
// Manager
// =============================================================================

/**
 * One batched setter of a subsystem.
 *
 * @category Parameters
 * @since 0.1.0
 */
export type ParameterCategory =
  | { readonly kind: "group"; readonly prefix: string; readonly field: string }
  | { readonly kind: "environment"; readonly name: string; readonly field: string }
  | { readonly kind: "pair"; readonly prefix: string; readonly field: string }

interface CategoryPlan {
  readonly category: ParameterCategory
  readonly targets: Array<ParameterTarget>
  readonly columns: Array<number>
}

/**
 * Selects a subset of group parameters. Groups are names or 1-based indices.
 *
 * @category Parameters
 * @since 0.1.0
 */
export interface GroupParameterFilter {
  readonly prefixes?: ReadonlyArray<string>
  readonly groups?: ReadonlyArray<string | number>
}

const groupsOf = (targets: ReadonlyArray<ParameterTarget>): Array<number> =>
  targets.flatMap((target) => (target._tag === "Group" ? [target.group] : []))

/**
 * Catalog and batched writer for one subsystem.
 *
 * @category Parameters
 * @since 0.1.0
 */
export class ParameterManager {
  readonly categories: ReadonlyArray<ParameterCategory>
  private readonly parameters = new Map<string, Parameter>()
  private plan: ReadonlyArray<CategoryPlan> | undefined = undefined
  private maxColumn = 0

  constructor(
    readonly definition: ManagerDefinition,
    readonly groupNames: ReadonlyArray<string>,
    readonly consumerCount: number = 0,
  ) {
    this.categories = [
      ...definition.groupParameters.map(
        ({ prefix, field }): ParameterCategory => ({ kind: "group", prefix, field }),
      ),
      ...definition.environmentParameters.map(
        ({ name, field }): ParameterCategory => ({ kind: "environment", name, field }),
      ),
      ...definition.pairParameters.map(
        ({ prefix, field }): ParameterCategory => ({ kind: "pair", prefix, field }),
      ),
    ]
    const n = groupNames.length
    this.categories.forEach((category, index) => {
      switch (category.kind) {
        case "group":
          groupNames.forEach((groupName, i) => {
            this.register(
              groupParameterName(category.prefix, i + 1, n, groupName),
              index,
              "group",
              ParameterTarget.Group({ group: i + 1 }),
            )
          })
          break
        case "environment":
          this.register(category.name, index, "environment", ParameterTarget.Scalar())
          break
        case "pair":
          for (let prey = 1; prey <= n; prey++) {
            for (let predator = 1; predator <= consumerCount; predator++) {
              this.register(
                pairParameterName(category.prefix, prey, predator, groupNames),
                index,
                "pair",
                ParameterTarget.Pair({ prey, predator }),
              )
            }
          }
          break
      }
    })
  }

  /**
   * Build the manager for a subsystem of the model loaded in a session.
   */
  static fromSession(session: EngineSession, definition: ManagerDefinition): ParameterManager {
    return new ParameterManager(
      definition,
      session.groupNames(),
      definition.pairParameters.length > 0 ? session.consumerCount() : 0,
    )
  }

  private register(name: string, category: number, kind: ParameterKind, target: ParameterTarget) {
    this.parameters.set(
      name,
      new Parameter({ name, category, kind, target, mode: ParameterMode.Unset() }),
    )
  }

  get subsystem(): Subsystem {
    return this.definition.subsystem
  }

  get groupPrefixes(): ReadonlyArray<string> {
    return this.definition.groupParameters.map((entry) => entry.prefix)
  }

  get size(): number {
    return this.parameters.size
  }

  has(name: string): boolean {
    return this.parameters.has(name)
  }

  get(name: string): Parameter | undefined {
    return this.parameters.get(name)
  }

  /**
   * Mark parameters constant. Returns the names this manager does not know.
   */
  setConstant(
    names: ReadonlyArray<string>,
    values: ReadonlyArray<number>,
  ): Effect.Effect<ReadonlySet<string>, ConfigurationError> {
    return this.assign(names, values, "values", (value) => ParameterMode.Constant({ value }))
  }

  /**
   * Mark parameters as read from absolute scenario-table columns. Returns the
   * names this manager does not know.
   */
  setVariable(
    names: ReadonlyArray<string>,
    columns: ReadonlyArray<number>,
  ): Effect.Effect<ReadonlySet<string>, ConfigurationError> {
    const invalid = columns.filter((column) => !Number.isInteger(column) || column < 1)
    if (invalid.length > 0) {
      return Effect.fail(
        new ConfigurationError({
          reason: "Variable columns must be integers of at least 1",
          names: invalid.map(String),
        }),
      )
    }
    return this.assign(names, columns, "columns", (column) => ParameterMode.Variable({ column })).pipe(
      Effect.tap(() =>
        Effect.sync(() => {
          this.plan = undefined
        }),
      ),
    )
  }

  clearVariables(): Effect.Effect<void> {
    return Effect.sync(() => {
      for (const parameter of this.parameters.values()) {
        if (parameter.mode._tag === "Variable") {
          this.parameters.set(parameter.name, parameter.withMode(ParameterMode.Unset()))
        }
      }
      this.plan = undefined
    })
  }

  private assign(
    names: ReadonlyArray<string>,
    values: ReadonlyArray<number>,
    what: string,
    mode: (value: number) => ParameterMode,
  ): Effect.Effect<ReadonlySet<string>, ConfigurationError> {
    if (names.length !== values.length) {
      return Effect.fail(
        new ConfigurationError({
          reason: `Got ${names.length} parameter names but ${values.length} ${what}`,
        }),
      )
    }
    return Effect.sync(() => {
      const unknown = new Set<string>()
      names.forEach((name, i) => {
        const parameter = this.parameters.get(name)
        if (parameter === undefined) {
          unknown.add(name)
        } else {
          this.parameters.set(name, parameter.withMode(mode(values[i])))
          if (parameter.mode._tag === "Variable") {
            this.plan = undefined
          }
        }
      })
      return unknown
    })
  }

  /**
   * Write every constant parameter: one call per group or pair category, one
   * call per constant scalar.
   */
  applyConstants(session: EngineSession): Effect.Effect<void> {
    return Effect.sync(() => {
      const subsystem = subsystemOf(session, this.subsystem)
      const values = this.categories.map((): Array<number> => [])
      const targets = this.categories.map((): Array<ParameterTarget> => [])
      for (const parameter of this.parameters.values()) {
        if (parameter.mode._tag === "Constant") {
          values[parameter.category].push(parameter.mode.value)
          targets[parameter.category].push(parameter.target)
        }
      }
      this.categories.forEach((category, index) => {
        writeCategory(subsystem, category, values[index], targets[index])
      })
    })
  }

  /**
   * Write the variable parameters of one scenario row. The per-category
   * gather plan is built on the first call after the variables change.
   */
  applyVariables(
    session: EngineSession,
    row: ReadonlyArray<number>,
  ): Effect.Effect<void, ConfigurationError> {
    return Effect.suspend(() => {
      const plan = this.variablePlan()
      if (plan.length > 0 && row.length <= this.maxColumn) {
        return Effect.fail(
          new ConfigurationError({
            reason: `Scenario row has ${row.length} values but column ${this.maxColumn} is mapped`,
          }),
        )
      }
      const subsystem = subsystemOf(session, this.subsystem)
      for (const entry of plan) {
        const values = entry.columns.map((column) => row[column])
        writeCategory(subsystem, entry.category, values, entry.targets)
      }
      return Effect.void
    })
  }

  private variablePlan(): ReadonlyArray<CategoryPlan> {
    if (this.plan !== undefined) {
      return this.plan
    }
    const byCategory = new Map<number, CategoryPlan>()
    let maxColumn = 0
    for (const parameter of this.parameters.values()) {
      if (parameter.mode._tag !== "Variable") continue
      let entry = byCategory.get(parameter.category)
      if (entry === undefined) {
        entry = { category: this.categories[parameter.category], targets: [], columns: [] }
        byCategory.set(parameter.category, entry)
      }
      entry.targets.push(parameter.target)
      entry.columns.push(parameter.mode.column)
      maxColumn = Math.max(maxColumn, parameter.mode.column)
    }
    this.maxColumn = maxColumn
    this.plan = [...byCategory.entries()].sort(([a], [b]) => a - b).map(([, entry]) => entry)
    return this.plan
  }

  // ---------------------------------------------------------------------------
  // Discovery
  // ---------------------------------------------------------------------------

  allParameterNames(): Array<string> {
    return [...this.parameters.keys()]
  }

  parametersOfKind(kind: ParameterKind): Array<Parameter> {
    return [...this.parameters.values()].filter((parameter) => parameter.kind === kind)
  }

  prefixOf(parameter: Parameter): string | undefined {
    const category = this.categories[parameter.category]
    return category.kind === "environment" ? undefined : category.prefix
  }

  environmentParameterNames(): Array<string> {
    return this.parametersOfKind("environment").map((parameter) => parameter.name)
  }

  pairParameterNames(): Array<string> {
    return this.parametersOfKind("pair").map((parameter) => parameter.name)
  }

  unsetParameterNames(): Array<string> {
    return [...this.parameters.values()]
      .filter((parameter) => !parameter.isSet)
      .map((parameter) => parameter.name)
  }

  /**
   * Resolve group names or 1-based indices to indices.
   */
  resolveGroups(
    groups: ReadonlyArray<string | number>,
  ): Effect.Effect<Array<number>, ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.forEach(groups, (group): Effect.Effect<number, ScenarioLookupError | IndexOutOfRangeError> => {
      if (typeof group === "number") {
        return Number.isInteger(group) && group >= 1 && group <= this.groupNames.length
          ? Effect.succeed(group)
          : Effect.fail(
              new IndexOutOfRangeError({ kind: "group", index: group, size: this.groupNames.length }),
            )
      }
      const position = this.groupNames.indexOf(group)
      return position < 0
        ? Effect.fail(new ScenarioLookupError({ kind: "group", name: group }))
        : Effect.succeed(position + 1)
    })
  }

  /**
   * Sorted names of the group parameters matching a filter.
   */
  groupParameterNames(
    filter: GroupParameterFilter = {},
  ): Effect.Effect<Array<string>, ConfigurationError | ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      const known = this.groupPrefixes
      const prefixes = filter.prefixes ?? known
      const unknown = prefixes.filter((prefix) => !known.includes(prefix))
      if (unknown.length > 0) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: "Invalid parameter prefix", names: unknown }),
        )
      }
      const groups = new Set(
        filter.groups === undefined
          ? this.groupNames.map((_, i) => i + 1)
          : yield* this.resolveGroups(filter.groups),
      )
      return this.parametersOfKind("group")
        .filter(
          (parameter) =>
            prefixes.includes(this.prefixOf(parameter) ?? "") &&
            parameter.target._tag === "Group" &&
            groups.has(parameter.target.group),
        )
        .map((parameter) => parameter.name)
        .sort()
    })
  }

  // ---------------------------------------------------------------------------
  // Snapshot
  // ---------------------------------------------------------------------------

  /**
   * Constant and variable assignments as plain data.
   */
  assignments(): Array<ParameterAssignment> {
    const result: Array<ParameterAssignment> = []
    for (const parameter of this.parameters.values()) {
      const mode = parameter.mode
      if (mode._tag === "Constant") {
        result.push({ _tag: "Constant", name: parameter.name, value: mode.value })
      } else if (mode._tag === "Variable") {
        result.push({ _tag: "Variable", name: parameter.name, column: mode.column })
      }
    }
    return result
  }

  /**
   * Re-apply assignments captured by {@link ParameterManager.assignments}.
   */
  restore(assignments: ReadonlyArray<ParameterAssignment>): Effect.Effect<void, ScenarioLookupError> {
    return Effect.gen(this, function* () {
      for (const assignment of assignments) {
        const parameter = this.parameters.get(assignment.name)
        if (parameter === undefined) {
          return yield* Effect.fail(new ScenarioLookupError({ kind: "parameter", name: assignment.name }))
        }
        this.parameters.set(
          assignment.name,
          parameter.withMode(
            assignment._tag === "Constant"
              ? ParameterMode.Constant({ value: assignment.value })
              : ParameterMode.Variable({ column: assignment.column }),
          ),
        )
      }
      this.plan = undefined
    })
  }
}

const writeCategory = (
  subsystem: SubsystemSession,
  category: ParameterCategory,
  values: ReadonlyArray<number>,
  targets: ReadonlyArray<ParameterTarget>,
): void => {
  if (values.length === 0) return
  switch (category.kind) {
    case "group":
      subsystem.setGroupValues(category.field, values, groupsOf(targets))
      return
    case "environment":
      subsystem.setScalar(category.field, values[values.length - 1])
      return
    case "pair": {
      const prey: Array<number> = []
      const predators: Array<number> = []
      for (const target of targets) {
        if (target._tag === "Pair") {
          prey.push(target.prey)
          predators.push(target.predator)
        }
      }
      subsystem.setPairValues(category.field, values, prey, predators)
      return
    }
  }
}
