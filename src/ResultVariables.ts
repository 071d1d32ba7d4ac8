/**
 * Result variable registry.
 *
 * Static description of every result the library can collect: which engine
 * array it is read from, how that array is trimmed, and the shape, unit and
 * export name of the scenario-indexed store it lands in.
 *
 * @since 0.1.0
 */

import type { ResultSource } from "./Engine.js"
import type { Stage } from "./Types.js"

/**
 * @category Registry
 * @since 0.1.0
 */
export type ShapeCategory = "ECOSYSTEM_STATS" | "GROUP_STATS" | "FISHING_STATS"

/**
 * @category Registry
 * @since 0.1.0
 */
export type Dimension = "scenario" | "group" | "env_group" | "fleet" | "time"

/**
 * Display label of each dimension. `group` and `env_group` share a label so
 * per-group variables merge into one table.
 *
 * @category Registry
 * @since 0.1.0
 */
export const dimensionLabels: Readonly<Record<Dimension, string>> = {
  scenario: "Scenario",
  group: "Group",
  env_group: "Group",
  fleet: "Fleet",
  time: "Time",
}

/**
 * Label of the extra leading slot of `env_group` dimensions.
 *
 * @category Registry
 * @since 0.1.0
 */
export const ENVIRONMENT_GROUP = "Environment"

/**
 * Merge keys of the flattened table for each category.
 *
 * @category Registry
 * @since 0.1.0
 */
export const categoryDimensions: Readonly<Record<ShapeCategory, ReadonlyArray<string>>> = {
  ECOSYSTEM_STATS: ["Scenario", "Time"],
  GROUP_STATS: ["Scenario", "Group", "Time"],
  FISHING_STATS: ["Scenario", "Fleet", "Group", "Time"],
}

/**
 * Per-axis trim of a source array: keep the axis, drop its first slice, or
 * drop its last slice.
 *
 * @category Registry
 * @since 0.1.0
 */
export type Trim = "none" | "first" | "last"

/**
 * Binding to one engine array. A packed extractor multiplexes several
 * variables over the leading axis of its array; `trim` then applies to the
 * remaining axes.
 *
 * @category Registry
 * @since 0.1.0
 */
export interface ExtractorSpec {
  readonly id: string
  readonly source: ResultSource
  readonly array: string
  readonly stage: Stage
  readonly trim: ReadonlyArray<Trim>
  readonly packed?: Readonly<Record<string, number>>
}

/**
 * @category Registry
 * @since 0.1.0
 */
export interface ResultVariable {
  readonly name: string
  readonly exportName: string
  readonly category: ShapeCategory
  readonly dimensions: ReadonlyArray<Dimension>
  readonly unit: string
  readonly extractor: string
  readonly key?: string
}

/**
 * Ecosim group statistics share one array, indexed by result kind.
 *
 * @category Registry
 * @since 0.1.0
 */
export const ecosimGroupResults: Readonly<Record<string, number>> = {
  Biomass: 0,
  BiomassRel: 1,
  Yield: 2,
  YieldRel: 3,
  FeedingTime: 4,
  ConsumpBiomass: 5,
  TotalMort: 6,
  PredMort: 7,
  FishMort: 8,
  ProdConsump: 9,
  AvgWeight: 10,
  MortVPred: 11,
  MortVFishing: 12,
  EcoSysStructure: 13,
  TL: 14,
}

/**
 * @category Registry
 * @since 0.1.0
 */
export const extractors: ReadonlyArray<ExtractorSpec> = [
  { id: "tracer-concentration", source: "ecotracer", array: "TracerConc", stage: "ecotracer", trim: ["last", "first"] },
  { id: "tracer-concentration-biomass", source: "ecotracer", array: "TracerCB", stage: "ecotracer", trim: ["last", "first"] },
  {
    id: "ecosim-group-stats",
    source: "ecosim",
    array: "ResultsOverTime",
    stage: "ecosim",
    trim: ["first", "first"],
    packed: ecosimGroupResults,
  },
  { id: "trophic-level-catch", source: "ecosim", array: "TLC", stage: "ecosim", trim: ["first"] },
  { id: "fib", source: "ecosim", array: "FIB", stage: "ecosim", trim: ["first"] },
  { id: "kemptons", source: "ecosim", array: "Kemptons", stage: "ecosim", trim: ["first"] },
  { id: "shannon-diversity", source: "ecosim", array: "ShannonDiversity", stage: "ecosim", trim: ["first"] },
  {
    id: "catch-by-fleet",
    source: "ecosim",
    array: "ResultsSumCatchByGroupGear",
    stage: "ecosim",
    trim: ["first", "first", "first"],
  },
]

const groupStat = (name: string, exportName: string, key: string, unit: string): ResultVariable => ({
  name,
  exportName,
  category: "GROUP_STATS",
  dimensions: ["scenario", "group", "time"],
  unit,
  extractor: "ecosim-group-stats",
  key,
})

const ecosystemStat = (name: string, exportName: string, extractor: string): ResultVariable => ({
  name,
  exportName,
  category: "ECOSYSTEM_STATS",
  dimensions: ["scenario", "time"],
  unit: "unitless",
  extractor,
})

/**
 * @category Registry
 * @since 0.1.0
 */
export const variables: ReadonlyArray<ResultVariable> = [
  {
    name: "Concentration",
    exportName: "Concentration",
    category: "GROUP_STATS",
    dimensions: ["scenario", "env_group", "time"],
    unit: "t/t",
    extractor: "tracer-concentration",
  },
  {
    name: "Concentration Biomass",
    exportName: "Concentration_Biomass",
    category: "GROUP_STATS",
    dimensions: ["scenario", "env_group", "time"],
    unit: "unknown",
    extractor: "tracer-concentration-biomass",
  },
  groupStat("Biomass", "Biomass", "Biomass", "t/km²"),
  groupStat("Catch", "Catch", "Yield", "t/km²/year"),
  groupStat("Consumption Biomass", "Consumption_Biomass", "ConsumpBiomass", "t/km²/year"),
  groupStat("Mortality", "Mortality", "TotalMort", "/year"),
  groupStat("Trophic Level", "Trophic_Level", "TL", "unitless"),
  ecosystemStat("Trophic Level Catch", "Trophic_Level_Catch", "trophic-level-catch"),
  ecosystemStat("FIB", "FIB", "fib"),
  ecosystemStat("KemptonsQ", "KemptonsQ", "kemptons"),
  ecosystemStat("Shannon Diversity", "Shannon_Diversity", "shannon-diversity"),
  {
    name: "Catch By Fleet",
    exportName: "Catch_By_Fleet",
    category: "FISHING_STATS",
    dimensions: ["scenario", "fleet", "group", "time"],
    unit: "t/km²/year",
    extractor: "catch-by-fleet",
  },
]

/**
 * Variables collected when a run names none.
 *
 * @category Registry
 * @since 0.1.0
 */
export const DEFAULT_VARIABLES: ReadonlyArray<string> = [
  "Concentration",
  "Concentration Biomass",
  "Biomass",
  "Catch",
  "Consumption Biomass",
  "Mortality",
  "Trophic Level",
  "Trophic Level Catch",
  "FIB",
  "KemptonsQ",
  "Shannon Diversity",
]

/**
 * @category Lookup
 * @since 0.1.0
 */
export const findVariable = (name: string): ResultVariable | undefined =>
  variables.find((variable) => variable.name === name)

/**
 * @category Lookup
 * @since 0.1.0
 */
export const findExtractor = (id: string): ExtractorSpec | undefined =>
  extractors.find((extractor) => extractor.id === id)

/**
 * Model sizes that fix every store dimension except `scenario`.
 *
 * @category Shapes
 * @since 0.1.0
 */
export interface ModelSizes {
  readonly groups: number
  readonly fleets: number
  readonly months: number
}

/**
 * Length of a dimension for a model and a scenario count.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const dimensionSize = (dimension: Dimension, sizes: ModelSizes, scenarios: number): number => {
  switch (dimension) {
    case "scenario":
      return scenarios
    case "group":
      return sizes.groups
    case "env_group":
      return sizes.groups + 1
    case "fleet":
      return sizes.fleets
    case "time":
      return sizes.months
  }
}

/**
 * Store shape of a variable, scenario axis first.
 *
 * @category Shapes
 * @since 0.1.0
 */
export const variableShape = (
  variable: ResultVariable,
  sizes: ModelSizes,
  scenarios: number,
): Array<number> => variable.dimensions.map((dimension) => dimensionSize(dimension, sizes, scenarios))
