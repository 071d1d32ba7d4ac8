import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Layer, Logger, LogLevel, Schema } from "effect"
import type { DenseArray, EngineDriver, EngineSession, ResultSource, SubsystemSession } from "../src/Engine.js"
import { EngineStateSnapshot, type Subsystem } from "../src/Types.js"

// =============================================================================
// Model files
// =============================================================================

const SavedScenario = Schema.Struct({
  name: Schema.String,
  description: Schema.String,
  years: Schema.optional(Schema.Int),
  values: Schema.Record({ key: Schema.String, value: Schema.Number }),
})

type SavedScenario = typeof SavedScenario.Type

/**
 * On-disk format read by the in-memory engine. Groups are listed consumers
 * first, then producers, then detritus.
 */
export const MemoryModel = Schema.Struct({
  country: Schema.String,
  firstYear: Schema.Int,
  years: Schema.Int,
  balanced: Schema.Boolean,
  groups: Schema.Array(
    Schema.Struct({ name: Schema.String, consumer: Schema.Boolean, producer: Schema.Boolean }),
  ),
  fleets: Schema.Array(Schema.String),
  ecosimScenarios: Schema.Array(SavedScenario),
  ecotracerScenarios: Schema.Array(SavedScenario),
})

export type MemoryModel = typeof MemoryModel.Type

const decodeModel = Schema.decodeUnknownSync(Schema.parseJson(MemoryModel))

/**
 * Two consumers, one producer and detritus; one fleet; one year (12 months).
 */
export const makeBayModel = (overrides: Partial<MemoryModel> = {}): MemoryModel => ({
  country: "Testland",
  firstYear: 2000,
  years: 1,
  balanced: true,
  groups: [
    { name: "Baleen Whale", consumer: true, producer: false },
    { name: "Mackerel", consumer: true, producer: false },
    { name: "Phytoplankton", consumer: false, producer: true },
    { name: "Detritus", consumer: false, producer: false },
  ],
  fleets: ["Trawl"],
  ecosimScenarios: [],
  ecotracerScenarios: [],
  ...overrides,
})

const directories: Array<string> = []

/**
 * Write a model to a fresh temporary directory and return its path.
 */
export const writeModelFile = (model: MemoryModel = makeBayModel(), name = "bay.ewemdb"): string => {
  const directory = mkdtempSync(join(tmpdir(), "ecosim-batch-test-"))
  directories.push(directory)
  const path = join(directory, name)
  writeFileSync(path, JSON.stringify(model))
  return path
}

export const readModelFile = (path: string): MemoryModel => decodeModel(readFileSync(path, "utf8"))

/**
 * Remove every directory created by {@link writeModelFile}.
 */
export const removeModelFiles = (): void => {
  for (const directory of directories.splice(0)) {
    rmSync(directory, { recursive: true, force: true })
  }
}

// =============================================================================
// Engine double
// =============================================================================

export interface EngineCall {
  readonly subsystem: Subsystem | "engine"
  readonly method: string
  readonly field?: string
  readonly count?: number
  readonly values?: ReadonlyArray<number>
  /** Group indices of a group write, prey indices of a pair write. */
  readonly indices?: ReadonlyArray<number>
  readonly predators?: ReadonlyArray<number>
}

const groupKey = (field: string, group: number) => `${field}[${group}]`
const pairKey = (field: string, prey: number, predator: number) => `${field}[${prey},${predator}]`

class MemorySubsystem implements SubsystemSession {
  values = new Map<string, number>()
  scenarios: Array<SavedScenario> = []
  active = 0

  constructor(
    readonly name: Subsystem,
    private readonly engine: MemoryEngine,
  ) {}

  setGroupValues(field: string, values: ReadonlyArray<number>, groups: ReadonlyArray<number>): void {
    this.engine.calls.push({
      subsystem: this.name,
      method: "setGroupValues",
      field,
      count: values.length,
      values: [...values],
      indices: [...groups],
    })
    groups.forEach((group, i) => this.values.set(groupKey(field, group), values[i]))
  }

  getGroupValues(field: string): ReadonlyArray<number> {
    return this.engine.groupNames().map((_, i) => this.values.get(groupKey(field, i + 1)) ?? 0)
  }

  setScalar(field: string, value: number): void {
    this.engine.calls.push({ subsystem: this.name, method: "setScalar", field, count: 1, values: [value] })
    this.values.set(field, value)
  }

  getScalar(field: string): number {
    return this.values.get(field) ?? 0
  }

  setPairValues(
    field: string,
    values: ReadonlyArray<number>,
    prey: ReadonlyArray<number>,
    predators: ReadonlyArray<number>,
  ): void {
    this.engine.calls.push({
      subsystem: this.name,
      method: "setPairValues",
      field,
      count: values.length,
      values: [...values],
      indices: [...prey],
      predators: [...predators],
    })
    values.forEach((value, i) => this.values.set(pairKey(field, prey[i], predators[i]), value))
  }

  getPairValue(field: string, prey: number, predator: number): number {
    return this.values.get(pairKey(field, prey, predator)) ?? 0
  }

  scenarioNames(): ReadonlyArray<string> {
    return this.scenarios.map((scenario) => scenario.name)
  }

  newScenario(name: string, description: string): boolean {
    if (!this.engine.loaded || this.scenarioNames().includes(name)) return false
    this.scenarios.push({ name, description, values: Object.fromEntries(this.values) })
    this.active = this.scenarios.length
    return true
  }

  loadScenario(index: number): boolean {
    const scenario = this.scenarios[index - 1]
    if (scenario === undefined) return false
    this.values = new Map(Object.entries(scenario.values))
    if (scenario.years !== undefined) this.engine.years = scenario.years
    this.active = index
    return true
  }

  removeScenario(index: number): boolean {
    if (this.scenarios[index - 1] === undefined) return false
    this.scenarios.splice(index - 1, 1)
    if (this.active === index) this.active = 0
    else if (this.active > index) this.active--
    return true
  }

  saveScenario(): boolean {
    const current = this.scenarios[this.active - 1]
    if (current === undefined) return false
    this.scenarios[this.active - 1] = {
      name: current.name,
      description: current.description,
      years: this.name === "ecosim" ? this.engine.years : undefined,
      values: Object.fromEntries(this.values),
    }
    this.engine.persist()
    return true
  }

  run(): boolean {
    this.engine.calls.push({ subsystem: this.name, method: "run" })
    return this.name === "ecosim" ? this.engine.runEcosim() : this.engine.runEcotracer()
  }
}

const ecosystemArrays: ReadonlyArray<readonly [string, number]> = [
  ["TLC", 1],
  ["FIB", 2],
  ["Kemptons", 3],
  ["ShannonDiversity", 4],
]

/**
 * In-memory engine. Results are deterministic functions of the parameters,
 * with `-1` in the slots the library trims away:
 *
 * - `TracerConc[r, t] = c0(r) + t` for rows `0..n` and months `1..T`, where
 *   `c0(0)` is `initial_env_concentration` and `c0(g)` the group's
 *   `initial_concentrations`; `TracerCB` is twice that.
 * - `ResultsOverTime[k, g, t] = 1000k + 10g + t + density_dep_catchability[g]`.
 * - `TLC`, `FIB`, `Kemptons`, `ShannonDiversity` at month `t` are
 *   `100, 200, 300, 400` plus `t`.
 * - `ResultsSumCatchByGroupGear[f, g, t] = 100f + 10g + t`.
 *
 * An Ecotracer run reports failure when `env_decay_rate` is negative.
 */
export class MemoryEngine implements EngineSession {
  readonly calls: Array<EngineCall> = []
  readonly forcingShapes: Array<{ readonly name: string; readonly values: ReadonlyArray<number> }> = []
  readonly ecosim = new MemorySubsystem("ecosim", this)
  readonly ecotracer = new MemorySubsystem("ecotracer", this)
  loaded = false
  years = 0
  path = ""
  private model: MemoryModel = makeBayModel()
  private results = new Map<string, DenseArray>()
  private ecosimRan = false
  private ecotracerRan = false

  loadModel(path: string): boolean {
    this.calls.push({ subsystem: "engine", method: "loadModel" })
    try {
      this.model = readModelFile(path)
    } catch {
      return false
    }
    this.path = path
    this.loaded = true
    this.years = this.model.years
    this.ecosim.scenarios = [...this.model.ecosimScenarios]
    this.ecotracer.scenarios = [...this.model.ecotracerScenarios]
    this.ecosim.values = new Map()
    this.ecotracer.values = new Map()
    this.ecosim.active = 0
    this.ecotracer.active = 0
    this.results = new Map()
    this.ecosimRan = false
    this.ecotracerRan = false
    return true
  }

  closeModel(): boolean {
    this.calls.push({ subsystem: "engine", method: "closeModel" })
    if (!this.loaded) return false
    this.loaded = false
    return true
  }

  persist(): void {
    this.model = {
      ...this.model,
      ecosimScenarios: [...this.ecosim.scenarios],
      ecotracerScenarios: [...this.ecotracer.scenarios],
    }
    writeFileSync(this.path, JSON.stringify(this.model))
  }

  state(): EngineStateSnapshot {
    return new EngineStateSnapshot({
      ecopathLoaded: this.loaded,
      ecopathRan: this.loaded && this.model.balanced,
      ecosimLoaded: this.loaded,
      ecosimRan: this.ecosimRan,
      ecotracerLoaded: this.loaded,
      ecotracerRan: this.ecotracerRan,
      busy: false,
    })
  }

  isBalanced(): boolean {
    return this.model.balanced
  }

  groupNames(): ReadonlyArray<string> {
    return this.model.groups.map((group) => group.name)
  }

  fleetNames(): ReadonlyArray<string> {
    return this.model.fleets
  }

  consumerCount(): number {
    return this.model.groups.filter((group) => group.consumer).length
  }

  producerCount(): number {
    return this.model.groups.filter((group) => group.producer).length
  }

  country(): string {
    return this.model.country
  }

  firstYear(): number {
    return this.model.firstYear
  }

  simulationYears(): number {
    return this.years
  }

  setSimulationYears(years: number): boolean {
    if (!this.loaded || years < 1) return false
    this.years = years
    return true
  }

  addForcingShape(name: string, values: ReadonlyArray<number>): number {
    this.forcingShapes.push({ name, values })
    return this.forcingShapes.length
  }

  resultArray(source: ResultSource, name: string): DenseArray | undefined {
    return this.results.get(`${source}/${name}`)
  }

  private store(source: ResultSource, name: string, shape: ReadonlyArray<number>, data: Float64Array) {
    this.results.set(`${source}/${name}`, { shape, data })
  }

  runEcosim(): boolean {
    if (!this.loaded) return false
    const n = this.model.groups.length
    const fleets = this.model.fleets.length
    const months = this.years * 12
    const width = months + 1
    const stats = new Float64Array(15 * (n + 1) * width).fill(-1)
    for (let k = 0; k < 15; k++) {
      for (let g = 1; g <= n; g++) {
        const q = this.ecosim.values.get(groupKey("density_dep_catchability", g)) ?? 0
        for (let t = 1; t <= months; t++) {
          stats[(k * (n + 1) + g) * width + t] = 1000 * k + 10 * g + t + q
        }
      }
    }
    this.store("ecosim", "ResultsOverTime", [15, n + 1, width], stats)
    for (const [name, base] of ecosystemArrays) {
      const series = new Float64Array(width).fill(-1)
      for (let t = 1; t <= months; t++) series[t] = 100 * base + t
      this.store("ecosim", name, [width], series)
    }
    const catches = new Float64Array((fleets + 1) * (n + 1) * width).fill(-1)
    for (let f = 1; f <= fleets; f++) {
      for (let g = 1; g <= n; g++) {
        for (let t = 1; t <= months; t++) {
          catches[(f * (n + 1) + g) * width + t] = 100 * f + 10 * g + t
        }
      }
    }
    this.store("ecosim", "ResultsSumCatchByGroupGear", [fleets + 1, n + 1, width], catches)
    this.ecosimRan = true
    return true
  }

  runEcotracer(): boolean {
    if (!this.runEcosim()) return false
    const n = this.model.groups.length
    const months = this.years * 12
    const width = months + 1
    const concentration = new Float64Array((n + 2) * width).fill(-1)
    const biomass = new Float64Array((n + 2) * width).fill(-1)
    for (let r = 0; r <= n; r++) {
      const c0 =
        r === 0
          ? this.ecotracer.getScalar("initial_env_concentration")
          : (this.ecotracer.values.get(groupKey("initial_concentrations", r)) ?? 0)
      for (let t = 1; t <= months; t++) {
        concentration[r * width + t] = c0 + t
        biomass[r * width + t] = 2 * (c0 + t)
      }
    }
    this.store("ecotracer", "TracerConc", [n + 2, width], concentration)
    this.store("ecotracer", "TracerCB", [n + 2, width], biomass)
    this.ecotracerRan = true
    return this.ecotracer.getScalar("env_decay_rate") >= 0
  }
}

/**
 * A driver that keeps every engine it creates.
 */
export const makeMemoryDriver = (): EngineDriver & { readonly engines: Array<MemoryEngine> } => {
  const engines: Array<MemoryEngine> = []
  return {
    name: "memory",
    engines,
    create: () => {
      const engine = new MemoryEngine()
      engines.push(engine)
      return engine
    },
  }
}

/**
 * A fresh engine with a model loaded from a temporary file.
 */
export const loadMemoryEngine = (model: MemoryModel = makeBayModel()): MemoryEngine => {
  const engine = new MemoryEngine()
  engine.loadModel(writeModelFile(model))
  return engine
}

// =============================================================================
// Logging
// =============================================================================

export interface CapturedLog {
  readonly level: LogLevel.LogLevel
  readonly message: string
}

/**
 * A logger layer that records messages instead of printing them.
 */
export const captureLogs = (): { readonly logs: Array<CapturedLog>; readonly layer: Layer.Layer<never> } => {
  const logs: Array<CapturedLog> = []
  const logger = Logger.make(({ logLevel, message }) => {
    logs.push({ level: logLevel, message: Array.isArray(message) ? message.join(" ") : String(message) })
  })
  return {
    logs,
    layer: Layer.merge(Logger.replace(Logger.defaultLogger, logger), Logger.minimumLogLevel(LogLevel.All)),
  }
}

export const warnings = (logs: ReadonlyArray<CapturedLog>): Array<string> =>
  logs.filter((log) => log.level._tag === "Warning").map((log) => log.message)
