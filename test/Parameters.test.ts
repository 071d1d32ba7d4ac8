import { afterAll, describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import {
  EcosimDefinition,
  EcotracerDefinition,
  formatParameterNames,
  groupParameterName,
  indexWidth,
  pairParameterName,
  ParameterManager,
} from "../src/Parameters.js"
import { loadMemoryEngine, removeModelFiles } from "./fixtures.js"

const groups = ["Detritus", "Phytoplankton", "Mackerel", "Baleen Whale"]

afterAll(removeModelFiles)

describe("parameter naming", () => {
  it("pads group indices to the width of the group count", () => {
    expect(indexWidth(4)).toBe(1)
    expect(indexWidth(100)).toBe(3)
    expect(groupParameterName("init_c", 3, 4, "Mackerel")).toBe("init_c_3_Mackerel")
    expect(groupParameterName("init_c", 3, 100, "Mackerel")).toBe("init_c_003_Mackerel")
  })

  it("names pairs after prey then predator", () => {
    expect(pairParameterName("vuln", 3, 1, ["Baleen Whale", "Mackerel", "Phytoplankton"])).toBe(
      "vuln_3_Phytoplankton_1_Baleen Whale",
    )
  })

  it.effect("maps editor labels and group names to catalog names", () =>
    Effect.gen(function* () {
      const names = yield* formatParameterNames(
        ["Initial conc. (t/t)", "Physical decay rate"],
        ["Mackerel", "Detritus"],
        groups,
      )
      expect(names).toEqual(["init_c_3_Mackerel", "phys_decay_r_1_Detritus"])
    }),
  )

  it.effect("rejects unknown labels and groups", () =>
    Effect.gen(function* () {
      const label = yield* Effect.flip(formatParameterNames(["Colour"], ["Mackerel"], groups))
      expect(label._tag).toBe("ConfigurationError")
      expect(label.message).toBe("Unrecognised parameter labels: Colour")

      const group = yield* Effect.flip(formatParameterNames(["Initial conc. (t/t)"], ["Cod"], groups))
      expect(group._tag).toBe("ScenarioLookupError")
      expect(group.message).toBe('Unable to find group named "Cod"')

      const lengths = yield* Effect.flip(formatParameterNames(["Initial conc. (t/t)"], [], groups))
      expect(lengths.message).toBe("Got 1 parameter labels but 0 groups")
    }),
  )
})

describe("ParameterManager catalog", () => {
  it.effect("sorts group parameter names in group index order", () =>
    Effect.gen(function* () {
      const names = Array.from({ length: 12 }, (_, i) => `Group ${String.fromCharCode(90 - i)}`)
      const manager = new ParameterManager(EcotracerDefinition, names)
      const byIndex = names.map((name, i) => groupParameterName("init_c", i + 1, names.length, name))
      expect(byIndex[9]).toBe("init_c_10_Group Q")
      expect(yield* manager.groupParameterNames({ prefixes: ["init_c"] })).toEqual(byIndex)
      expect([...byIndex].sort()).toEqual(byIndex)
    }),
  )

  it("registers one parameter per prefix and group plus the environment scalars", () => {
    const manager = new ParameterManager(EcotracerDefinition, groups)
    expect(manager.size).toBe(6 * 4 + 5)
    expect(manager.has("init_c_1_Detritus")).toBe(true)
    expect(manager.has("excretion_r_4_Baleen Whale")).toBe(true)
    expect(manager.has("env_decay_r")).toBe(true)
    expect(manager.get("env_decay_r")?.isEnvironment).toBe(true)
    expect(manager.get("init_c_1_Detritus")?.isSet).toBe(false)
  })

  it("zero-pads names in large models", () => {
    const many = Array.from({ length: 100 }, (_, i) => `G${i + 1}`)
    const manager = new ParameterManager(EcotracerDefinition, many)
    expect(manager.has("init_c_003_G3")).toBe(true)
    expect(manager.has("init_c_100_G100")).toBe(true)
    expect(manager.has("init_c_3_G3")).toBe(false)
  })

  it("registers a vulnerability for every prey and consumer predator", () => {
    const manager = new ParameterManager(EcosimDefinition, ["Baleen Whale", "Mackerel", "Phytoplankton"], 2)
    expect(manager.pairParameterNames()).toEqual([
      "vuln_1_Baleen Whale_1_Baleen Whale",
      "vuln_1_Baleen Whale_2_Mackerel",
      "vuln_2_Mackerel_1_Baleen Whale",
      "vuln_2_Mackerel_2_Mackerel",
      "vuln_3_Phytoplankton_1_Baleen Whale",
      "vuln_3_Phytoplankton_2_Mackerel",
    ])
    expect(manager.size).toBe(8 * 3 + 6)
  })

  it.effect("selects group parameter names by prefix and group", () =>
    Effect.gen(function* () {
      const manager = new ParameterManager(EcotracerDefinition, groups)
      const names = yield* manager.groupParameterNames({ prefixes: ["init_c"], groups: ["Mackerel", 4] })
      expect(names).toEqual(["init_c_3_Mackerel", "init_c_4_Baleen Whale"])

      const prefix = yield* Effect.flip(manager.groupParameterNames({ prefixes: ["nope"] }))
      expect(prefix.message).toBe("Invalid parameter prefix: nope")

      const index = yield* Effect.flip(manager.groupParameterNames({ groups: [9] }))
      expect(index.message).toBe("Given group index 9 but there are 4")
    }),
  )
})

describe("ParameterManager assignment", () => {
  it.effect("reports names it does not know", () =>
    Effect.gen(function* () {
      const manager = new ParameterManager(EcotracerDefinition, groups)
      const unknown = yield* manager.setConstant(["init_c_1_Detritus", "vuln_x"], [0.5, 1])
      expect([...unknown]).toEqual(["vuln_x"])
      expect(manager.get("init_c_1_Detritus")?.mode).toMatchObject({ _tag: "Constant", value: 0.5 })
      expect(manager.unsetParameterNames()).toHaveLength(manager.size - 1)
    }),
  )

  it.effect("rejects mismatched lengths and bad columns", () =>
    Effect.gen(function* () {
      const manager = new ParameterManager(EcotracerDefinition, groups)
      const lengths = yield* Effect.flip(manager.setConstant(["env_decay_r"], [1, 2]))
      expect(lengths.message).toBe("Got 1 parameter names but 2 values")
      const column = yield* Effect.flip(manager.setVariable(["env_decay_r"], [0]))
      expect(column.message).toBe("Variable columns must be integers of at least 1: 0")
    }),
  )

  it.effect("writes constants with one call per category", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = ParameterManager.fromSession(engine, EcotracerDefinition)
      yield* manager.setConstant(
        ["init_c_1_Baleen Whale", "init_c_3_Phytoplankton", "phys_decay_r_2_Mackerel", "env_decay_r"],
        [0.5, 0.25, 0.1, 0.02],
      )
      yield* manager.applyConstants(engine)

      expect(engine.calls.filter((call) => call.subsystem !== "engine")).toEqual([
        {
          subsystem: "ecotracer",
          method: "setGroupValues",
          field: "initial_concentrations",
          count: 2,
          values: [0.5, 0.25],
          indices: [1, 3],
        },
        {
          subsystem: "ecotracer",
          method: "setGroupValues",
          field: "physical_decay_rates",
          count: 1,
          values: [0.1],
          indices: [2],
        },
        { subsystem: "ecotracer", method: "setScalar", field: "env_decay_rate", count: 1, values: [0.02] },
      ])
      expect(engine.ecotracer.getGroupValues("initial_concentrations")).toEqual([0.5, 0, 0.25, 0])
      expect(engine.ecotracer.getScalar("env_decay_rate")).toBe(0.02)
    }),
  )

  it.effect("writes variables from absolute row columns", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = ParameterManager.fromSession(engine, EcotracerDefinition)
      yield* manager.setVariable(["init_c_2_Mackerel", "env_init_c"], [1, 2])
      yield* manager.applyVariables(engine, [7, 0.3, 0.9])

      expect(engine.ecotracer.getGroupValues("initial_concentrations")).toEqual([0, 0.3, 0, 0])
      expect(engine.ecotracer.getScalar("initial_env_concentration")).toBe(0.9)

      const short = yield* Effect.flip(manager.applyVariables(engine, [7, 0.3]))
      expect(short.message).toBe("Scenario row has 2 values but column 2 is mapped")
    }),
  )

  it.effect("rebuilds the variable plan when the mapping changes", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = ParameterManager.fromSession(engine, EcotracerDefinition)
      yield* manager.setVariable(["init_c_1_Baleen Whale"], [1])
      yield* manager.applyVariables(engine, [1, 5])
      yield* manager.clearVariables()
      yield* manager.setVariable(["init_c_4_Detritus"], [1])
      yield* manager.applyVariables(engine, [2, 6])

      expect(engine.ecotracer.getGroupValues("initial_concentrations")).toEqual([5, 0, 0, 6])
      expect(manager.get("init_c_1_Baleen Whale")?.isSet).toBe(false)
    }),
  )

  it.effect("writes two group constants as one call at their group indices", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = new ParameterManager(EcotracerDefinition, groups)
      yield* manager.setConstant(["init_c_1_Detritus", "init_c_3_Mackerel"], [0.1, 0.3])
      yield* manager.applyConstants(engine)

      expect(engine.calls.filter((call) => call.subsystem !== "engine")).toEqual([
        {
          subsystem: "ecotracer",
          method: "setGroupValues",
          field: "initial_concentrations",
          count: 2,
          values: [0.1, 0.3],
          indices: [1, 3],
        },
      ])
    }),
  )

  it.effect("keeps nothing from an earlier row when applying the next", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = ParameterManager.fromSession(engine, EcotracerDefinition)
      yield* manager.setVariable(["init_c_1_Baleen Whale", "init_c_2_Mackerel", "env_init_c"], [1, 2, 3])
      const rows = [
        [1, 4, 5, 6],
        [2, 0, 0, 0],
        [3, 7, 0, 8],
      ]
      for (const row of rows) {
        yield* manager.applyVariables(engine, row)
        expect(engine.ecotracer.getGroupValues("initial_concentrations")).toEqual([row[1], row[2], 0, 0])
        expect(engine.ecotracer.getScalar("initial_env_concentration")).toBe(row[3])
      }
      const writes = engine.calls.filter((call) => call.subsystem === "ecotracer")
      expect(writes.map((call) => call.values)).toEqual([[4, 5], [6], [0, 0], [0], [7, 0], [8]])
    }),
  )

  it.effect("writes pair constants in one batched call", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const manager = ParameterManager.fromSession(engine, EcosimDefinition)
      yield* manager.setConstant(
        ["vuln_3_Phytoplankton_1_Baleen Whale", "vuln_4_Detritus_2_Mackerel"],
        [2.5, 1.5],
      )
      yield* manager.applyConstants(engine)

      expect(engine.calls.filter((call) => call.subsystem === "ecosim")).toEqual([
        {
          subsystem: "ecosim",
          method: "setPairValues",
          field: "vulnerabilities",
          count: 2,
          values: [2.5, 1.5],
          indices: [3, 4],
          predators: [1, 2],
        },
      ])
      expect(engine.ecosim.getPairValue("vulnerabilities", 3, 1)).toBe(2.5)
      expect(engine.ecosim.getPairValue("vulnerabilities", 4, 2)).toBe(1.5)
    }),
  )

  it.effect("restores assignments into a fresh manager", () =>
    Effect.gen(function* () {
      const manager = new ParameterManager(EcotracerDefinition, groups)
      yield* manager.setConstant(["env_decay_r"], [0.1])
      yield* manager.setVariable(["init_c_3_Mackerel"], [1])

      const copy = new ParameterManager(EcotracerDefinition, groups)
      yield* copy.restore(manager.assignments())
      expect(copy.assignments()).toEqual(manager.assignments())

      const error = yield* Effect.flip(copy.restore([{ _tag: "Constant", name: "nope", value: 1 }]))
      expect(error.message).toBe('Unable to find parameter named "nope"')
    }),
  )
})
