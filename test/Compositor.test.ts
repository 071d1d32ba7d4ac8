import { afterAll, describe, expect, it } from "@effect/vitest"
import { Effect, Schema } from "effect"
import { CompositorSnapshot, ParameterCompositor } from "../src/Compositor.js"
import { EcotracerDefinition, type ManagerDefinition } from "../src/Parameters.js"
import { loadMemoryEngine, removeModelFiles } from "./fixtures.js"

afterAll(removeModelFiles)

describe("ParameterCompositor", () => {
  it("builds an Ecotracer and an Ecosim manager by default", () => {
    const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
    expect(compositor.managers.map((manager) => manager.subsystem)).toEqual(["ecotracer", "ecosim"])
    expect(compositor.manager("ecotracer")?.size).toBe(29)
    expect(compositor.manager("ecosim")?.size).toBe(8 * 4 + 4 * 2)
    expect(compositor.unsetParameterNames()).toHaveLength(29 + 40)
  })

  it.effect("rejects a batch holding an unknown name without assigning anything", () =>
    Effect.gen(function* () {
      const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
      const error = yield* Effect.flip(compositor.setConstant(["env_decay_r", "bogus"], [1, 2]))
      expect(error.message).toBe("Unrecognised parameters: bogus")
      expect(compositor.manager("ecotracer")?.get("env_decay_r")?.isSet).toBe(false)
    }),
  )

  it.effect("rejects mismatched lengths", () =>
    Effect.gen(function* () {
      const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
      const error = yield* Effect.flip(compositor.setVariable(["env_decay_r"], []))
      expect(error.message).toBe("Got 1 parameter names but 0 columns")
    }),
  )

  it.effect("routes each name to the manager that owns it", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const compositor = ParameterCompositor.fromSession(engine)
      yield* compositor.setConstant(["env_decay_r", "qbmax_qbio_1_Baleen Whale"], [0.05, 1.8])
      yield* compositor.applyConstants(engine)

      expect(engine.ecotracer.getScalar("env_decay_rate")).toBe(0.05)
      expect(engine.ecosim.getGroupValues("qbmax_qbio")).toEqual([1.8, 0, 0, 0])
      expect(compositor.unsetParameterNames()).toHaveLength(67)
    }),
  )

  it.effect("applies variables of both subsystems from one row", () =>
    Effect.gen(function* () {
      const engine = loadMemoryEngine()
      const compositor = ParameterCompositor.fromSession(engine)
      yield* compositor.setVariable(["init_c_1_Baleen Whale", "density_dep_catchability_2_Mackerel"], [1, 2])
      yield* compositor.applyVariables(engine, [1, 0.4, 3])

      expect(engine.ecotracer.getGroupValues("initial_concentrations")).toEqual([0.4, 0, 0, 0])
      expect(engine.ecosim.getGroupValues("density_dep_catchability")).toEqual([0, 3, 0, 0])

      yield* compositor.clearVariables()
      expect(compositor.unsetParameterNames()).toHaveLength(69)
    }),
  )

  describe("availableParameterNames", () => {
    it.effect("lists environment parameters", () =>
      Effect.gen(function* () {
        const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
        const names = yield* compositor.availableParameterNames({ kinds: ["environment"] })
        expect(names).toEqual([
          "base_vol_ex_loss",
          "env_base_inflow_r",
          "env_decay_r",
          "env_inflow_forcing_idx",
          "env_init_c",
        ])
      }),
    )

    it.effect("filters group parameters by prefix and group across managers", () =>
      Effect.gen(function* () {
        const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
        const names = yield* compositor.availableParameterNames({
          kinds: ["group"],
          prefixes: ["init_c", "switching_power"],
          groups: [2],
        })
        expect(names).toEqual(["init_c_2_Mackerel", "switching_power_2_Mackerel"])
      }),
    )

    it.effect("matches pairs on either prey or predator", () =>
      Effect.gen(function* () {
        const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
        const names = yield* compositor.availableParameterNames({
          kinds: ["pair"],
          prefixes: ["vuln"],
          groups: ["Mackerel"],
        })
        expect(names).toEqual([
          "vuln_1_Baleen Whale_2_Mackerel",
          "vuln_2_Mackerel_1_Baleen Whale",
          "vuln_2_Mackerel_2_Mackerel",
          "vuln_3_Phytoplankton_2_Mackerel",
          "vuln_4_Detritus_2_Mackerel",
        ])
      }),
    )

    it.effect("restricts to the requested subsystems", () =>
      Effect.gen(function* () {
        const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
        const names = yield* compositor.availableParameterNames({ subsystems: ["ecosim"], groups: ["Detritus"] })
        expect(names).toHaveLength(8 + 2)
        expect(names.every((name) => name.includes("Detritus"))).toBe(true)
      }),
    )

    it.effect("rejects unknown prefixes", () =>
      Effect.gen(function* () {
        const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
        const error = yield* Effect.flip(compositor.availableParameterNames({ prefixes: ["init_c", "nope"] }))
        expect(error.message).toBe("Invalid parameter prefix: nope")
      }),
    )
  })

  it.effect("survives a snapshot round trip through its encoded form", () =>
    Effect.gen(function* () {
      const compositor = ParameterCompositor.fromSession(loadMemoryEngine())
      yield* compositor.setConstant(["env_decay_r", "vuln_3_Phytoplankton_1_Baleen Whale"], [0.1, 2])
      yield* compositor.setVariable(["init_c_4_Detritus"], [1])

      const encoded = Schema.encodeSync(CompositorSnapshot)(compositor.snapshot())
      const decoded = yield* Schema.decodeUnknown(CompositorSnapshot)(JSON.parse(JSON.stringify(encoded)))
      const restored = yield* ParameterCompositor.fromSnapshot(loadMemoryEngine(), decoded)

      expect(restored.snapshot()).toEqual(compositor.snapshot())
      expect(restored.manager("ecosim")?.get("vuln_3_Phytoplankton_1_Baleen Whale")?.mode).toMatchObject({
        _tag: "Constant",
        value: 2,
      })
    }),
  )

  it.effect("rebuilds custom manager definitions from a snapshot", () =>
    Effect.gen(function* () {
      const renamed: ManagerDefinition = {
        ...EcotracerDefinition,
        groupParameters: [],
        environmentParameters: [{ name: "contam_init", field: "initial_env_concentration" }],
      }
      const compositor = ParameterCompositor.fromSession(loadMemoryEngine(), [renamed])
      yield* compositor.setVariable(["contam_init"], [1])

      const encoded = Schema.encodeSync(CompositorSnapshot)(compositor.snapshot())
      const decoded = yield* Schema.decodeUnknown(CompositorSnapshot)(JSON.parse(JSON.stringify(encoded)))
      const engine = loadMemoryEngine()
      const restored = yield* ParameterCompositor.fromSnapshot(engine, decoded)

      expect(restored.managers.flatMap((manager) => manager.allParameterNames())).toEqual(["contam_init"])
      yield* restored.applyVariables(engine, [1, 4])
      expect(engine.ecotracer.getScalar("initial_env_concentration")).toBe(4)
    }),
  )
})
