import { describe, expect, it } from "@effect/vitest"
import { Effect, Either } from "effect"
import * as FastCheck from "effect/FastCheck"
import { ParameterCompositor } from "../src/Compositor.js"
import { EcosimDefinition, EcotracerDefinition, ParameterManager } from "../src/Parameters.js"
import { ScenarioTable } from "../src/ScenarioTable.js"

const groupNamesArbitrary = FastCheck.uniqueArray(FastCheck.stringMatching(/^[A-Z][a-z]{1,8}$/), {
  minLength: 1,
  maxLength: 120,
})

describe("parameter catalog properties", () => {
  it("registers six group parameters per group plus five environment parameters", () => {
    FastCheck.assert(
      FastCheck.property(groupNamesArbitrary, (groups) => {
        const manager = new ParameterManager(EcotracerDefinition, groups)
        expect(manager.size).toBe(groups.length * 6 + 5)
        expect(manager.environmentParameterNames()).toHaveLength(5)
      }),
      { numRuns: 50 },
    )
  })

  it("registers a vulnerability per prey and consumer", () => {
    FastCheck.assert(
      FastCheck.property(
        groupNamesArbitrary.chain((groups) =>
          FastCheck.tuple(FastCheck.constant(groups), FastCheck.integer({ min: 0, max: groups.length })),
        ),
        ([groups, consumers]) => {
          const manager = new ParameterManager(EcosimDefinition, groups, consumers)
          expect(manager.pairParameterNames()).toHaveLength(groups.length * consumers)
          expect(manager.size).toBe(groups.length * (8 + consumers))
        },
      ),
      { numRuns: 50 },
    )
  })

  it("rejects a batch with an unknown name without assigning any of it", () => {
    FastCheck.assert(
      FastCheck.property(groupNamesArbitrary, FastCheck.double({ noNaN: true, noDefaultInfinity: true }), (groups, value) => {
        const compositor = new ParameterCompositor([
          new ParameterManager(EcotracerDefinition, groups),
          new ParameterManager(EcosimDefinition, groups, 1),
        ])
        const all = compositor.managers.flatMap((manager) => manager.allParameterNames())
        const known = all.slice(0, 3)
        const names = [...known, "not_a_parameter"]
        const result = Effect.runSync(Effect.either(compositor.setConstant(names, names.map(() => value))))
        expect(Either.isLeft(result)).toBe(true)
        expect(compositor.unsetParameterNames()).toHaveLength(all.length)
      }),
      { numRuns: 50 },
    )
  })
})

describe("scenario table properties", () => {
  it("returns each row it was built from", () => {
    FastCheck.assert(
      FastCheck.property(
        FastCheck.array(FastCheck.tuple(FastCheck.integer({ min: 1, max: 5 }), FastCheck.double({ noNaN: true, noDefaultInfinity: true })), {
          maxLength: 30,
        }),
        (steps) => {
          let id = 0
          const rows = steps.map(([step, value]) => {
            id += step
            return [id, value]
          })
          const table = Effect.runSync(ScenarioTable.fromRows(["scenario", "env_init_c"], rows))
          expect(table.size).toBe(rows.length)
          rows.forEach((row, i) => expect(Effect.runSync(table.row(i))).toEqual(row))
        },
      ),
      { numRuns: 50 },
    )
  })
})
