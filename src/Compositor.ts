/**
 * Parameter compositor.
 *
 * Combines the per-subsystem {@link ParameterManager}s of a model behind one
 * name space. Names are validated against every manager before anything is
 * assigned, so a batch holding one unknown name changes nothing.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import type { EngineSession } from "./Engine.js"
import { ConfigurationError, type IndexOutOfRangeError, type ScenarioLookupError } from "./Errors.js"
import {
  definitions,
  ManagerDefinition,
  ParameterAssignment,
  type ParameterKind,
  ParameterManager,
} from "./Parameters.js"
import { Subsystem } from "./Types.js"

/**
 * Filter for {@link ParameterCompositor.availableParameterNames}. Omitted
 * fields match everything.
 *
 * @category Compositor
 * @since 0.1.0
 */
export interface ParameterNameFilter {
  readonly subsystems?: ReadonlyArray<Subsystem>
  readonly kinds?: ReadonlyArray<ParameterKind>
  readonly prefixes?: ReadonlyArray<string>
  readonly groups?: ReadonlyArray<string | number>
}

/**
 * Value copy of a compositor's manager definitions and assignments, safe to
 * post to a worker.
 *
 * @category Schemas
 * @since 0.1.0
 */
export class CompositorSnapshot extends Schema.Class<CompositorSnapshot>("CompositorSnapshot")({
  managers: Schema.Array(
    Schema.Struct({
      definition: ManagerDefinition,
      assignments: Schema.Array(ParameterAssignment),
    }),
  ),
}) {}

/**
 * @category Compositor
 * @since 0.1.0
 */
export class ParameterCompositor {
  constructor(readonly managers: ReadonlyArray<ParameterManager>) {}

  /**
   * Managers for the given definitions of the model loaded in a session.
   * Defaults to Ecotracer then Ecosim.
   */
  static fromSession(
    session: EngineSession,
    managerDefinitions: ReadonlyArray<ManagerDefinition> = [definitions.ecotracer, definitions.ecosim],
  ): ParameterCompositor {
    return new ParameterCompositor(
      managerDefinitions.map((definition) => ParameterManager.fromSession(session, definition)),
    )
  }

  /**
   * Rebuild a compositor in another session from a snapshot.
   */
  static fromSnapshot(
    session: EngineSession,
    snapshot: CompositorSnapshot,
  ): Effect.Effect<ParameterCompositor, ScenarioLookupError> {
    return Effect.gen(function* () {
      const managers: Array<ParameterManager> = []
      for (const entry of snapshot.managers) {
        const manager = ParameterManager.fromSession(session, entry.definition)
        yield* manager.restore(entry.assignments)
        managers.push(manager)
      }
      return new ParameterCompositor(managers)
    })
  }

  snapshot(): CompositorSnapshot {
    return new CompositorSnapshot({
      managers: this.managers.map((manager) => ({
        definition: manager.definition,
        assignments: manager.assignments(),
      })),
    })
  }

  manager(subsystem: Subsystem): ParameterManager | undefined {
    return this.managers.find((manager) => manager.subsystem === subsystem)
  }

  has(name: string): boolean {
    return this.managers.some((manager) => manager.has(name))
  }

  /**
   * Fail when any name is unknown to every manager.
   */
  validateNames(names: ReadonlyArray<string>): Effect.Effect<void, ConfigurationError> {
    const unknown = [...new Set(names.filter((name) => !this.has(name)))]
    return unknown.length > 0
      ? Effect.fail(new ConfigurationError({ reason: "Unrecognised parameters", names: unknown }))
      : Effect.void
  }

  private broadcast(
    names: ReadonlyArray<string>,
    assign: (manager: ParameterManager) => Effect.Effect<ReadonlySet<string>, ConfigurationError>,
  ): Effect.Effect<void, ConfigurationError> {
    return Effect.gen(this, function* () {
      yield* this.validateNames(names)
      let unrecognised: ReadonlySet<string> = new Set(names)
      for (const manager of this.managers) {
        const missed = yield* assign(manager)
        unrecognised = new Set([...unrecognised].filter((name) => missed.has(name)))
      }
      if (unrecognised.size > 0) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: "Unrecognised parameters", names: [...unrecognised] }),
        )
      }
    })
  }

  setConstant(
    names: ReadonlyArray<string>,
    values: ReadonlyArray<number>,
  ): Effect.Effect<void, ConfigurationError> {
    return names.length !== values.length
      ? Effect.fail(
          new ConfigurationError({
            reason: `Got ${names.length} parameter names but ${values.length} values`,
          }),
        )
      : this.broadcast(names, (manager) => manager.setConstant(names, values))
  }

  setVariable(
    names: ReadonlyArray<string>,
    columns: ReadonlyArray<number>,
  ): Effect.Effect<void, ConfigurationError> {
    return names.length !== columns.length
      ? Effect.fail(
          new ConfigurationError({
            reason: `Got ${names.length} parameter names but ${columns.length} columns`,
          }),
        )
      : this.broadcast(names, (manager) => manager.setVariable(names, columns))
  }

  /**
   * Return every variable parameter to unset, ahead of mapping a new table.
   */
  clearVariables(): Effect.Effect<void> {
    return Effect.forEach(this.managers, (manager) => manager.clearVariables(), { discard: true })
  }

  applyConstants(session: EngineSession): Effect.Effect<void> {
    return Effect.forEach(this.managers, (manager) => manager.applyConstants(session), {
      discard: true,
    })
  }

  applyVariables(
    session: EngineSession,
    row: ReadonlyArray<number>,
  ): Effect.Effect<void, ConfigurationError> {
    return Effect.forEach(this.managers, (manager) => manager.applyVariables(session, row), {
      discard: true,
    })
  }

  unsetParameterNames(): Array<string> {
    return this.managers.flatMap((manager) => manager.unsetParameterNames())
  }

  /**
   * Sorted, de-duplicated parameter names matching a filter. Prefixes and
   * groups only narrow group and pair parameters; environment scalars are
   * kept when their kind is selected.
   */
  availableParameterNames(
    filter: ParameterNameFilter = {},
  ): Effect.Effect<Array<string>, ConfigurationError | ScenarioLookupError | IndexOutOfRangeError> {
    return Effect.gen(this, function* () {
      const managers = this.managers.filter(
        (manager) => filter.subsystems === undefined || filter.subsystems.includes(manager.subsystem),
      )
      const kinds: ReadonlyArray<ParameterKind> = filter.kinds ?? ["group", "environment", "pair"]
      if (filter.prefixes !== undefined) {
        const known = new Set(
          managers.flatMap((manager) => [
            ...manager.groupPrefixes,
            ...manager.definition.pairParameters.map((entry) => entry.prefix),
          ]),
        )
        const unknown = filter.prefixes.filter((prefix) => !known.has(prefix))
        if (unknown.length > 0) {
          return yield* Effect.fail(
            new ConfigurationError({ reason: "Invalid parameter prefix", names: unknown }),
          )
        }
      }
      const names = new Set<string>()
      for (const manager of managers) {
        if (kinds.includes("group")) {
          const prefixes = filter.prefixes?.filter((prefix) => manager.groupPrefixes.includes(prefix))
          if (prefixes === undefined || prefixes.length > 0) {
            const selected = yield* manager.groupParameterNames({ prefixes, groups: filter.groups })
            selected.forEach((name) => names.add(name))
          }
        }
        if (kinds.includes("environment")) {
          manager.environmentParameterNames().forEach((name) => names.add(name))
        }
        if (kinds.includes("pair")) {
          const groups =
            filter.groups === undefined ? undefined : new Set(yield* manager.resolveGroups(filter.groups))
          for (const parameter of manager.parametersOfKind("pair")) {
            const target = parameter.target
            if (target._tag !== "Pair") continue
            const prefix = manager.prefixOf(parameter)
            if (filter.prefixes !== undefined && (prefix === undefined || !filter.prefixes.includes(prefix))) {
              continue
            }
            if (groups !== undefined && !groups.has(target.prey) && !groups.has(target.predator)) continue
            names.add(parameter.name)
          }
        }
      }
      return [...names].sort()
    })
  }
}
