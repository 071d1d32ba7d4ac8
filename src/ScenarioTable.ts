/**
 * Scenario tables.
 *
 * A table is a rectangular block of numbers whose first column, `scenario`,
 * holds ascending integer ids and whose remaining columns are parameter names.
 * Tables are immutable once built and are validated before any engine call.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import { ConfigurationError, IndexOutOfRangeError } from "./Errors.js"

/**
 * Name of the mandatory leading column.
 *
 * @category Constants
 * @since 0.1.0
 */
export const SCENARIO_COLUMN = "scenario"

/**
 * @category Scenario Tables
 * @since 0.1.0
 */
export class ScenarioTable extends Schema.Class<ScenarioTable>("ScenarioTable")({
  columns: Schema.NonEmptyArray(Schema.String),
  rows: Schema.Array(Schema.Array(Schema.Number)),
}) {
  /**
   * Validate and build a table from column names and rows.
   *
   * @example
   * ```ts
   * const table = yield* ScenarioTable.fromRows(
   *   ["scenario", "init_c_1_Detritus", "env_decay_r"],
   *   [[1, 0.1, 0.01], [2, 0.2, 0.02]],
   * )
   * ```
   */
  static fromRows(
    columns: ReadonlyArray<string>,
    rows: ReadonlyArray<ReadonlyArray<number>>,
  ): Effect.Effect<ScenarioTable, ConfigurationError> {
    return Effect.gen(function* () {
      const [first, ...rest] = columns
      if (first !== SCENARIO_COLUMN) {
        return yield* Effect.fail(
          new ConfigurationError({
            reason: `The first scenario table column must be "${SCENARIO_COLUMN}"`,
            names: first === undefined ? [] : [first],
          }),
        )
      }
      const seen = new Set<string>()
      const duplicates = new Set<string>()
      for (const column of columns) {
        if (seen.has(column)) duplicates.add(column)
        seen.add(column)
      }
      if (duplicates.size > 0) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: "Duplicate scenario table columns", names: [...duplicates] }),
        )
      }
      let previous = Number.NEGATIVE_INFINITY
      for (const [index, row] of rows.entries()) {
        if (row.length !== columns.length) {
          return yield* Effect.fail(
            new ConfigurationError({
              reason: `Scenario row ${index} has ${row.length} values but the table has ${columns.length} columns`,
            }),
          )
        }
        const id = row[0]
        if (!Number.isInteger(id) || id <= previous) {
          return yield* Effect.fail(
            new ConfigurationError({
              reason: `Scenario ids must be ascending integers, got ${id} after ${previous}`,
            }),
          )
        }
        previous = id
      }
      return new ScenarioTable({
        columns: [first, ...rest],
        rows: rows.map((row) => [...row]),
      })
    })
  }

  /**
   * Build a table from records keyed by column name. Column order follows the
   * first record.
   */
  static fromRecords(
    records: ReadonlyArray<Readonly<Record<string, number>>>,
  ): Effect.Effect<ScenarioTable, ConfigurationError> {
    return Effect.suspend(() => {
      const columns = records.length > 0 ? Object.keys(records[0]) : [SCENARIO_COLUMN]
      const missing = new Set<string>()
      const rows = records.map((record) =>
        columns.map((column) => {
          const value = record[column]
          if (value === undefined) missing.add(column)
          return value ?? Number.NaN
        }),
      )
      return missing.size > 0
        ? Effect.fail(new ConfigurationError({ reason: "Scenario records are missing columns", names: [...missing] }))
        : ScenarioTable.fromRows(columns, rows)
    })
  }

  /**
   * A table of `count` scenarios (ids 1..count) with every parameter at 0.
   */
  static empty(
    parameterNames: ReadonlyArray<string>,
    count: number,
  ): Effect.Effect<ScenarioTable, ConfigurationError> {
    return ScenarioTable.fromRows(
      [SCENARIO_COLUMN, ...parameterNames],
      Array.from({ length: count }, (_, i) => [i + 1, ...parameterNames.map(() => 0)]),
    )
  }

  get size(): number {
    return this.rows.length
  }

  get parameterNames(): ReadonlyArray<string> {
    return this.columns.slice(1)
  }

  get ids(): ReadonlyArray<number> {
    return this.rows.map((row) => row[0])
  }

  /**
   * Row at a 0-based position.
   */
  row(index: number): Effect.Effect<ReadonlyArray<number>, IndexOutOfRangeError> {
    const row = this.rows[index]
    return row === undefined
      ? Effect.fail(new IndexOutOfRangeError({ kind: "scenario row", index, size: this.rows.length }))
      : Effect.succeed(row)
  }

  /**
   * Rows as records keyed by column name.
   */
  toRecords(): Array<Record<string, number>> {
    return this.rows.map((row) =>
      Object.fromEntries(this.columns.map((column, i) => [column, row[i]] as const)),
    )
  }
}

/**
 * One entry of the long scenario layout: a parameter of a group (or of the
 * environment) in a scenario, with no value yet.
 *
 * @category Scenario Tables
 * @since 0.1.0
 */
export interface LongScenarioRow {
  readonly scenario: number
  readonly group: string
  readonly parameter: string
  readonly value: number | null
}
