/**
 * Result extraction.
 *
 * Engine result arrays are only valid until the next run of their stage. A
 * {@link ResultExtractor} copies one such array into a buffer it owns, reusing
 * the buffer across scenarios, and hands out trimmed read-only views of it.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import type { EngineSession } from "./Engine.js"
import {
  ConfigurationError,
  ScenarioLookupError,
  stageNotReady,
  type StageNotReadyError,
} from "./Errors.js"
import type { ExtractorSpec, Trim } from "./ResultVariables.js"
import type { Stage } from "./Types.js"

// =============================================================================
// Views
// =============================================================================

/**
 * Copy-free strided window over a `Float64Array`.
 *
 * @category Views
 * @since 0.1.0
 */
export class DenseView {
  readonly size: number

  constructor(
    readonly data: Float64Array,
    readonly shape: ReadonlyArray<number>,
    readonly strides: ReadonlyArray<number>,
    readonly offset: number,
  ) {
    this.size = shape.reduce((product, length) => product * length, 1)
  }

  /**
   * Contiguous row-major view of a whole buffer.
   */
  static contiguous(data: Float64Array, shape: ReadonlyArray<number>, offset = 0): DenseView {
    return new DenseView(data, shape, rowMajorStrides(shape), offset)
  }

  at(...index: ReadonlyArray<number>): number {
    let position = this.offset
    for (let axis = 0; axis < this.shape.length; axis++) {
      position += index[axis] * this.strides[axis]
    }
    return this.data[position]
  }

  /**
   * Write the view's values in row-major order into `target` from `start`.
   */
  copyTo(target: Float64Array, start = 0): void {
    if (this.size === 0) return
    const rank = this.shape.length
    const counter = new Array<number>(rank).fill(0)
    let out = start
    let position = this.offset
    for (let n = 0; n < this.size; n++) {
      target[out++] = this.data[position]
      for (let axis = rank - 1; axis >= 0; axis--) {
        counter[axis]++
        position += this.strides[axis]
        if (counter[axis] < this.shape[axis]) break
        position -= this.strides[axis] * this.shape[axis]
        counter[axis] = 0
      }
    }
  }

  toArray(): Float64Array {
    const out = new Float64Array(this.size)
    this.copyTo(out)
    return out
  }
}

/**
 * @category Views
 * @since 0.1.0
 */
export const rowMajorStrides = (shape: ReadonlyArray<number>): Array<number> => {
  const strides = new Array<number>(shape.length).fill(1)
  for (let axis = shape.length - 2; axis >= 0; axis--) {
    strides[axis] = strides[axis + 1] * shape[axis + 1]
  }
  return strides
}

const trimmedAxis = (length: number, trim: Trim): { start: number; length: number } => {
  switch (trim) {
    case "none":
      return { start: 0, length }
    case "first":
      return { start: 1, length: Math.max(length - 1, 0) }
    case "last":
      return { start: 0, length: Math.max(length - 1, 0) }
  }
}

// =============================================================================
// Stage preconditions
// =============================================================================

const stageOrder: ReadonlyArray<Stage> = ["ecopath", "ecosim", "ecotracer"]

/**
 * Fail with the error of the first stage up to and including `stage` that
 * has not run.
 *
 * @category Extraction
 * @since 0.1.0
 */
export const requireStage = (
  session: EngineSession,
  stage: Stage,
  operation: string,
): Effect.Effect<void, StageNotReadyError> =>
  Effect.suspend(() => {
    const state = session.state()
    const required = stageOrder.slice(0, stageOrder.indexOf(stage) + 1)
    const missing = required.find((candidate) => !state.hasRun(candidate))
    return missing === undefined ? Effect.void : Effect.fail(stageNotReady(missing, operation, state))
  })

// =============================================================================
// Extractor
// =============================================================================

/**
 * Owned copy of one engine result array.
 *
 * @category Extraction
 * @since 0.1.0
 */
export class ResultExtractor {
  private buffer: Float64Array | undefined = undefined
  private sourceShape: ReadonlyArray<number> = []

  constructor(
    readonly spec: ExtractorSpec,
    private readonly session: EngineSession,
  ) {}

  get isAllocated(): boolean {
    return this.buffer !== undefined
  }

  checkReady(): Effect.Effect<void, StageNotReadyError> {
    return requireStage(this.session, this.spec.stage, `accessing ${this.spec.array} results`)
  }

  /**
   * Copy the engine's current array into the owned buffer. The first call
   * allocates; later calls overwrite in place.
   */
  refresh(): Effect.Effect<void, StageNotReadyError | ScenarioLookupError | ConfigurationError> {
    return Effect.gen(this, function* () {
      yield* this.checkReady()
      const source = this.session.resultArray(this.spec.source, this.spec.array)
      if (source === undefined) {
        return yield* Effect.fail(new ScenarioLookupError({ kind: "result array", name: this.spec.array }))
      }
      const expectedRank = this.spec.trim.length + (this.spec.packed === undefined ? 0 : 1)
      if (source.shape.length !== expectedRank) {
        return yield* Effect.fail(
          new ConfigurationError({
            reason: `${this.spec.array} has rank ${source.shape.length} but ${expectedRank} axes are configured`,
          }),
        )
      }
      if (this.buffer === undefined) {
        this.buffer = new Float64Array(source.data.length)
        this.sourceShape = [...source.shape]
      } else if (
        source.data.length !== this.buffer.length ||
        source.shape.some((length, axis) => length !== this.sourceShape[axis])
      ) {
        return yield* Effect.fail(
          new ConfigurationError({
            reason: `${this.spec.array} changed shape from [${this.sourceShape.join(", ")}] to [${source.shape.join(", ")}]`,
          }),
        )
      }
      this.buffer.set(source.data)
    })
  }

  /**
   * Trimmed view of the owned buffer. Packed extractors need the key of the
   * variable to select.
   */
  get(key?: string): Effect.Effect<DenseView, ConfigurationError | ScenarioLookupError> {
    return Effect.gen(this, function* () {
      const buffer = this.buffer
      if (buffer === undefined) {
        return yield* Effect.fail(
          new ConfigurationError({ reason: `${this.spec.array} results have not been refreshed` }),
        )
      }
      const fullStrides = rowMajorStrides(this.sourceShape)
      let offset = 0
      let axes = this.sourceShape
      let strides = fullStrides
      const packed = this.spec.packed
      if (packed !== undefined) {
        const slot = key === undefined ? undefined : packed[key]
        if (slot === undefined) {
          return yield* Effect.fail(new ScenarioLookupError({ kind: "variable", name: key ?? "" }))
        }
        if (slot >= this.sourceShape[0]) {
          return yield* Effect.fail(
            new ConfigurationError({
              reason: `${this.spec.array} holds ${this.sourceShape[0]} results but ${key} is stored at ${slot}`,
            }),
          )
        }
        offset = slot * fullStrides[0]
        axes = this.sourceShape.slice(1)
        strides = fullStrides.slice(1)
      }
      const shape: Array<number> = []
      axes.forEach((length, axis) => {
        const trimmed = trimmedAxis(length, this.spec.trim[axis])
        offset += trimmed.start * strides[axis]
        shape.push(trimmed.length)
      })
      return new DenseView(buffer, shape, strides, offset)
    })
  }
}
