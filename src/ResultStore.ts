/**
 * Scenario-indexed result stores.
 *
 * A store is a dense row-major `Float64Array` whose leading axis is the
 * scenario. Sequential runs back it with an `ArrayBuffer`; parallel runs with
 * a `SharedArrayBuffer` that every worker attaches to. Each scenario slice is
 * written by exactly one writer, so no locking is needed.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { ConfigurationError, IndexOutOfRangeError } from "./Errors.js"
import type { DenseView } from "./Extraction.js"

const BYTES = Float64Array.BYTES_PER_ELEMENT

/**
 * @category Stores
 * @since 0.1.0
 */
export class ResultStore {
  readonly sliceSize: number

  private constructor(
    readonly shape: ReadonlyArray<number>,
    readonly data: Float64Array,
  ) {
    this.sliceSize = shape.slice(1).reduce((product, length) => product * length, 1)
  }

  /**
   * Zero-filled store of the given shape.
   */
  static allocate(shape: ReadonlyArray<number>, shared = false): ResultStore {
    const length = shape.reduce((product, size) => product * size, 1)
    const data = shared ? new Float64Array(new SharedArrayBuffer(length * BYTES)) : new Float64Array(length)
    return new ResultStore(shape, data)
  }

  /**
   * View an existing buffer, typically one received from another thread.
   */
  static attach(
    buffer: ArrayBufferLike,
    shape: ReadonlyArray<number>,
  ): Effect.Effect<ResultStore, ConfigurationError> {
    const length = shape.reduce((product, size) => product * size, 1)
    return buffer.byteLength === length * BYTES
      ? Effect.succeed(new ResultStore(shape, new Float64Array(buffer)))
      : Effect.fail(
          new ConfigurationError({
            reason: `Result buffer holds ${buffer.byteLength} bytes but shape [${shape.join(", ")}] needs ${length * BYTES}`,
          }),
        )
  }

  get scenarioCount(): number {
    return this.shape[0] ?? 0
  }

  get buffer(): ArrayBufferLike {
    return this.data.buffer
  }

  get isShared(): boolean {
    return this.data.buffer instanceof SharedArrayBuffer
  }

  private checkIndex(index: number): Effect.Effect<void, IndexOutOfRangeError> {
    return Number.isInteger(index) && index >= 0 && index < this.scenarioCount
      ? Effect.void
      : Effect.fail(new IndexOutOfRangeError({ kind: "scenario", index, size: this.scenarioCount }))
  }

  /**
   * Copy a view into the slice of one scenario.
   */
  writeScenario(
    index: number,
    view: DenseView,
  ): Effect.Effect<void, IndexOutOfRangeError | ConfigurationError> {
    return this.checkIndex(index).pipe(
      Effect.zipRight(this.checkFits(view)),
      Effect.zipRight(
        Effect.sync(() => {
          view.copyTo(this.data, index * this.sliceSize)
        }),
      ),
    )
  }

  /**
   * Fail unless `view` has the shape of one scenario slice.
   */
  checkFits(view: DenseView): Effect.Effect<void, ConfigurationError> {
    const expected = this.shape.slice(1)
    return view.shape.length === expected.length && view.shape.every((length, axis) => length === expected[axis])
      ? Effect.void
      : Effect.fail(
          new ConfigurationError({
            reason: `Result of shape [${view.shape.join(", ")}] does not fit store slice [${expected.join(", ")}]`,
          }),
        )
  }

  fillScenario(index: number, value: number): Effect.Effect<void, IndexOutOfRangeError> {
    return Effect.zipRight(
      this.checkIndex(index),
      Effect.sync(() => {
        this.data.fill(value, index * this.sliceSize, (index + 1) * this.sliceSize)
      }),
    )
  }

  /**
   * Values of one scenario, as a live sub-array.
   */
  scenario(index: number): Float64Array {
    return this.data.subarray(index * this.sliceSize, (index + 1) * this.sliceSize)
  }

  /**
   * Private copy, detached from any shared memory.
   */
  freeze(): Float64Array {
    return this.data.slice()
  }
}
