import { Schema } from "effect"
import { CompositorSnapshot } from "../../Compositor.js"
import { ScenarioTable } from "../../ScenarioTable.js"
import { RunFailurePolicy, Subsystem } from "../../Types.js"

/**
 * Everything a worker needs to build its own engine session. A live session
 * never crosses a thread boundary.
 *
 * @internal
 */
export const WorkerRecipe = Schema.Struct({
  workerId: Schema.Int,
  driver: Schema.String,
  modelPath: Schema.String,
  directory: Schema.String,
  ecosimScenario: Schema.String,
  ecotracerScenario: Schema.String,
  stage: Subsystem,
  parameters: CompositorSnapshot,
  variables: Schema.Array(Schema.String),
  buffers: Schema.Record({ key: Schema.String, value: Schema.instanceOf(SharedArrayBuffer) }),
  table: ScenarioTable,
  failurePolicy: RunFailurePolicy,
  cleanupRetries: Schema.Int,
  cleanupDelayMillis: Schema.Number,
})

/** @internal */
export type WorkerRecipe = typeof WorkerRecipe.Type

/** @internal */
export const WorkerRequest = Schema.Union(
  Schema.TaggedStruct("Init", { recipe: WorkerRecipe }),
  Schema.TaggedStruct("Run", { index: Schema.Int }),
  Schema.TaggedStruct("Shutdown", {}),
)

/** @internal */
export type WorkerRequest = typeof WorkerRequest.Type

/** @internal */
export const WorkerReply = Schema.Union(
  Schema.TaggedStruct("Ready", { workerId: Schema.Int }),
  Schema.TaggedStruct("Completed", { index: Schema.Int, succeeded: Schema.Boolean }),
  Schema.TaggedStruct("Failed", { index: Schema.optional(Schema.Int), reason: Schema.String }),
  Schema.TaggedStruct("Closed", { workerId: Schema.Int }),
)

/** @internal */
export type WorkerReply = typeof WorkerReply.Type

/**
 * The subset of `MessagePort` / `Worker` both ends of the protocol use.
 *
 * @internal
 */
export interface Port {
  postMessage(message: unknown): void
  on(event: "message", listener: (message: unknown) => void): unknown
  off(event: "message", listener: (message: unknown) => void): unknown
}

/** @internal */
export const decodeRequest = Schema.decodeUnknown(WorkerRequest)

/** @internal */
export const decodeReply = Schema.decodeUnknown(WorkerReply)

/** @internal */
export const encodeRequest = Schema.encodeSync(WorkerRequest)

/** @internal */
export const encodeReply = Schema.encodeSync(WorkerReply)
