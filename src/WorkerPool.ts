/**
 * Parallel scenario execution.
 *
 * Each pooled worker owns an engine session bound to a private copy of the
 * model, built from a recipe. Scenario indices sit in one queue that every
 * worker fiber polls, so each index is dispatched exactly once; workers write
 * into disjoint slices of shared result buffers.
 *
 * All private copies of a run live in one temporary directory that the pool
 * removes when its scope closes, including on interruption.
 *
 * @since 0.1.0
 */

import { MessageChannel, Worker } from "node:worker_threads"
import { fileURLToPath } from "node:url"
import { Deferred, Duration, Effect, Exit, Fiber, Option, Queue, Ref } from "effect"
import { WorkerError } from "./Errors.js"
import { makeTempDirectory, removeWithRetry } from "./internal/files.js"
import {
  decodeReply,
  encodeRequest,
  type Port,
  type WorkerRecipe,
  type WorkerReply,
  type WorkerRequest,
} from "./internal/worker/Protocol.js"
import { type DriverLoader, serve } from "./internal/worker/ScenarioWorker.js"

// =============================================================================
// Spawners
// =============================================================================

/**
 * A running worker as seen by the pool.
 *
 * @category Pool
 * @since 0.1.0
 */
export interface WorkerHandle {
  readonly port: Port
  /** Register a callback for abnormal termination. */
  readonly onCrash: (listener: (reason: string) => void) => void
  readonly terminate: Effect.Effect<void>
}

/**
 * Starts workers.
 *
 * @category Pool
 * @since 0.1.0
 */
export interface WorkerSpawner {
  readonly name: string
  readonly spawn: (workerId: number) => Effect.Effect<WorkerHandle, WorkerError>
}

/**
 * Whether this module was loaded from TypeScript sources, in which case the
 * compiled worker entry does not exist.
 *
 * @category Pool
 * @since 0.1.0
 */
export const isRunningFromSource = (): boolean => fileURLToPath(import.meta.url).endsWith(".ts")

/**
 * Location of the compiled worker entry.
 *
 * @category Pool
 * @since 0.1.0
 */
export const workerEntry = (): URL => new URL("./internal/worker/main.js", import.meta.url)

/**
 * Spawn `node:worker_threads` workers on a script.
 *
 * @category Pool
 * @since 0.1.0
 */
export const threadSpawner = (script: URL = workerEntry()): WorkerSpawner => ({
  name: "thread",
  spawn: (workerId) =>
    Effect.try({
      try: (): WorkerHandle => {
        const worker = new Worker(script)
        return {
          port: worker,
          onCrash: (listener) => {
            worker.on("error", (error) => listener(error.message))
            worker.on("exit", (code) => {
              if (code !== 0) listener(`exited with code ${code}`)
            })
          },
          terminate: Effect.promise(() => worker.terminate()).pipe(Effect.asVoid),
        }
      },
      catch: (cause) => new WorkerError({ workerId, reason: `Unable to start worker: ${String(cause)}` }),
    }),
})

/**
 * Serve workers on fibers of the current process, connected over a
 * `MessageChannel`. The protocol, recipe and shared buffers are the same as
 * for threads.
 *
 * @category Pool
 * @since 0.1.0
 */
export const inProcessSpawner = (loadDriver: DriverLoader): WorkerSpawner => ({
  name: "in-process",
  spawn: () =>
    Effect.gen(function* () {
      const channel = new MessageChannel()
      const fiber = yield* Effect.forkDaemon(serve(channel.port2, loadDriver))
      const handle: WorkerHandle = {
        port: channel.port1,
        onCrash: () => {},
        terminate: Fiber.interrupt(fiber).pipe(
          Effect.zipRight(
            Effect.sync(() => {
              channel.port1.close()
              channel.port2.close()
            }),
          ),
        ),
      }
      return handle
    }),
})

// =============================================================================
// Pool
// =============================================================================

/**
 * @category Pool
 * @since 0.1.0
 */
export interface PoolOptions {
  readonly workers: number
  readonly spawner: WorkerSpawner
  readonly recipe: Omit<WorkerRecipe, "workerId" | "directory">
  readonly onProgress?: (done: number, total: number) => void
  /** Upper bound on waiting for a worker to acknowledge shutdown. */
  readonly shutdownTimeout?: Duration.DurationInput
}

/**
 * Outcome of a pool run.
 *
 * @category Pool
 * @since 0.1.0
 */
export interface PoolResult {
  /** Row indices whose run reported failure. */
  readonly failedRows: ReadonlyArray<number>
  /** Scenario count completed by each worker, by worker id. */
  readonly completedByWorker: ReadonlyMap<number, number>
}

interface Connection {
  readonly workerId: number
  readonly send: (request: WorkerRequest) => Effect.Effect<void>
  readonly receive: Effect.Effect<WorkerReply, WorkerError>
}

const connect = (
  workerId: number,
  spawner: WorkerSpawner,
  shutdownTimeout: Duration.DurationInput,
) =>
  Effect.gen(function* () {
    const mailbox = yield* Queue.unbounded<unknown>()
    const crashed = yield* Deferred.make<never, WorkerError>()
    const handle = yield* Effect.acquireRelease(spawner.spawn(workerId), (worker) => worker.terminate)
    handle.onCrash((reason) => {
      Deferred.unsafeDone(crashed, Exit.fail(new WorkerError({ workerId, reason })))
    })
    const listener = (message: unknown) => {
      Queue.unsafeOffer(mailbox, message)
    }
    yield* Effect.acquireRelease(
      Effect.sync(() => handle.port.on("message", listener)),
      () => Effect.sync(() => handle.port.off("message", listener)),
    )
    const receive: Effect.Effect<WorkerReply, WorkerError> = Effect.raceFirst(
      Queue.take(mailbox).pipe(
        Effect.flatMap(decodeReply),
        Effect.mapError((error) => new WorkerError({ workerId, reason: `Malformed reply: ${error.message}` })),
      ),
      Deferred.await(crashed),
    )
    const send = (request: WorkerRequest) => Effect.sync(() => handle.port.postMessage(encodeRequest(request)))
    const connection: Connection = { workerId, send, receive }
    // Registered after the terminate finalizer, so it runs first. Finalizers
    // are uninterruptible, and both the race in `receive` and the timeout
    // need to interrupt their losers.
    yield* Effect.addFinalizer(() =>
      send({ _tag: "Shutdown" }).pipe(
        Effect.zipRight(receive),
        Effect.timeout(shutdownTimeout),
        Effect.interruptible,
        Effect.catchAll((error) =>
          Effect.logWarning(`Worker ${workerId} did not shut down cleanly: ${error.message}`),
        ),
      ),
    )
    return connection
  })

const drive = (
  workerId: number,
  options: PoolOptions,
  directory: string,
  queue: Queue.Queue<number>,
  done: Ref.Ref<number>,
  failed: Ref.Ref<ReadonlyArray<number>>,
  total: number,
) =>
  Effect.gen(function* () {
    const connection = yield* connect(workerId, options.spawner, options.shutdownTimeout ?? Duration.seconds(30))
    yield* connection.send({ _tag: "Init", recipe: { ...options.recipe, workerId, directory } })
    const ready = yield* connection.receive
    if (ready._tag !== "Ready") {
      return yield* Effect.fail(
        new WorkerError({
          workerId,
          reason: ready._tag === "Failed" ? ready.reason : `Unexpected ${ready._tag} reply to Init`,
        }),
      )
    }
    let completed = 0
    while (true) {
      const next = yield* Queue.poll(queue)
      if (Option.isNone(next)) break
      const index = next.value
      yield* connection.send({ _tag: "Run", index })
      const reply = yield* connection.receive
      if (reply._tag !== "Completed" || reply.index !== index) {
        return yield* Effect.fail(
          new WorkerError({
            workerId,
            scenarioIndex: index,
            reason: reply._tag === "Failed" ? reply.reason : `Unexpected ${reply._tag} reply to Run`,
          }),
        )
      }
      if (!reply.succeeded) {
        yield* Ref.update(failed, (rows) => [...rows, index])
      }
      completed++
      const count = yield* Ref.updateAndGet(done, (n) => n + 1)
      options.onProgress?.(count, total)
    }
    return completed
  }).pipe(Effect.scoped, Effect.annotateLogs({ workerId }))

/**
 * Run every row of the recipe's table across a pool of workers.
 *
 * @category Pool
 * @since 0.1.0
 */
export const runPool = (options: PoolOptions): Effect.Effect<PoolResult, WorkerError> =>
  Effect.gen(function* () {
    const total = options.recipe.table.size
    const directory = yield* Effect.acquireRelease(
      makeTempDirectory("ecosim-batch-run-").pipe(
        Effect.mapError((error) => new WorkerError({ workerId: 0, reason: error.message })),
      ),
      (path) =>
        removeWithRetry(path, options.recipe.cleanupRetries, Duration.millis(options.recipe.cleanupDelayMillis)),
    )
    const queue = yield* Queue.unbounded<number>()
    yield* Queue.offerAll(queue, Array.from({ length: total }, (_, index) => index))
    const done = yield* Ref.make(0)
    const failed = yield* Ref.make<ReadonlyArray<number>>([])
    const workerIds = Array.from({ length: Math.max(1, Math.min(options.workers, total)) }, (_, i) => i + 1)
    yield* Effect.logInfo(`Running ${total} scenarios on ${workerIds.length} ${options.spawner.name} workers`)
    const counts = yield* Effect.forEach(
      workerIds,
      (workerId) => drive(workerId, options, directory, queue, done, failed, total),
      { concurrency: "unbounded" },
    )
    const failedRows = [...(yield* Ref.get(failed))].sort((a, b) => a - b)
    return {
      failedRows,
      completedByWorker: new Map(workerIds.map((workerId, i) => [workerId, counts[i]] as const)),
    }
  }).pipe(Effect.scoped)
