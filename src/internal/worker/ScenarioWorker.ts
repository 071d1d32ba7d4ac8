import { Data, Duration, Effect, Queue, Ref } from "effect"
import { ParameterCompositor } from "../../Compositor.js"
import {
  Engine,
  type EngineDriver,
  type EngineSession,
  isEngineDriver,
  loadScenarioByName,
  openSession,
} from "../../Engine.js"
import { WorkerError } from "../../Errors.js"
import { ResultManager } from "../../Results.js"
import { runScenario } from "../../Runner.js"
import { copyModel, copyPath, removeWithRetry } from "../files.js"
import {
  decodeRequest,
  encodeReply,
  type Port,
  type WorkerRecipe,
  type WorkerReply,
} from "./Protocol.js"

/**
 * Resolves the driver named in a recipe for the worker with the given id.
 *
 * @internal
 */
export type DriverLoader = (specifier: string, workerId: number) => Effect.Effect<EngineDriver, WorkerError>

interface WorkerContext {
  readonly recipe: WorkerRecipe
  readonly modelCopy: string
  readonly session: EngineSession
  readonly compositor: ParameterCompositor
  readonly results: ResultManager
}

/**
 * Lifecycle of a pooled worker.
 *
 * @internal
 */
export type WorkerState = Data.TaggedEnum<{
  Uninitialized: {}
  Initializing: {}
  Ready: { readonly context: WorkerContext }
  Running: { readonly context: WorkerContext; readonly index: number }
  Shutdown: {}
}>

const WorkerState = Data.taggedEnum<WorkerState>()

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error))

/**
 * Import a module and take its default export as the driver.
 *
 * @internal
 */
export const importDriver: DriverLoader = (specifier, workerId) =>
  Effect.tryPromise({
    try: async (): Promise<unknown> => {
      const module: unknown = await import(specifier)
      return typeof module === "object" && module !== null && "default" in module ? module.default : undefined
    },
    catch: (cause) => new WorkerError({ workerId, reason: `Unable to import ${specifier}: ${describe(cause)}` }),
  }).pipe(
    Effect.flatMap((candidate) =>
      isEngineDriver(candidate)
        ? Effect.succeed(candidate)
        : Effect.fail(new WorkerError({ workerId, reason: `${specifier} does not export an engine driver` })),
    ),
  )

const initialize = (recipe: WorkerRecipe, loadDriver: DriverLoader) =>
  Effect.gen(function* () {
    const driver = yield* loadDriver(recipe.driver, recipe.workerId)
    const modelCopy = yield* copyModel(
      recipe.modelPath,
      copyPath(recipe.directory, recipe.modelPath, `_worker_${recipe.workerId}`),
    )
    const session = yield* openSession(driver, modelCopy)
    yield* loadScenarioByName(session.ecosim, recipe.ecosimScenario)
    yield* loadScenarioByName(session.ecotracer, recipe.ecotracerScenario)
    const compositor = yield* ParameterCompositor.fromSnapshot(session, recipe.parameters)
    yield* compositor.applyConstants(session)
    const results = yield* ResultManager.make(session, recipe.variables, recipe.table, recipe.buffers)
    const context: WorkerContext = { recipe, modelCopy, session, compositor, results }
    return context
  })

const teardown = (context: WorkerContext) =>
  Effect.gen(function* () {
    if (!context.session.closeModel()) {
      yield* Effect.logWarning("Engine refused to close the worker model").pipe(
        Effect.annotateLogs({ workerId: context.recipe.workerId }),
      )
    }
    yield* removeWithRetry(
      context.modelCopy,
      context.recipe.cleanupRetries,
      Duration.millis(context.recipe.cleanupDelayMillis),
    )
  })

/**
 * Serve protocol requests arriving on `port` one at a time until a
 * `Shutdown` request has been handled.
 *
 * @internal
 */
export const serve = (port: Port, loadDriver: DriverLoader): Effect.Effect<void> =>
  Effect.gen(function* () {
    const inbox = yield* Queue.unbounded<unknown>()
    const state = yield* Ref.make<WorkerState>(WorkerState.Uninitialized())
    const reply = (message: WorkerReply) => Effect.sync(() => port.postMessage(encodeReply(message)))

    const handle = (raw: unknown): Effect.Effect<boolean> =>
      Effect.gen(function* () {
        const decoded = yield* Effect.either(decodeRequest(raw))
        if (decoded._tag === "Left") {
          yield* reply({ _tag: "Failed", reason: `Malformed request: ${decoded.left.message}` })
          return true
        }
        const request = decoded.right
        const current = yield* Ref.get(state)
        switch (request._tag) {
          case "Init": {
            if (current._tag !== "Uninitialized") {
              yield* reply({ _tag: "Failed", reason: `Cannot initialize a worker that is ${current._tag}` })
              return true
            }
            yield* Ref.set(state, WorkerState.Initializing())
            const result = yield* Effect.either(initialize(request.recipe, loadDriver))
            if (result._tag === "Left") {
              yield* Ref.set(state, WorkerState.Uninitialized())
              // The pool names the worker itself.
              const reason = result.left._tag === "WorkerError" ? result.left.reason : result.left.message
              yield* reply({ _tag: "Failed", reason })
              return true
            }
            yield* Ref.set(state, WorkerState.Ready({ context: result.right }))
            yield* reply({ _tag: "Ready", workerId: request.recipe.workerId })
            return true
          }
          case "Run": {
            if (current._tag !== "Ready") {
              yield* reply({
                _tag: "Failed",
                index: request.index,
                reason: `Cannot run a scenario while the worker is ${current._tag}`,
              })
              return true
            }
            const { context } = current
            yield* Ref.set(state, WorkerState.Running({ context, index: request.index }))
            const outcome = yield* Effect.either(
              runScenario(context.compositor, context.results, context.recipe.table, request.index, {
                stage: context.recipe.stage,
                failurePolicy: context.recipe.failurePolicy,
              }).pipe(Effect.provideService(Engine, context.session)),
            )
            yield* Ref.set(state, WorkerState.Ready({ context }))
            yield* outcome._tag === "Right"
              ? reply({ _tag: "Completed", index: request.index, succeeded: outcome.right })
              : reply({ _tag: "Failed", index: request.index, reason: outcome.left.message })
            return true
          }
        }
        if (current._tag === "Ready" || current._tag === "Running") {
          yield* teardown(current.context)
        }
        yield* Ref.set(state, WorkerState.Shutdown())
        yield* reply({
          _tag: "Closed",
          workerId: current._tag === "Ready" || current._tag === "Running" ? current.context.recipe.workerId : 0,
        })
        return false
      }).pipe(
        Effect.catchAllDefect((defect) =>
          reply({ _tag: "Failed", reason: `Worker defect: ${describe(defect)}` }).pipe(Effect.as(true)),
        ),
      )

    const listener = (message: unknown) => {
      Queue.unsafeOffer(inbox, message)
    }
    yield* Effect.acquireRelease(
      Effect.sync(() => port.on("message", listener)),
      () => Effect.sync(() => port.off("message", listener)),
    )

    let running = true
    while (running) {
      running = yield* Effect.flatMap(Queue.take(inbox), handle)
    }
  }).pipe(Effect.scoped)
