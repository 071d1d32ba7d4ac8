import { cp, mkdir, mkdtemp, rm, stat } from "node:fs/promises"
import { tmpdir } from "node:os"
import { basename, dirname, join, resolve } from "node:path"
import { Duration, Effect, Schedule } from "effect"
import { CleanupError, EngineOperationError } from "../Errors.js"

/** @internal */
export const exists = (path: string): Effect.Effect<boolean> =>
  Effect.promise(() =>
    stat(path).then(
      () => true,
      () => false,
    ),
  )

/** @internal */
export const makeTempDirectory = (prefix: string): Effect.Effect<string, EngineOperationError> =>
  Effect.tryPromise({
    try: () => mkdtemp(join(tmpdir(), prefix)),
    catch: (cause) =>
      new EngineOperationError({ operation: "Creating a temporary directory", reason: String(cause) }),
  })

/**
 * Copy a model file to `target`, creating parent directories.
 *
 * @internal
 */
export const copyModel = (source: string, target: string): Effect.Effect<string, EngineOperationError> =>
  Effect.tryPromise({
    try: async () => {
      const destination = resolve(target)
      await mkdir(dirname(destination), { recursive: true })
      await cp(source, destination, { preserveTimestamps: true })
      return destination
    },
    catch: (cause) =>
      new EngineOperationError({ operation: `Copying model ${source}`, reason: String(cause) }),
  })

/**
 * Path of a model copy named after the original inside `directory`.
 *
 * @internal
 */
export const copyPath = (directory: string, modelPath: string, suffix = ""): string => {
  const name = basename(modelPath)
  const dot = name.lastIndexOf(".")
  return dot > 0
    ? join(directory, `${name.slice(0, dot)}${suffix}${name.slice(dot)}`)
    : join(directory, `${name}${suffix}`)
}

/**
 * Remove a file or directory, retrying while it is locked. A final failure
 * is logged, never raised.
 *
 * @internal
 */
export const removeWithRetry = (
  path: string,
  retries: number,
  delay: Duration.DurationInput,
): Effect.Effect<void> =>
  Effect.tryPromise({
    try: () => rm(path, { recursive: true, force: true }),
    catch: (cause) => new CleanupError({ path, reason: String(cause) }),
  }).pipe(
    Effect.retry({ times: retries, schedule: Schedule.spaced(delay) }),
    Effect.catchTag("CleanupError", (error) =>
      Effect.logWarning(error.message).pipe(Effect.annotateLogs({ path })),
    ),
  )
