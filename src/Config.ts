/**
 * Runtime configuration.
 *
 * Settings are read through Effect's `Config` from the environment, so tests
 * and applications can swap the provider without touching the code that
 * reads them.
 *
 * | Variable | Default |
 * | --- | --- |
 * | `ECOSIM_BATCH_WORKERS` | available parallelism |
 * | `ECOSIM_BATCH_CLEANUP_RETRIES` | `10` |
 * | `ECOSIM_BATCH_CLEANUP_DELAY` | `500 millis` |
 * | `ECOSIM_BATCH_RUN_FAILURE_POLICY` | `invalidate` |
 * | `ECOSIM_BATCH_LOG_LEVEL` | `Info` |
 *
 * @since 0.1.0
 */

import { availableParallelism } from "node:os"
import { Config, type ConfigError, Duration, Effect, Logger, LogLevel } from "effect"
import type { RunFailurePolicy } from "./Types.js"

/**
 * @category Config
 * @since 0.1.0
 */
export interface ScenarioSettings {
  readonly workers: number
  readonly cleanupRetries: number
  readonly cleanupDelay: Duration.Duration
  readonly runFailurePolicy: RunFailurePolicy
  readonly logLevel: LogLevel.LogLevel
}

const positive = (name: string) =>
  Config.integer(name).pipe(
    Config.validate({ message: `${name} must be a positive integer`, validation: (n) => n >= 1 }),
  )

/**
 * @category Config
 * @since 0.1.0
 */
export const ScenarioConfig: Config.Config<ScenarioSettings> = Config.all({
  workers: positive("ECOSIM_BATCH_WORKERS").pipe(Config.withDefault(availableParallelism())),
  cleanupRetries: Config.integer("ECOSIM_BATCH_CLEANUP_RETRIES").pipe(
    Config.validate({ message: "ECOSIM_BATCH_CLEANUP_RETRIES must not be negative", validation: (n) => n >= 0 }),
    Config.withDefault(10),
  ),
  cleanupDelay: Config.duration("ECOSIM_BATCH_CLEANUP_DELAY").pipe(
    Config.withDefault(Duration.millis(500)),
  ),
  runFailurePolicy: Config.literal("invalidate", "collect")("ECOSIM_BATCH_RUN_FAILURE_POLICY").pipe(
    Config.withDefault("invalidate" as const),
  ),
  logLevel: Config.logLevel("ECOSIM_BATCH_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
})

/**
 * Run an effect with the configured minimum log level.
 *
 * @category Logging
 * @since 0.1.0
 */
export const withConfiguredLogging = <A, E, R>(
  effect: Effect.Effect<A, E, R>,
): Effect.Effect<A, E | ConfigError.ConfigError, R> =>
  Effect.flatMap(ScenarioConfig, (settings) => Logger.withMinimumLogLevel(effect, settings.logLevel))
