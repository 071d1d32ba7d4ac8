/**
 * Worker thread entry. Serves the scenario protocol on the parent port.
 */

import { parentPort } from "node:worker_threads"
import { Effect } from "effect"
import { withConfiguredLogging } from "../../Config.js"
import { importDriver, serve } from "./ScenarioWorker.js"

if (parentPort !== null) {
  const port = parentPort
  Effect.runFork(
    withConfiguredLogging(serve(port, importDriver)).pipe(
      Effect.catchAll((error) =>
        Effect.logWarning(`Ignoring invalid logging configuration: ${String(error)}`).pipe(
          Effect.zipRight(serve(port, importDriver)),
        ),
      ),
    ),
  )
}
