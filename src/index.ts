/**
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * from "./Types.js"

/**
 * @since 0.1.0
 */
export * from "./Errors.js"

/**
 * @since 0.1.0
 */
export * from "./Engine.js"

/**
 * @since 0.1.0
 */
export * from "./Parameters.js"

/**
 * @since 0.1.0
 */
export * from "./Compositor.js"

/**
 * @since 0.1.0
 */
export * from "./ScenarioTable.js"

/**
 * @since 0.1.0
 */
export * from "./ResultVariables.js"

/**
 * @since 0.1.0
 */
export * from "./Extraction.js"

/**
 * @since 0.1.0
 */
export * from "./ResultStore.js"

/**
 * @since 0.1.0
 */
export * from "./Results.js"

/**
 * @since 0.1.0
 */
export * from "./Config.js"

/**
 * @since 0.1.0
 */
export * from "./Runner.js"

/**
 * @since 0.1.0
 */
export * from "./WorkerPool.js"

/**
 * @since 0.1.0
 */
export * from "./ScenarioInterface.js"
