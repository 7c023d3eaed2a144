/**
 * Waypoint: public API surface
 */

// Core types and errors
export * from './core/types.js'
export * from './core/errors.js'

// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export { maskSecrets } from './utils/masking.js'
export { slugify, createWorkItemId } from './utils/helpers.js'

// Runtime
export { createPipelineRuntime } from './core/pipeline-runtime-impl.js'
export type { PipelineRuntime, PipelineRuntimeConfig } from './core/pipeline-runtime.js'

// Event bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PipelineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Persistence
export { DatabaseWrapper, createDatabaseService } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations, getSchemaVersion } from './persistence/migrations/index.js'

// Modules
export * from './modules/artifact-store/index.js'
export * from './modules/gate-evaluator/index.js'
export * from './modules/stage-coordinator/index.js'
export * from './modules/knowledge-base/index.js'
export * from './modules/release-packager/index.js'
export * from './modules/config/index.js'

// Recovery
export * from './recovery/index.js'
