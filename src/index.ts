/**
 * workcell - Main module exports
 * Public API surface for embedding the pipeline
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { WorkcellEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Composition root
export { createWorkcellRuntime } from './runtime.js'
export type { WorkcellRuntime, WorkcellRuntimeOptions } from './runtime.js'

// Capability backends
export * from './adapters/index.js'

// Configuration
export * from './modules/config/index.js'

// Components
export * from './modules/capability-dispatch/index.js'
export * from './modules/interaction-ledger/index.js'
export * from './modules/refinement/index.js'
export * from './modules/tools/index.js'
export * from './modules/workers/index.js'
export * from './modules/review-coordinator/index.js'
export * from './modules/memory/index.js'
export * from './modules/operator-gate/index.js'
export * from './modules/workflow-engine/index.js'

// Persistence
export { createStateStore } from './persistence/state-store.js'
export type { StateStore } from './persistence/state-store.js'
export { FileStateStore } from './persistence/file-state-store.js'
export { SqliteStateStore } from './persistence/sqlite-state-store.js'
