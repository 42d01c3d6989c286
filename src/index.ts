/**
 * Lattice - Main module exports
 * Public API surface for embedding the matrix orchestrator
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Orchestrator
export { createOrchestrator } from './core/orchestrator-impl.js'
export type { Orchestrator, OrchestratorConfig, PipelineRunRequest, PipelineOutcome } from './core/orchestrator.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PipelineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Pipeline definition, matrix and gates
export * from './modules/pipeline-definition/index.js'
export * from './modules/matrix/index.js'
export * from './modules/step-gates/index.js'

// Execution
export * from './modules/task-runner/index.js'
export * from './modules/job-runner/index.js'
export * from './modules/dispatcher/index.js'
export * from './modules/skip-history/index.js'
export * from './modules/result-aggregator/index.js'

// Configuration
export * from './modules/config/index.js'

// Persistence
export { DatabaseWrapper, createDatabaseService } from './persistence/database.js'
export type { DatabaseService } from './persistence/database.js'
export { runMigrations } from './persistence/migrations/index.js'
export { listRunSummaries } from './persistence/queries/run-summaries.js'
export type { RunSummary, RunSummaryVerdict } from './persistence/queries/run-summaries.js'

// Signals
export { setupGracefulShutdown, INTERRUPTED_EXIT_CODE } from './recovery/index.js'
export type { ShutdownHandlerOptions } from './recovery/index.js'
