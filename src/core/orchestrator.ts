/**
 * Orchestrator interface: the public contract for running one pipeline.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createOrchestrator()` from orchestrator-impl.ts.
 */

import type { TypedEventBus } from './event-bus.js'
import type { JobResult, JobSpec, PipelineVerdict, TriggerContext } from './types.js'
import type { SkipOptions } from '../modules/skip-history/skip-decider.js'
import type { TaskRunner, ToolchainProvisioner } from '../modules/task-runner/types.js'
import type { RunSummary } from '../persistence/queries/run-summaries.js'

// ---------------------------------------------------------------------------
// OrchestratorConfig
// ---------------------------------------------------------------------------

/**
 * Configuration required to initialize the orchestrator.
 */
export interface OrchestratorConfig {
  /**
   * Path to the SQLite state database (e.g., ".lattice/state.db").
   * `null` keeps skip history in memory and records no run summaries.
   */
  databasePath: string | null

  /** Working directory for steps without their own */
  projectRoot: string

  /**
   * Maximum number of concurrent jobs.
   * @default 4
   */
  maxConcurrency?: number

  /**
   * Cancel every pending and running required job after any required failure.
   * @default false
   */
  failFast?: boolean

  skip?: SkipOptions

  /**
   * Delay between SIGTERM and SIGKILL when a step is cancelled.
   * @default 5000
   */
  killGraceMs?: number

  /**
   * Lines of output kept per step result.
   * @default 50
   */
  outputTailLines?: number

  /** Replaces the child-process runner (tests, dry runs) */
  taskRunner?: TaskRunner

  /** Replaces the command-based toolchain provisioner */
  provisioner?: ToolchainProvisioner
}

// ---------------------------------------------------------------------------
// Run input / output
// ---------------------------------------------------------------------------

export interface PipelineRunRequest {
  /** Pipeline name, recorded in the run summary */
  pipeline: string
  jobs: readonly JobSpec[]
  trigger: TriggerContext
}

export interface PipelineOutcome {
  /** Id of the run summary row */
  runId: string
  verdict: PipelineVerdict
  /** Job results in input order */
  results: JobResult[]
  durationMs: number
  /** True when the run was cancelled by `cancel()` (e.g. SIGINT) */
  interrupted: boolean
}

// ---------------------------------------------------------------------------
// Orchestrator interface
// ---------------------------------------------------------------------------

/**
 * Central orchestration engine: wires dispatcher, history and persistence
 * and runs a pipeline's expanded jobs to a verdict.
 *
 * Lifecycle:
 *  1. Create via `createOrchestrator(config)`
 *  2. Call `run()` once per pipeline run
 *  3. `cancel()` (usually from a signal handler) stops the current run
 *  4. Call `shutdown()` to close the state database
 */
export interface Orchestrator {
  /**
   * The typed event bus for this orchestrator instance.
   * Consumers subscribe to it for progress output.
   */
  readonly eventBus: TypedEventBus

  /**
   * Whether the orchestrator has been fully initialized.
   */
  readonly isReady: boolean

  /**
   * Run every job to a terminal state and aggregate the verdict.
   * The run summary is recorded when a state database is configured.
   */
  run(request: PipelineRunRequest): Promise<PipelineOutcome>

  /**
   * Cancel every pending and running job of the current run.
   */
  cancel(reason: string): void

  /**
   * Most recent run summaries. Empty without a state database.
   */
  listRuns(options?: { pipeline?: string; limit?: number }): RunSummary[]

  /**
   * Shut down all services in reverse initialization order.
   * Safe to call multiple times; subsequent calls are no-ops.
   */
  shutdown(): Promise<void>
}
