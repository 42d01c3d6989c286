/**
 * PipelineEvents interface: defines all typed events for the event bus.
 *
 * Event naming convention: {subject}:{action} (e.g. "job:started", "step:finished")
 * Payloads are defined inline with JSDoc for each event.
 */

import type {
  JobPolicy,
  SkipDecision,
  StepStatus,
  TerminalJobStatus,
  TriggerKind,
  Verdict,
} from './types.js'

// ---------------------------------------------------------------------------
// PipelineEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the pipeline event bus.
 * Use `keyof PipelineEvents` to constrain event keys.
 */
export interface PipelineEvents {
  // -------------------------------------------------------------------------
  // Pipeline lifecycle
  // -------------------------------------------------------------------------

  /** Dispatcher accepted the expanded job list */
  'pipeline:start': {
    jobCount: number
    concurrencyLimit: number
    trigger: TriggerKind
    fingerprint: string
  }

  /** Every job reached a terminal state */
  'pipeline:complete': {
    verdict: Verdict
    succeeded: number
    failed: number
    skipped: number
    cancelled: number
    durationMs: number
  }

  // -------------------------------------------------------------------------
  // Job lifecycle
  // -------------------------------------------------------------------------

  /** Job is waiting for a free slot */
  'job:queued': { jobId: string; policy: JobPolicy }

  /** Skip decider allowed the job to be skipped */
  'job:skipped': { jobId: string; decision: SkipDecision }

  /** JobRunner entered `running` */
  'job:started': { jobId: string; policy: JobPolicy }

  /** JobRunner reached a terminal state */
  'job:finished': {
    jobId: string
    policy: JobPolicy
    status: TerminalJobStatus
    durationMs: number
    failedStep?: string
  }

  /** Job was cancelled (fail-fast or interrupt) */
  'job:cancelled': { jobId: string; reason: string }

  // -------------------------------------------------------------------------
  // Step lifecycle
  // -------------------------------------------------------------------------

  /** Step gate passed and the invocation is starting */
  'step:started': { jobId: string; step: string }

  /** A chunk of masked step output */
  'step:output': { jobId: string; step: string; stream: 'stdout' | 'stderr'; chunk: string }

  /** Step reached its final status (including not_run) */
  'step:finished': {
    jobId: string
    step: string
    status: StepStatus
    exitCode?: number
    durationMs: number
  }
}
