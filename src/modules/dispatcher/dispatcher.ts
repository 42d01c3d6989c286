/**
 * Dispatcher: runs JobRunners with bounded concurrency.
 *
 *  - Jobs are queued FIFO; at most `concurrencyLimit` run at once
 *  - The SkipDecision is computed when a job leaves the queue
 *  - A failed required job cancels pending/running required jobs when
 *    fail-fast applies (globally, or within its group)
 *  - Best-effort jobs are never cancelled by fail-fast and never trigger it
 *  - Successful (not skipped) jobs are recorded in the history store
 *  - An unexpected error inside a job yields a `failed` result for that job only
 */

import { ConfigError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { JobResult, JobSpec, SkipDecision, StepResult, TriggerContext } from '../../core/types.js'
import { deepFreeze } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { createJobRunner } from '../job-runner/job-runner.js'
import type { JobRunner } from '../job-runner/job-runner.js'
import { shouldSkip } from '../skip-history/skip-decider.js'
import type { SkipOptions } from '../skip-history/skip-decider.js'
import type { HistoryStore } from '../skip-history/history-store.js'
import type { TaskRunner, ToolchainProvisioner } from '../task-runner/types.js'

const logger = createLogger('dispatcher')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DispatchOptions {
  /** Maximum number of jobs running at once (≥ 1) */
  concurrencyLimit: number
  /** Cancel every pending/running required job after any required failure */
  failFast: boolean
}

export interface DispatcherDeps {
  taskRunner: TaskRunner
  provisioner: ToolchainProvisioner
  history: HistoryStore
  eventBus?: TypedEventBus
  skip?: SkipOptions
  /** Lines of output kept per step result */
  outputTailLines?: number
  /** Clock for history completion times. Default: Date.now */
  now?: () => number
}

export interface Dispatcher {
  /**
   * Run every job to a terminal state. Results are in input order.
   * @throws {ConfigError} when the concurrency limit is not a positive integer
   */
  run(jobs: readonly JobSpec[], trigger: TriggerContext, options: DispatchOptions): Promise<JobResult[]>

  /** Cancel every pending and running job of the current run */
  cancelAll(reason: string): void
}

// ---------------------------------------------------------------------------
// DispatcherImpl
// ---------------------------------------------------------------------------

export class DispatcherImpl implements Dispatcher {
  private readonly _deps: DispatcherDeps
  private _runners: JobRunner[] = []

  constructor(deps: DispatcherDeps) {
    this._deps = deps
  }

  async run(jobs: readonly JobSpec[], trigger: TriggerContext, options: DispatchOptions): Promise<JobResult[]> {
    const { concurrencyLimit } = options
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new ConfigError(`Concurrency limit must be a positive integer, got ${String(concurrencyLimit)}`, {
        concurrencyLimit,
      })
    }

    const bus = this._deps.eventBus
    const runners = jobs.map((job) =>
      createJobRunner(job, {
        taskRunner: this._deps.taskRunner,
        provisioner: this._deps.provisioner,
        ...(bus !== undefined && { eventBus: bus }),
        ...(this._deps.outputTailLines !== undefined && { outputTailLines: this._deps.outputTailLines }),
      }),
    )
    this._runners = runners

    logger.info({ jobs: jobs.length, concurrencyLimit, failFast: options.failFast }, 'Dispatching jobs')
    for (const job of jobs) {
      bus?.emit('job:queued', { jobId: job.id, policy: job.policy })
    }

    const results: Array<JobResult | undefined> = new Array<JobResult | undefined>(jobs.length).fill(undefined)
    const queue = runners.map((_, index) => index)

    const lane = async (): Promise<void> => {
      for (let index = queue.shift(); index !== undefined; index = queue.shift()) {
        const runner = runners[index]
        if (runner === undefined) continue
        const result = await this._dispatch(runner, trigger)
        results[index] = result
        await this._afterJob(result, options)
      }
    }

    const lanes = Array.from({ length: Math.min(concurrencyLimit, runners.length) }, () => lane())
    await Promise.all(lanes)

    return results.map((result, index) => {
      if (result !== undefined) return result
      const job = jobs[index]
      if (job === undefined) throw new Error(`Dispatcher lost job at position ${index}`)
      return failedResult(job, undefined, 'Job produced no result')
    })
  }

  cancelAll(reason: string): void {
    let count = 0
    for (const runner of this._runners) {
      if (runner.state === 'pending' || runner.state === 'running') {
        runner.cancel(reason)
        count++
      }
    }
    if (count > 0) logger.info({ count, reason }, 'Cancelled all jobs')
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /** Compute the skip decision at dequeue time and run the job; never rejects */
  private async _dispatch(runner: JobRunner, trigger: TriggerContext): Promise<JobResult> {
    const job = runner.job
    let decision: SkipDecision | undefined
    try {
      if (runner.state === 'pending') {
        decision = await shouldSkip(job, trigger, this._deps.history, this._deps.skip)
      }
      return await runner.run(trigger, runner.state === 'pending' ? decision : undefined)
    } catch (err) {
      logger.error({ jobId: job.id, err }, 'Job failed with an unexpected error')
      const message = err instanceof Error ? err.message : String(err)
      const result = failedResult(job, decision, message)
      this._deps.eventBus?.emit('job:finished', {
        jobId: job.id,
        policy: job.policy,
        status: 'failed',
        durationMs: 0,
      })
      return result
    }
  }

  private async _afterJob(result: JobResult, options: DispatchOptions): Promise<void> {
    const job = result.job

    if (result.status === 'failed' && job.policy === 'required') {
      if (options.failFast) {
        this._cancelRequired(`fail-fast: ${job.id} failed`, () => true)
      } else if (job.failFast) {
        this._cancelRequired(`fail-fast: ${job.id} failed`, (other) => other.group === job.group)
      }
    }

    if (result.status === 'succeeded' && result.skipDecision !== undefined) {
      await this._record(job, result.skipDecision.fingerprint)
    }
  }

  private async _record(job: JobSpec, fingerprint: string): Promise<void> {
    const completedAt = (this._deps.now ?? Date.now)()
    try {
      await this._deps.history.record(job.historyKey, fingerprint, completedAt)
    } catch (err) {
      logger.warn({ jobId: job.id, historyKey: job.historyKey, err }, 'Failed to record skip history')
    }
  }

  private _cancelRequired(reason: string, matches: (job: JobSpec) => boolean): void {
    for (const runner of this._runners) {
      if (runner.job.policy !== 'required' || !matches(runner.job)) continue
      if (runner.state === 'pending' || runner.state === 'running') {
        logger.debug({ jobId: runner.job.id, reason }, 'Fail-fast cancellation')
        runner.cancel(reason)
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function failedResult(job: JobSpec, decision: SkipDecision | undefined, message: string): JobResult {
  const steps = job.steps.map(
    (step): StepResult => ({ name: step.name, status: 'not_run', durationMs: 0, output: '' }),
  )
  const result: JobResult = {
    job,
    status: 'failed',
    steps,
    durationMs: 0,
    ...(decision !== undefined && { skipDecision: decision }),
    error: message,
  }
  return deepFreeze(result)
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  return new DispatcherImpl(deps)
}
