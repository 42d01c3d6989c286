/**
 * JobRunner: per-job state machine.
 *
 *   pending ──► running ──► succeeded | failed | cancelled
 *      │
 *      ├──► skipped
 *      └──► cancelled
 *
 * Terminal states are sinks. Steps run strictly in declared order and form
 * an AND-chain: once a gated-in step fails, every later step is `not_run`.
 */

import { InvalidStateTransitionError } from '../../core/errors.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type {
  GateContext,
  JobResult,
  JobSpec,
  JobStatus,
  SkipDecision,
  StepResult,
  StepSpec,
  StepStatus,
  TerminalJobStatus,
  TriggerContext,
} from '../../core/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { deepFreeze, tailLines } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { InvocationResult, OutputStream, TaskRunner, ToolchainProvisioner } from '../task-runner/types.js'

const logger = createLogger('job-runner')

/** Name of the synthetic step recorded when toolchain provisioning fails */
export const SETUP_STEP_NAME = 'setup toolchain'

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'skipped', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  skipped: [],
  cancelled: [],
}

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface JobRunnerDeps {
  taskRunner: TaskRunner
  provisioner: ToolchainProvisioner
  eventBus?: TypedEventBus
  /** Lines of output kept per step result. Default: 50 */
  outputTailLines?: number
}

export interface JobRunner {
  readonly job: JobSpec
  readonly state: JobStatus

  /**
   * Drive the job to a terminal state. Never rejects.
   * A runner cancelled while pending resolves immediately as `cancelled`.
   * @throws {InvalidStateTransitionError} when called on a job that already ran
   */
  run(trigger: TriggerContext, decision?: SkipDecision): Promise<JobResult>

  /**
   * Cancel a pending or running job. A running step is aborted and recorded
   * as `cancelled`; its late exit status is discarded.
   * @throws {InvalidStateTransitionError} when the job is already terminal
   */
  cancel(reason: string): void
}

// ---------------------------------------------------------------------------
// JobRunnerImpl
// ---------------------------------------------------------------------------

export class JobRunnerImpl implements JobRunner {
  readonly job: JobSpec

  private readonly _deps: JobRunnerDeps
  private readonly _abort = new AbortController()
  private _state: JobStatus = 'pending'
  private _started = false
  private _cancelReason: string | null = null

  constructor(job: JobSpec, deps: JobRunnerDeps) {
    this.job = job
    this._deps = deps
  }

  get state(): JobStatus {
    return this._state
  }

  cancel(reason: string): void {
    if (this._state !== 'pending' && this._state !== 'running') {
      throw new InvalidStateTransitionError(this.job.id, this._state, 'cancelled')
    }
    if (this._cancelReason !== null) return
    this._cancelReason = reason
    logger.debug({ jobId: this.job.id, reason }, 'Cancelling job')

    if (this._state === 'pending') {
      this._transition('cancelled')
      return
    }
    this._abort.abort()
  }

  async run(trigger: TriggerContext, decision?: SkipDecision): Promise<JobResult> {
    if (this._started) {
      throw new InvalidStateTransitionError(this.job.id, this._state, 'running')
    }
    this._started = true
    const startedAt = Date.now()

    if (this._state === 'cancelled') {
      return this._finish('cancelled', this._notRun(this.job.steps), startedAt, decision)
    }

    if (decision?.skip === true) {
      this._transition('skipped')
      this._deps.eventBus?.emit('job:skipped', { jobId: this.job.id, decision })
      return this._finish('skipped', this._notRun(this.job.steps), startedAt, decision)
    }

    this._transition('running')
    this._deps.eventBus?.emit('job:started', { jobId: this.job.id, policy: this.job.policy })

    try {
      const { status, steps } = await this._execute(trigger)
      return this._finish(status, steps, startedAt, decision)
    } catch (err) {
      logger.error({ jobId: this.job.id, err }, 'Job runner failed unexpectedly')
      const message = err instanceof Error ? err.message : String(err)
      const steps = this._notRun(this.job.steps)
      return this._finish('failed', steps, startedAt, decision, message)
    }
  }

  // -------------------------------------------------------------------------
  // Execution
  // -------------------------------------------------------------------------

  private async _execute(trigger: TriggerContext): Promise<{ status: TerminalJobStatus; steps: StepResult[] }> {
    const job = this.job

    if (job.toolchain !== undefined) {
      const setupStart = Date.now()
      let ok = false
      let message: string
      let exitCode: number | undefined
      let output = ''
      try {
        const provisioned = await this._deps.provisioner.provision(job.toolchain, job, this._abort.signal)
        ok = provisioned.ok
        message = provisioned.message
        exitCode = provisioned.exitCode
        output = provisioned.output ?? ''
      } catch (err) {
        message = err instanceof Error ? err.message : String(err)
      }

      if (this._abort.signal.aborted) {
        const setup = this._stepResult(SETUP_STEP_NAME, 'cancelled', setupStart, output, undefined, message)
        return { status: 'cancelled', steps: [setup, ...this._notRun(job.steps)] }
      }
      if (!ok) {
        logger.warn({ jobId: job.id, message }, 'Toolchain provisioning failed')
        const setup = this._stepResult(SETUP_STEP_NAME, 'failed', setupStart, output, exitCode, message)
        return { status: 'failed', steps: [setup, ...this._notRun(job.steps)] }
      }
    }

    const outcomes: Record<string, StepStatus | 'pending'> = {}
    for (const step of job.steps) outcomes[step.name] = 'pending'

    const results: StepResult[] = []
    let success = true
    let cancelled = false

    for (const step of job.steps) {
      if (!success || cancelled || this._abort.signal.aborted) {
        results.push(this._recordNotRun(step))
        continue
      }

      const context: GateContext = {
        skipped: false,
        success,
        event: trigger.kind,
        matrix: job.variants,
        steps: { ...outcomes },
      }
      if (!step.gate.evaluate(context)) {
        outcomes[step.name] = 'not_run'
        results.push(this._recordNotRun(step))
        continue
      }

      const result = await this._runStep(step)
      outcomes[step.name] = result.status
      results.push(result)
      if (result.status === 'failed') success = false
      if (result.status === 'cancelled') cancelled = true
    }

    if (cancelled) return { status: 'cancelled', steps: results }
    if (!success) return { status: 'failed', steps: results }
    return { status: this._abort.signal.aborted ? 'cancelled' : 'succeeded', steps: results }
  }

  private async _runStep(step: StepSpec): Promise<StepResult> {
    const jobId = this.job.id
    const bus = this._deps.eventBus
    const startedAt = Date.now()
    const chunks: string[] = []

    bus?.emit('step:started', { jobId, step: step.name })

    let invocation: InvocationResult
    try {
      invocation = await this._deps.taskRunner.invoke(step.invocation, {
        signal: this._abort.signal,
        onOutput: (stream: OutputStream, chunk: string) => {
          const masked = maskSecrets(chunk)
          chunks.push(masked)
          bus?.emit('step:output', { jobId, step: step.name, stream, chunk: masked })
        },
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      const status: StepStatus = this._abort.signal.aborted ? 'cancelled' : 'failed'
      logger.warn({ jobId, step: step.name, err }, 'Step invocation could not run')
      return this._emitFinished(this._stepResult(step.name, status, startedAt, '', undefined, message))
    }

    const output = chunks.length > 0 ? chunks.join('') : maskSecrets(`${invocation.stdout}${invocation.stderr}`)

    // A cancelled job discards whatever exit status arrives afterwards
    if (invocation.cancelled || this._abort.signal.aborted) {
      return this._emitFinished(this._stepResult(step.name, 'cancelled', startedAt, output))
    }

    const status: StepStatus = invocation.exitCode === 0 ? 'succeeded' : 'failed'
    const error = invocation.timedOut ? 'Step timed out' : undefined
    return this._emitFinished(this._stepResult(step.name, status, startedAt, output, invocation.exitCode, error))
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private _transition(to: JobStatus): void {
    if (!TRANSITIONS[this._state].includes(to)) {
      throw new InvalidStateTransitionError(this.job.id, this._state, to)
    }
    this._state = to
  }

  private _stepResult(
    name: string,
    status: StepStatus,
    startedAt: number,
    output: string,
    exitCode?: number,
    error?: string,
  ): StepResult {
    return {
      name,
      status,
      ...(exitCode !== undefined && { exitCode }),
      durationMs: Date.now() - startedAt,
      output: tailLines(output, this._deps.outputTailLines ?? 50),
      ...(error !== undefined && { error }),
    }
  }

  private _notRun(steps: readonly StepSpec[]): StepResult[] {
    return steps.map((step): StepResult => ({ name: step.name, status: 'not_run', durationMs: 0, output: '' }))
  }

  private _recordNotRun(step: StepSpec): StepResult {
    return this._emitFinished({ name: step.name, status: 'not_run', durationMs: 0, output: '' })
  }

  private _emitFinished(result: StepResult): StepResult {
    this._deps.eventBus?.emit('step:finished', {
      jobId: this.job.id,
      step: result.name,
      status: result.status,
      ...(result.exitCode !== undefined && { exitCode: result.exitCode }),
      durationMs: result.durationMs,
    })
    return result
  }

  private _finish(
    status: TerminalJobStatus,
    steps: StepResult[],
    startedAt: number,
    decision: SkipDecision | undefined,
    error?: string,
  ): JobResult {
    if (this._state !== status) this._transition(status)

    const failedStep = status === 'failed' ? steps.find((s) => s.status === 'failed')?.name : undefined
    const cancelReason = status === 'cancelled' ? (this._cancelReason ?? undefined) : undefined
    const durationMs = Date.now() - startedAt

    const result: JobResult = {
      job: this.job,
      status,
      steps,
      durationMs,
      ...(decision !== undefined && { skipDecision: decision }),
      ...(failedStep !== undefined && { failedStep }),
      ...(cancelReason !== undefined && { cancelReason }),
      ...(error !== undefined && { error }),
    }

    const bus = this._deps.eventBus
    if (status === 'cancelled') {
      bus?.emit('job:cancelled', { jobId: this.job.id, reason: cancelReason ?? 'cancelled' })
    }
    bus?.emit('job:finished', {
      jobId: this.job.id,
      policy: this.job.policy,
      status,
      durationMs,
      ...(failedStep !== undefined && { failedStep }),
    })

    if (error !== undefined) {
      logger.error({ jobId: this.job.id, error }, 'Job failed without a failing step')
    } else {
      logger.debug({ jobId: this.job.id, status, durationMs }, 'Job finished')
    }
    return deepFreeze(result)
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createJobRunner(job: JobSpec, deps: JobRunnerDeps): JobRunner {
  return new JobRunnerImpl(job, deps)
}
