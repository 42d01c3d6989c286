/**
 * ProcessTaskRunner: TaskRunner that runs each invocation as a child process.
 */

import { StepInvocationError } from '../../core/errors.js'
import type { Invocation } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import { CANCELLED_EXIT_CODE, StepProcess } from './step-process.js'
import type { InvocationResult, InvokeOptions, TaskRunner } from './types.js'

const logger = createLogger('task-runner')

export interface ProcessTaskRunnerOptions {
  /** Working directory for invocations without their own cwd. Default: process.cwd() */
  cwd?: string
  /** Environment every invocation starts from. Default: process.env */
  baseEnv?: NodeJS.ProcessEnv
  /** Delay between SIGTERM and SIGKILL on cancellation. Default: 5000 */
  killGraceMs?: number
  /** Timeout for invocations that declare none; 0 disables it. Default: 0 */
  defaultTimeoutMs?: number
}

export class ProcessTaskRunner implements TaskRunner {
  private readonly _cwd: string
  private readonly _baseEnv: NodeJS.ProcessEnv
  private readonly _killGraceMs: number
  private readonly _defaultTimeoutMs: number

  constructor(options: ProcessTaskRunnerOptions = {}) {
    this._cwd = options.cwd ?? process.cwd()
    this._baseEnv = options.baseEnv ?? process.env
    this._killGraceMs = options.killGraceMs ?? 5000
    this._defaultTimeoutMs = options.defaultTimeoutMs ?? 0
  }

  invoke(invocation: Invocation, options: InvokeOptions = {}): Promise<InvocationResult> {
    const { signal, onOutput } = options

    if (signal?.aborted === true) {
      return Promise.resolve({
        exitCode: CANCELLED_EXIT_CODE,
        stdout: '',
        stderr: '',
        durationMs: 0,
        timedOut: false,
        cancelled: true,
      })
    }

    const label = invocation.kind === 'shell' ? invocation.script : invocation.command

    return new Promise<InvocationResult>((resolve, reject) => {
      const onAbort = (): void => {
        logger.debug({ command: label }, 'Terminating invocation')
        handle.terminate()
      }

      const handle = new StepProcess(
        invocation,
        {
          cwd: invocation.cwd ?? this._cwd,
          env: { ...this._baseEnv, ...invocation.env },
          timeoutMs: invocation.timeoutMs ?? this._defaultTimeoutMs,
          killGraceMs: this._killGraceMs,
          ...(onOutput !== undefined && { onOutput }),
        },
        (outcome) => {
          signal?.removeEventListener('abort', onAbort)
          if (outcome.timedOut) {
            logger.warn({ command: label, durationMs: outcome.durationMs }, 'Invocation timed out')
          }
          resolve({
            exitCode: outcome.exitCode,
            stdout: outcome.stdout,
            stderr: outcome.stderr,
            durationMs: outcome.durationMs,
            timedOut: outcome.timedOut,
            cancelled: outcome.terminated,
          })
        },
        (err) => {
          signal?.removeEventListener('abort', onAbort)
          reject(
            new StepInvocationError(`Failed to start "${label}": ${err.message}`, {
              command: label,
              cause: err.message,
            }),
          )
        },
      )

      signal?.addEventListener('abort', onAbort, { once: true })
      logger.debug({ kind: invocation.kind, command: label }, 'Starting invocation')
      handle.start()
    })
  }
}

export function createProcessTaskRunner(options: ProcessTaskRunnerOptions = {}): TaskRunner {
  return new ProcessTaskRunner(options)
}
