/**
 * StepProcess: wraps the ChildProcess spawned for one step invocation.
 *
 * Responsibilities:
 *  - Spawning the child process via child_process.spawn, through the
 *    platform shell for `run:` steps and directly for `command:` steps
 *  - Collecting stdout / stderr and forwarding chunks as they arrive
 *  - Enforcing an optional timeout via SIGKILL (exit code 124)
 *  - terminate(): SIGTERM, then SIGKILL once the grace period lapses
 */

import { spawn } from 'node:child_process'
import type { ChildProcess, ChildProcessByStdio } from 'node:child_process'
import type { Readable } from 'node:stream'
import type { Invocation } from '../../core/types.js'
import type { OutputStream } from './types.js'

/** Exit code reported for a step killed by its timeout */
export const TIMEOUT_EXIT_CODE = 124

/** Exit code reported for a step terminated through cancellation */
export const CANCELLED_EXIT_CODE = 130

// ---------------------------------------------------------------------------
// Callback types
// ---------------------------------------------------------------------------

export interface StepProcessOutcome {
  exitCode: number
  stdout: string
  stderr: string
  durationMs: number
  timedOut: boolean
  terminated: boolean
}

/** Called once when the process has exited and its streams are closed */
export type StepExitCallback = (outcome: StepProcessOutcome) => void

/** Called once when the process could not be started */
export type StepSpawnErrorCallback = (err: Error) => void

export interface StepProcessOptions {
  cwd: string
  env: NodeJS.ProcessEnv
  /** 0 disables the timeout */
  timeoutMs: number
  killGraceMs: number
  onOutput?: (stream: OutputStream, chunk: string) => void
}

// ---------------------------------------------------------------------------
// StepProcess
// ---------------------------------------------------------------------------

export class StepProcess {
  private readonly _invocation: Invocation
  private readonly _options: StepProcessOptions
  private readonly _onExit: StepExitCallback
  private readonly _onSpawnError: StepSpawnErrorCallback

  private _proc: ChildProcess | null = null
  private _timeoutHandle: ReturnType<typeof setTimeout> | null = null
  private _killHandle: ReturnType<typeof setTimeout> | null = null
  private _timedOut = false
  private _terminated = false
  private _settled = false
  private _startedAt = 0

  constructor(
    invocation: Invocation,
    options: StepProcessOptions,
    onExit: StepExitCallback,
    onSpawnError: StepSpawnErrorCallback,
  ) {
    this._invocation = invocation
    this._options = options
    this._onExit = onExit
    this._onSpawnError = onSpawnError
  }

  /**
   * Spawn the child process and wire up output collection and the close handler.
   * Must be called exactly once.
   */
  start(): void {
    const invocation = this._invocation
    const { cwd, env, timeoutMs, onOutput } = this._options
    this._startedAt = Date.now()

    const binary = invocation.kind === 'shell' ? invocation.script : invocation.command
    const args = invocation.kind === 'shell' ? [] : [...invocation.args]

    let proc: ChildProcessByStdio<null, Readable, Readable>
    try {
      proc = spawn(binary, args, {
        cwd,
        env,
        shell: invocation.kind === 'shell',
        stdio: ['ignore', 'pipe', 'pipe'],
      })
    } catch (err) {
      this._fail(err)
      return
    }
    this._proc = proc

    const stdoutChunks: string[] = []
    const stderrChunks: string[] = []

    proc.stdout.setEncoding('utf-8')
    proc.stderr.setEncoding('utf-8')
    proc.stdout.on('data', (chunk: string) => {
      stdoutChunks.push(chunk)
      onOutput?.('stdout', chunk)
    })
    proc.stderr.on('data', (chunk: string) => {
      stderrChunks.push(chunk)
      onOutput?.('stderr', chunk)
    })

    if (timeoutMs > 0) {
      this._timeoutHandle = setTimeout(() => {
        this._timedOut = true
        proc.kill('SIGKILL')
      }, timeoutMs)
    }

    proc.on('error', (err) => {
      this._fail(err)
    })

    proc.on('close', (exitCode: number | null) => {
      this._clearTimers()
      if (this._settled) return
      this._settled = true

      let code = exitCode ?? 1
      if (this._timedOut) code = TIMEOUT_EXIT_CODE
      else if (this._terminated) code = exitCode ?? CANCELLED_EXIT_CODE

      this._onExit({
        exitCode: code,
        stdout: stdoutChunks.join(''),
        stderr: stderrChunks.join(''),
        durationMs: this.elapsedMs,
        timedOut: this._timedOut,
        terminated: this._terminated,
      })
    })
  }

  /**
   * Ask the process to stop: SIGTERM now, SIGKILL after the grace period.
   */
  terminate(): void {
    const proc = this._proc
    if (proc === null || this._settled || this._terminated) return
    this._terminated = true
    if (this._timeoutHandle !== null) {
      clearTimeout(this._timeoutHandle)
      this._timeoutHandle = null
    }
    proc.kill('SIGTERM')
    this._killHandle = setTimeout(() => {
      proc.kill('SIGKILL')
    }, this._options.killGraceMs)
    this._killHandle.unref()
  }

  /** Elapsed milliseconds since start() */
  get elapsedMs(): number {
    return Date.now() - this._startedAt
  }

  private _fail(err: unknown): void {
    this._clearTimers()
    if (this._settled) return
    this._settled = true
    this._onSpawnError(err instanceof Error ? err : new Error(String(err)))
  }

  private _clearTimers(): void {
    if (this._timeoutHandle !== null) {
      clearTimeout(this._timeoutHandle)
      this._timeoutHandle = null
    }
    if (this._killHandle !== null) {
      clearTimeout(this._killHandle)
      this._killHandle = null
    }
  }
}
