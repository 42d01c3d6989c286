/**
 * External interfaces of the job runner: running one invocation and
 * provisioning a toolchain.
 */

import type { Invocation, JobSpec, ToolchainRequest } from '../../core/types.js'

// ---------------------------------------------------------------------------
// TaskRunner
// ---------------------------------------------------------------------------

export type OutputStream = 'stdout' | 'stderr'

export interface InvokeOptions {
  /** Aborting cancels the invocation */
  signal?: AbortSignal
  /** Called with each chunk of output as it arrives */
  onOutput?: (stream: OutputStream, chunk: string) => void
}

export interface InvocationResult {
  exitCode: number
  stdout: string
  stderr: string
  durationMs: number
  /** The invocation hit its timeout and was killed */
  timedOut: boolean
  /** The invocation was aborted through the signal */
  cancelled: boolean
}

/**
 * Runs a single step invocation to completion.
 */
export interface TaskRunner {
  /**
   * @throws {StepInvocationError} when the process cannot be started
   */
  invoke(invocation: Invocation, options?: InvokeOptions): Promise<InvocationResult>
}

// ---------------------------------------------------------------------------
// ToolchainProvisioner
// ---------------------------------------------------------------------------

export interface ProvisionResult {
  ok: boolean
  message: string
  exitCode?: number
  output?: string
}

/**
 * Makes a job's toolchain available before its first step.
 */
export interface ToolchainProvisioner {
  provision(request: ToolchainRequest, job: JobSpec, signal?: AbortSignal): Promise<ProvisionResult>
}
