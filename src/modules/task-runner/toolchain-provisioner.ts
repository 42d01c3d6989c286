/**
 * CommandToolchainProvisioner: provisions a toolchain by running its
 * `setup` command through the TaskRunner.
 */

import { StepInvocationError } from '../../core/errors.js'
import type { JobSpec, ToolchainRequest } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { InvocationResult, ProvisionResult, TaskRunner, ToolchainProvisioner } from './types.js'

const logger = createLogger('task-runner:toolchain')

function toolchainLabel(request: ToolchainRequest): string {
  const extras = [...request.components, ...request.targets]
  return extras.length > 0 ? `${request.name} (${extras.join(', ')})` : request.name
}

export class CommandToolchainProvisioner implements ToolchainProvisioner {
  private readonly _runner: TaskRunner

  constructor(runner: TaskRunner) {
    this._runner = runner
  }

  async provision(request: ToolchainRequest, job: JobSpec, signal?: AbortSignal): Promise<ProvisionResult> {
    const name = toolchainLabel(request)

    if (request.setup === undefined) {
      return { ok: true, message: `Toolchain ${name} has no setup command` }
    }

    logger.debug({ jobId: job.id, toolchain: name }, 'Provisioning toolchain')

    let result: InvocationResult
    try {
      result = await this._runner.invoke(request.setup, signal !== undefined ? { signal } : {})
    } catch (err) {
      if (err instanceof StepInvocationError) {
        return { ok: false, message: `Toolchain ${name} setup could not start: ${err.message}` }
      }
      throw err
    }

    const output = `${result.stdout}${result.stderr}`
    if (result.cancelled) {
      return { ok: false, message: `Toolchain ${name} setup was cancelled`, exitCode: result.exitCode, output }
    }
    if (result.exitCode !== 0) {
      return {
        ok: false,
        message: `Toolchain ${name} setup exited with code ${result.exitCode}`,
        exitCode: result.exitCode,
        output,
      }
    }
    return { ok: true, message: `Toolchain ${name} ready`, exitCode: 0, output }
  }
}

export function createToolchainProvisioner(runner: TaskRunner): ToolchainProvisioner {
  return new CommandToolchainProvisioner(runner)
}
