/**
 * Pipeline builder: turns a validated PipelineFile into JobSpecs.
 *
 * Env layering is pipeline < job < step. Gates are compiled against the
 * job's axis names and the names of the steps declared before the gated one.
 */

import type {
  AxisSet,
  ExclusionRule,
  Invocation,
  JobPolicy,
  JobSpec,
  ToolchainRequest,
} from '../../core/types.js'
import { expandMatrix } from '../matrix/matrix-expander.js'
import type { StepTemplate } from '../matrix/matrix-expander.js'
import { compileGate } from '../step-gates/gate-expression.js'
import { createLogger } from '../../utils/logger.js'
import type { JobDefinition, PipelineFile, StepDefinition } from './schemas.js'

const logger = createLogger('pipeline-builder')

export interface BuildOptions {
  /** Step timeout used when neither step nor job sets one; 0 means none */
  defaultTimeoutMinutes?: number
  /** Working directory for steps without `working_directory` */
  cwd?: string
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function toAxisSet(job: JobDefinition): AxisSet {
  return Object.entries(job.matrix?.axes ?? {}).map(([name, variants]) => ({ name, variants }))
}

export function toExclusions(job: JobDefinition): ExclusionRule[] {
  return job.matrix?.exclude ?? []
}

export function jobPolicy(job: JobDefinition): JobPolicy {
  return job.continue_on_error ? 'best-effort' : job.policy
}

function minutesToMs(minutes: number | undefined): number | undefined {
  if (minutes === undefined || minutes === 0) return undefined
  return Math.round(minutes * 60_000)
}

function stepInvocation(
  step: StepDefinition,
  env: Record<string, string>,
  timeoutMs: number | undefined,
  cwd: string | undefined,
): Invocation {
  const workingDirectory = step.working_directory ?? cwd
  const base = {
    env,
    ...(workingDirectory !== undefined && { cwd: workingDirectory }),
    ...(timeoutMs !== undefined && { timeoutMs }),
  }
  if (step.run !== undefined) {
    return { kind: 'shell', script: step.run, ...base }
  }
  return { kind: 'exec', command: step.command ?? '', args: step.args, ...base }
}

function toolchainRequest(
  job: JobDefinition,
  env: Record<string, string>,
  cwd: string | undefined,
): ToolchainRequest | undefined {
  const toolchain = job.toolchain
  if (toolchain === undefined) return undefined

  const request: ToolchainRequest = {
    name: toolchain.name,
    components: toolchain.components,
    targets: toolchain.targets,
  }
  const setup = toolchain.setup
  if (setup === undefined) return request

  const base = { env, ...(cwd !== undefined && { cwd }) }
  const invocation: Invocation =
    typeof setup === 'string'
      ? { kind: 'shell', script: setup, ...base }
      : { kind: 'exec', command: setup.command, args: setup.args, ...base }
  return { ...request, setup: invocation }
}

// ---------------------------------------------------------------------------
// buildJobs
// ---------------------------------------------------------------------------

/**
 * Expand every job group of the pipeline, in declaration order.
 *
 * @throws {InvalidAxisSetError} / {InvalidExclusionRuleError} for a bad matrix
 * @throws {InvalidGateExpressionError} for a bad `if:` expression
 */
export function buildJobs(pipeline: PipelineFile, options: BuildOptions = {}): JobSpec[] {
  const jobs: JobSpec[] = []

  for (const [group, definition] of Object.entries(pipeline.jobs)) {
    const axisSet = toAxisSet(definition)
    const axisNames = axisSet.map((axis) => axis.name)
    const jobEnv = { ...pipeline.env, ...definition.env }

    const steps: StepTemplate[] = definition.steps.map((step, index) => {
      const earlier = definition.steps.slice(0, index).map((s) => s.name)
      const timeoutMs = minutesToMs(step.timeout_minutes ?? definition.timeout_minutes ?? options.defaultTimeoutMinutes)
      return {
        name: step.name,
        gate: compileGate(step.if, { axisNames, stepNames: earlier }),
        invocation: stepInvocation(step, { ...jobEnv, ...step.env }, timeoutMs, options.cwd),
      }
    })

    const toolchain = toolchainRequest(definition, jobEnv, options.cwd)
    const expanded = expandMatrix(axisSet, toExclusions(definition), {
      pipeline: pipeline.name,
      group,
      policy: jobPolicy(definition),
      failFast: definition.fail_fast,
      steps,
      ...(toolchain !== undefined && { toolchain }),
    })

    logger.debug({ group, jobs: expanded.length }, 'Expanded job group')
    jobs.push(...expanded)
  }

  return jobs
}
