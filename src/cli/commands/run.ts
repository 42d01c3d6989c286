/**
 * `lattice run` command
 *
 * Loads the pipeline definition, expands the job matrix and runs every job
 * to a verdict.
 *
 * Exit codes:
 *   0   pipeline verdict success
 *   1   pipeline verdict failure
 *   2   configuration or usage error (no job started)
 *   3   unexpected system error
 *   130 interrupted by SIGINT/SIGTERM
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { isAbsolute, join, resolve } from 'node:path'
import { isConfigurationError } from '../../core/errors.js'
import { createOrchestrator } from '../../core/orchestrator-impl.js'
import type { Orchestrator } from '../../core/orchestrator.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { JobSpec, TriggerContext } from '../../core/types.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { LatticeConfig, PartialLatticeConfig } from '../../modules/config/config-schema.js'
import { loadPipeline } from '../../modules/pipeline-definition/pipeline-validator.js'
import { buildJobs } from '../../modules/pipeline-definition/pipeline-builder.js'
import { resolveTrigger } from '../../modules/pipeline-definition/trigger.js'
import { formatReport } from '../../modules/result-aggregator/result-aggregator.js'
import type { TaskRunner } from '../../modules/task-runner/types.js'
import { INTERRUPTED_EXIT_CODE, setupGracefulShutdown } from '../../recovery/shutdown-handler.js'
import { supportsColor } from '../../utils/ansi.js'
import { formatDuration } from '../../utils/helpers.js'
import { createLogger, setLogLevel } from '../../utils/logger.js'
import { emitEvent, streamEvents } from '../formatters/streaming.js'

const logger = createLogger('run-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const RUN_EXIT_SUCCESS = 0
export const RUN_EXIT_FAILURE = 1
export const RUN_EXIT_USAGE_ERROR = 2
export const RUN_EXIT_SYSTEM_ERROR = 3
export const RUN_EXIT_INTERRUPTED = INTERRUPTED_EXIT_CODE

/** Pipeline file used when --pipeline is not given */
export const DEFAULT_PIPELINE_FILE = 'lattice.yml'

export type RunOutputFormat = 'text' | 'json'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RunActionOptions {
  /** Pipeline definition path, relative to projectRoot. Default: lattice.yml */
  pipelineFile?: string
  /** Trigger kind (manual, pull_request, push) */
  event?: string
  ref?: string
  maxConcurrency?: number
  failFast?: boolean
  /** False disables skipping for this run */
  skip?: boolean
  /** False keeps skip history in memory and records no run summary */
  history?: boolean
  dryRun?: boolean
  outputFormat?: RunOutputFormat
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  /** Replaces the child-process runner */
  taskRunner?: TaskRunner
  /** Colored report; default follows whether stdout is a TTY and NO_COLOR is unset */
  color?: boolean
  /** Install SIGINT/SIGTERM handlers for the run. Default: true */
  handleSignals?: boolean
}

function cliOverrides(options: RunActionOptions): PartialLatticeConfig {
  return {
    global: {
      ...(options.maxConcurrency !== undefined && { max_concurrent_jobs: options.maxConcurrency }),
      ...(options.failFast === true && { fail_fast: true }),
    },
    ...(options.skip === false && { skip: { enabled: false } }),
  }
}

function resolvePath(root: string, path: string): string {
  return isAbsolute(path) ? path : join(root, path)
}

// ---------------------------------------------------------------------------
// Human-readable progress
// ---------------------------------------------------------------------------

function printProgress(eventBus: TypedEventBus): void {
  eventBus.on('pipeline:start', ({ jobCount, concurrencyLimit, trigger }) => {
    process.stdout.write(`Running ${String(jobCount)} jobs (trigger: ${trigger}, concurrency: ${String(concurrencyLimit)})\n`)
  })
  eventBus.on('job:started', ({ jobId }) => {
    process.stdout.write(`→ [running] ${jobId}\n`)
  })
  eventBus.on('job:skipped', ({ jobId, decision }) => {
    process.stdout.write(`↷ [skipped] ${jobId} (${decision.reason})\n`)
  })
  eventBus.on('job:finished', ({ jobId, status, durationMs, failedStep }) => {
    if (status === 'skipped') return
    const suffix = failedStep !== undefined ? ` (step: ${failedStep})` : ''
    const icon = status === 'succeeded' ? '✓' : status === 'failed' ? '✗' : '⊘'
    process.stdout.write(`${icon} [${status}] ${jobId} ${formatDuration(durationMs)}${suffix}\n`)
  })
}

function printDryRun(jobs: readonly JobSpec[], outputFormat: RunOutputFormat): void {
  if (outputFormat === 'json') {
    emitEvent('pipeline:plan', {
      jobs: jobs.map((job) => ({
        id: job.id,
        group: job.group,
        policy: job.policy,
        variants: job.variants,
        steps: job.steps.map((step) => step.name),
      })),
    })
    return
  }
  process.stdout.write(`Dry run: ${String(jobs.length)} jobs\n`)
  for (const job of jobs) {
    const policy = job.policy === 'best-effort' ? ' [best-effort]' : ''
    process.stdout.write(`  - ${job.id}${policy}: ${job.steps.map((step) => step.name).join(', ')}\n`)
  }
}

// ---------------------------------------------------------------------------
// runRunAction
// ---------------------------------------------------------------------------

export async function runRunAction(options: RunActionOptions): Promise<number> {
  const { projectRoot } = options
  const outputFormat = options.outputFormat ?? 'text'
  const env = options.env ?? process.env

  // Configuration, pipeline and trigger: any error here is a usage error
  let config: LatticeConfig
  let jobs: JobSpec[]
  let pipelineName: string
  let pipelineSkipEnabled: boolean
  let trigger: TriggerContext
  try {
    const system = createConfigSystem({
      projectConfigDir: options.projectConfigDir ?? join(projectRoot, '.lattice'),
      ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
      cliOverrides: cliOverrides(options),
      env,
    })
    await system.load()
    config = system.getConfig()
    setLogLevel(config.global.log_level)

    const pipelinePath = resolvePath(projectRoot, options.pipelineFile ?? DEFAULT_PIPELINE_FILE)
    if (!existsSync(pipelinePath)) {
      process.stderr.write(`Error: Pipeline file not found: ${pipelinePath}\n`)
      return RUN_EXIT_USAGE_ERROR
    }

    const pipeline = loadPipeline(pipelinePath)
    pipelineName = pipeline.name
    pipelineSkipEnabled = pipeline.skip.enabled
    jobs = buildJobs(pipeline, { defaultTimeoutMinutes: config.runner.default_timeout_minutes, cwd: projectRoot })
    trigger = await resolveTrigger({
      pipeline,
      root: projectRoot,
      ...(options.event !== undefined && { event: options.event }),
      ...(options.ref !== undefined && { ref: options.ref }),
      doNotSkip: config.skip.do_not_skip,
      env,
    })
  } catch (err) {
    if (isConfigurationError(err)) {
      process.stderr.write(`Error: ${err.message}\n`)
      return RUN_EXIT_USAGE_ERROR
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to prepare pipeline run')
    process.stderr.write(`Error: ${message}\n`)
    return RUN_EXIT_SYSTEM_ERROR
  }

  if (options.dryRun === true) {
    printDryRun(jobs, outputFormat)
    return RUN_EXIT_SUCCESS
  }

  let orchestrator: Orchestrator | null = null
  let cleanupShutdown: (() => void) | null = null
  try {
    const stateDir = resolve(projectRoot, config.global.state_dir)
    orchestrator = await createOrchestrator({
      databasePath: options.history === false ? null : join(stateDir, 'history.db'),
      projectRoot,
      maxConcurrency: config.global.max_concurrent_jobs,
      failFast: config.global.fail_fast,
      skip: { enabled: config.skip.enabled && pipelineSkipEnabled },
      killGraceMs: config.runner.kill_grace_ms,
      outputTailLines: config.runner.output_tail_lines,
      ...(options.taskRunner !== undefined && { taskRunner: options.taskRunner }),
    })

    if (options.handleSignals !== false) {
      cleanupShutdown = setupGracefulShutdown({ orchestrator })
    }

    if (outputFormat === 'json') {
      streamEvents(orchestrator.eventBus)
    } else {
      printProgress(orchestrator.eventBus)
    }

    const outcome = await orchestrator.run({ pipeline: pipelineName, jobs, trigger })

    if (outputFormat === 'text') {
      const color = options.color ?? supportsColor(process.stdout.isTTY === true)
      process.stdout.write(`\n${formatReport(outcome.verdict, { color })}\n`)
    }

    if (outcome.interrupted) return RUN_EXIT_INTERRUPTED
    return outcome.verdict.verdict === 'success' ? RUN_EXIT_SUCCESS : RUN_EXIT_FAILURE
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Pipeline run failed')
    process.stderr.write(`Error: ${message}\n`)
    return RUN_EXIT_SYSTEM_ERROR
  } finally {
    cleanupShutdown?.()
    await orchestrator?.shutdown()
  }
}

// ---------------------------------------------------------------------------
// registerRunCommand
// ---------------------------------------------------------------------------

function parseConcurrency(value: string): number {
  return Number(value)
}

/**
 * Register the `lattice run` command with the CLI program.
 *
 * @param program     - Commander program instance
 * @param projectRoot - Project root directory (defaults to process.cwd())
 */
export function registerRunCommand(program: Command, projectRoot = process.cwd()): void {
  program
    .command('run')
    .description('Run a pipeline definition')
    .option('-p, --pipeline <file>', 'Pipeline definition file (YAML or JSON)', DEFAULT_PIPELINE_FILE)
    .option('--event <kind>', 'Trigger kind: manual, pull_request or push')
    .option('--ref <ref>', 'Ref being built, included in the fingerprint')
    .option('--max-concurrency <n>', 'Maximum number of concurrent jobs', parseConcurrency)
    .option('--fail-fast', 'Cancel required jobs after the first required failure')
    .option('--no-skip', 'Run every job even when a previous run succeeded with the same inputs')
    .option('--no-history', 'Keep skip history in memory and record no run summary')
    .option('--dry-run', 'Validate and list the expanded jobs without running them', false)
    .option('--output-format <format>', 'Output format: text (default) or json (NDJSON streaming)', 'text')
    .action(
      async (opts: {
        pipeline: string
        event?: string
        ref?: string
        maxConcurrency?: number
        failFast?: boolean
        skip: boolean
        history: boolean
        dryRun: boolean
        outputFormat: string
      }) => {
        if (opts.outputFormat !== 'text' && opts.outputFormat !== 'json') {
          process.stderr.write(`Error: Unknown output format "${opts.outputFormat}". Expected text or json\n`)
          process.exitCode = RUN_EXIT_USAGE_ERROR
          return
        }

        const exitCode = await runRunAction({
          pipelineFile: opts.pipeline,
          ...(opts.event !== undefined && { event: opts.event }),
          ...(opts.ref !== undefined && { ref: opts.ref }),
          ...(opts.maxConcurrency !== undefined && { maxConcurrency: opts.maxConcurrency }),
          ...(opts.failFast === true && { failFast: true }),
          skip: opts.skip,
          history: opts.history,
          dryRun: opts.dryRun,
          outputFormat: opts.outputFormat,
          projectRoot,
        })

        process.exitCode = exitCode
      },
    )
}
