/**
 * OrchestratorImpl: concrete implementation of the Orchestrator interface.
 *
 * The createOrchestrator() factory:
 *  1. Instantiates the TypedEventBus
 *  2. Creates the state database service (when a path is configured)
 *  3. Creates the history store, task runner, provisioner and dispatcher
 *  4. Registers owned services in the ServiceRegistry and initializes them
 *
 * Signal handling lives in recovery/shutdown-handler.ts; the CLI connects a
 * signal to `cancel()`, and the run resolves with `interrupted: true`.
 */

import { createLogger } from '../utils/logger.js'
import { generateId } from '../utils/helpers.js'
import { createEventBus } from './event-bus.js'
import { ServiceRegistry } from './di.js'
import type { TypedEventBus } from './event-bus.js'
import type { Orchestrator, OrchestratorConfig, PipelineOutcome, PipelineRunRequest } from './orchestrator.js'
import { createDatabaseService } from '../persistence/database.js'
import type { DatabaseService } from '../persistence/database.js'
import { insertRunSummary, listRunSummaries } from '../persistence/queries/run-summaries.js'
import type { RunSummary } from '../persistence/queries/run-summaries.js'
import { createDispatcher } from '../modules/dispatcher/dispatcher.js'
import type { Dispatcher } from '../modules/dispatcher/dispatcher.js'
import { aggregate } from '../modules/result-aggregator/result-aggregator.js'
import { InMemoryHistoryStore } from '../modules/skip-history/history-store.js'
import { createSqliteHistoryStore } from '../modules/skip-history/sqlite-history-store.js'
import { createProcessTaskRunner } from '../modules/task-runner/process-task-runner.js'
import { createToolchainProvisioner } from '../modules/task-runner/toolchain-provisioner.js'

const logger = createLogger('orchestrator')

const DEFAULT_MAX_CONCURRENCY = 4

// ---------------------------------------------------------------------------
// OrchestratorImpl
// ---------------------------------------------------------------------------

/** Internal symbol used to expose lifecycle hooks to the factory only */
const INTERNAL = Symbol('OrchestratorImpl.internal')

class OrchestratorImpl implements Orchestrator {
  readonly eventBus: TypedEventBus
  private readonly _registry: ServiceRegistry
  private readonly _dispatcher: Dispatcher
  private readonly _database: DatabaseService | null
  private readonly _config: OrchestratorConfig
  private _ready = false
  private _shutdown = false
  private _running = false
  private _interrupted = false

  constructor(
    eventBus: TypedEventBus,
    registry: ServiceRegistry,
    dispatcher: Dispatcher,
    database: DatabaseService | null,
    config: OrchestratorConfig,
  ) {
    this.eventBus = eventBus
    this._registry = registry
    this._dispatcher = dispatcher
    this._database = database
    this._config = config
  }

  get isReady(): boolean {
    return this._ready
  }

  async run(request: PipelineRunRequest): Promise<PipelineOutcome> {
    if (!this._ready || this._shutdown) {
      throw new Error('Orchestrator is not ready')
    }
    if (this._running) {
      throw new Error('A pipeline run is already in progress')
    }
    this._running = true
    this._interrupted = false

    const concurrencyLimit = this._config.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY
    const startedAt = Date.now()
    const runId = generateId('run')
    const { trigger } = request

    logger.info({ runId, pipeline: request.pipeline, jobs: request.jobs.length }, 'Pipeline run started')
    this.eventBus.emit('pipeline:start', {
      jobCount: request.jobs.length,
      concurrencyLimit,
      trigger: trigger.kind,
      fingerprint: trigger.fingerprint,
    })

    try {
      const results = await this._dispatcher.run(request.jobs, trigger, {
        concurrencyLimit,
        failFast: this._config.failFast ?? false,
      })
      const verdict = aggregate(results)
      const durationMs = Date.now() - startedAt

      this.eventBus.emit('pipeline:complete', {
        verdict: verdict.verdict,
        ...verdict.counts,
        durationMs,
      })

      this._recordSummary({
        id: runId,
        pipeline: request.pipeline,
        trigger_kind: trigger.kind,
        ref: trigger.ref,
        fingerprint: trigger.fingerprint,
        verdict: this._interrupted ? 'interrupted' : verdict.verdict,
        succeeded: verdict.counts.succeeded,
        failed: verdict.counts.failed,
        skipped: verdict.counts.skipped,
        cancelled: verdict.counts.cancelled,
        duration_ms: durationMs,
        started_at: new Date(startedAt).toISOString(),
      })

      logger.info({ runId, verdict: verdict.verdict, durationMs }, 'Pipeline run finished')
      return { runId, verdict, results, durationMs, interrupted: this._interrupted }
    } finally {
      this._running = false
    }
  }

  cancel(reason: string): void {
    if (!this._running) return
    this._interrupted = true
    logger.info({ reason }, 'Cancelling pipeline run')
    this._dispatcher.cancelAll(reason)
  }

  listRuns(options: { pipeline?: string; limit?: number } = {}): RunSummary[] {
    if (this._database === null) return []
    return listRunSummaries(this._database.db, options)
  }

  async shutdown(): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    logger.debug('Orchestrator shutdown initiated')
    try {
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during orchestrator shutdown')
    }
  }

  private _recordSummary(summary: RunSummary): void {
    if (this._database === null) return
    try {
      insertRunSummary(this._database.db, summary)
    } catch (err) {
      logger.warn({ err, runId: summary.id }, 'Failed to record run summary')
    }
  }

  /**
   * Internal accessor used exclusively by the createOrchestrator factory.
   * @internal
   */
  [INTERNAL](): { markReady: () => void } {
    return {
      markReady: () => {
        this._ready = true
      },
    }
  }
}

// ---------------------------------------------------------------------------
// createOrchestrator factory
// ---------------------------------------------------------------------------

/**
 * Initialize the orchestrator with all modules wired via dependency injection.
 *
 * @throws the first service initialization error (e.g. an unreadable state database)
 */
export async function createOrchestrator(config: OrchestratorConfig): Promise<Orchestrator> {
  logger.debug({ databasePath: config.databasePath }, 'Initializing orchestrator')

  const eventBus = createEventBus()
  const registry = new ServiceRegistry()

  const database = config.databasePath !== null ? createDatabaseService(config.databasePath) : null
  if (database !== null) registry.register('database', database)

  const history = database !== null ? createSqliteHistoryStore(database) : new InMemoryHistoryStore()
  const taskRunner =
    config.taskRunner ??
    createProcessTaskRunner({
      cwd: config.projectRoot,
      ...(config.killGraceMs !== undefined && { killGraceMs: config.killGraceMs }),
    })
  const provisioner = config.provisioner ?? createToolchainProvisioner(taskRunner)

  const dispatcher = createDispatcher({
    taskRunner,
    provisioner,
    history,
    eventBus,
    ...(config.skip !== undefined && { skip: config.skip }),
    ...(config.outputTailLines !== undefined && { outputTailLines: config.outputTailLines }),
  })

  const orchestrator = new OrchestratorImpl(eventBus, registry, dispatcher, database, config)

  try {
    await registry.initializeAll()
  } catch (err) {
    logger.error({ err }, 'Service initialization failed; cleaning up')
    try {
      await registry.shutdownAll()
    } catch (shutdownErr) {
      logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
    }
    throw err
  }

  orchestrator[INTERNAL]().markReady()
  logger.debug('Orchestrator ready')
  return orchestrator
}
