/**
 * `lattice history` command
 *
 * Lists recorded pipeline runs, most recent first.
 *
 * Usage:
 *   lattice history                        Last 20 runs of every pipeline
 *   lattice history --pipeline <name>      Runs of one pipeline
 *   lattice history --limit <n>            Number of runs to list
 *   lattice history --output-format json   JSON output
 *
 * Exit codes:
 *   0 - Success (including empty result)
 *   1 - Error (query error, invalid option)
 *   2 - Configuration error
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { runMigrations } from '../../persistence/migrations/index.js'
import { listRunSummaries } from '../../persistence/queries/run-summaries.js'
import type { RunSummary } from '../../persistence/queries/run-summaries.js'
import { formatDuration } from '../../utils/helpers.js'
import { buildJsonOutput, formatTable } from '../utils/formatting.js'

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const HISTORY_EXIT_SUCCESS = 0
export const HISTORY_EXIT_ERROR = 1
export const HISTORY_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryActionOptions {
  pipeline?: string
  limit: number
  outputFormat: 'table' | 'json'
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  version?: string
}

// ---------------------------------------------------------------------------
// Table formatter
// ---------------------------------------------------------------------------

/**
 * Format run summaries as a human-readable table.
 *
 * Columns: Started, Pipeline, Trigger, Ref, Verdict, Jobs (ok/failed/skipped/cancelled), Duration
 */
export function formatHistoryTable(runs: RunSummary[]): string {
  const headers = ['Started', 'Pipeline', 'Trigger', 'Ref', 'Verdict', 'Jobs', 'Duration']
  const keys = ['started_at', 'pipeline', 'trigger_kind', 'ref', 'verdict', 'jobs', 'duration']

  const rows: Record<string, string>[] = runs.map((run) => ({
    started_at: run.started_at,
    pipeline: run.pipeline,
    trigger_kind: run.trigger_kind,
    ref: run.ref !== '' ? run.ref : '-',
    verdict: run.verdict,
    jobs: `${String(run.succeeded)}/${String(run.failed)}/${String(run.skipped)}/${String(run.cancelled)}`,
    duration: formatDuration(run.duration_ms),
  }))

  return formatTable(headers, rows, keys)
}

// ---------------------------------------------------------------------------
// runHistoryAction: testable core logic
// ---------------------------------------------------------------------------

export async function runHistoryAction(options: HistoryActionOptions): Promise<number> {
  const { projectRoot, outputFormat, limit, version = '0.0.0' } = options

  if (outputFormat !== 'table' && outputFormat !== 'json') {
    process.stderr.write(`Error: Invalid output format '${String(outputFormat)}'. Valid formats: table, json\n`)
    return HISTORY_EXIT_ERROR
  }
  if (!Number.isInteger(limit) || limit < 1) {
    process.stderr.write(`Error: --limit must be a positive integer, got ${String(limit)}\n`)
    return HISTORY_EXIT_ERROR
  }

  const system = createConfigSystem({
    projectConfigDir: options.projectConfigDir ?? join(projectRoot, '.lattice'),
    ...(options.globalConfigDir !== undefined && { globalConfigDir: options.globalConfigDir }),
    ...(options.env !== undefined && { env: options.env }),
  })
  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return HISTORY_EXIT_INVALID
    }
    throw err
  }

  const dbPath = join(resolve(projectRoot, system.getConfig().global.state_dir), 'history.db')
  let runs: RunSummary[] = []

  if (existsSync(dbPath)) {
    const wrapper = new DatabaseWrapper(dbPath)
    try {
      wrapper.open()
      runMigrations(wrapper.db)
      runs = listRunSummaries(wrapper.db, {
        limit,
        ...(options.pipeline !== undefined && { pipeline: options.pipeline }),
      })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      process.stderr.write(`Error: ${message}\n`)
      return HISTORY_EXIT_ERROR
    } finally {
      wrapper.close()
    }
  }

  if (outputFormat === 'json') {
    process.stdout.write(JSON.stringify(buildJsonOutput('lattice history', runs, version), null, 2) + '\n')
  } else if (runs.length === 0) {
    process.stdout.write('No runs recorded\n')
  } else {
    process.stdout.write(formatHistoryTable(runs) + '\n')
  }

  return HISTORY_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// registerHistoryCommand
// ---------------------------------------------------------------------------

export function registerHistoryCommand(program: Command, version = '0.0.0', projectRoot = process.cwd()): void {
  program
    .command('history')
    .description('List recorded pipeline runs, most recent first')
    .option('--pipeline <name>', 'Only runs of this pipeline')
    .option('--limit <n>', 'Number of runs to list', (value: string) => Number(value), 20)
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .action(async (opts: { pipeline?: string; limit: number; outputFormat: string }) => {
      const outputFormat = opts.outputFormat === 'json' ? 'json' : opts.outputFormat === 'table' ? 'table' : null
      if (outputFormat === null) {
        process.stderr.write(`Error: Invalid output format '${opts.outputFormat}'. Valid formats: table, json\n`)
        process.exitCode = HISTORY_EXIT_ERROR
        return
      }
      process.exitCode = await runHistoryAction({
        ...(opts.pipeline !== undefined && { pipeline: opts.pipeline }),
        limit: opts.limit,
        outputFormat,
        projectRoot,
        version,
      })
    })
}
