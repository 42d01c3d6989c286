/**
 * Unit tests for the `lattice history` command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  formatHistoryTable,
  runHistoryAction,
  HISTORY_EXIT_SUCCESS,
  HISTORY_EXIT_ERROR,
} from '../history.js'
import type { HistoryActionOptions } from '../history.js'
import { runRunAction } from '../run.js'
import { DatabaseWrapper } from '../../../persistence/database.js'
import { runMigrations } from '../../../persistence/migrations/index.js'
import { insertRunSummary } from '../../../persistence/queries/run-summaries.js'
import type { RunSummary } from '../../../persistence/queries/run-summaries.js'
import type { InvocationResult, TaskRunner } from '../../../modules/task-runner/types.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

let testDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `lattice-history-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  globalConfigDir = join(testDir, 'global', '.lattice')
  await mkdir(globalConfigDir, { recursive: true })
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function captureOutput(): { getStdout: () => string; getStderr: () => string; restore: () => void } {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : data.toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : data.toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

async function history(
  overrides: Partial<HistoryActionOptions> = {},
): Promise<{ exitCode: number; stdout: string; stderr: string }> {
  const output = captureOutput()
  try {
    const exitCode = await runHistoryAction({
      limit: 20,
      outputFormat: 'table',
      projectRoot: testDir,
      globalConfigDir,
      env: {},
      version: '1.2.3',
      ...overrides,
    })
    return { exitCode, stdout: output.getStdout(), stderr: output.getStderr() }
  } finally {
    output.restore()
  }
}

function makeSummary(overrides: Partial<RunSummary> = {}): RunSummary {
  return {
    id: 'run-1',
    pipeline: 'ci',
    trigger_kind: 'push',
    ref: '',
    fingerprint: 'fp-1',
    verdict: 'success',
    succeeded: 3,
    failed: 0,
    skipped: 1,
    cancelled: 0,
    duration_ms: 1500,
    started_at: '2026-01-02T03:04:05.000Z',
    ...overrides,
  }
}

function seed(summaries: RunSummary[]): void {
  const wrapper = new DatabaseWrapper(join(testDir, '.lattice', 'history.db'))
  wrapper.open()
  try {
    runMigrations(wrapper.db)
    for (const summary of summaries) insertRunSummary(wrapper.db, summary)
  } finally {
    wrapper.close()
  }
}

function parseRuns(stdout: string): RunSummary[] {
  const parsed: { data: RunSummary[] } = JSON.parse(stdout)
  return parsed.data
}

// ---------------------------------------------------------------------------
// formatHistoryTable
// ---------------------------------------------------------------------------

describe('formatHistoryTable', () => {
  it('renders one aligned row per run', () => {
    const table = formatHistoryTable([makeSummary()])
    const separator = ['-'.repeat(24), '-'.repeat(8), '-'.repeat(7), '---', '-'.repeat(7), '-'.repeat(7), '-'.repeat(8)].join(
      '-+-',
    )

    expect(table.split('\n')).toEqual([
      'Started                  | Pipeline | Trigger | Ref | Verdict | Jobs    | Duration',
      separator,
      '2026-01-02T03:04:05.000Z | ci       | push    | -   | success | 3/0/1/0 | 1.5s    ',
    ])
  })
})

// ---------------------------------------------------------------------------
// runHistoryAction
// ---------------------------------------------------------------------------

describe('runHistoryAction', () => {
  it('reports no runs when no state database exists', async () => {
    const { exitCode, stdout } = await history()

    expect(exitCode).toBe(HISTORY_EXIT_SUCCESS)
    expect(stdout).toBe('No runs recorded\n')
  })

  it('lists runs most recent first as JSON', async () => {
    seed([
      makeSummary({ id: 'run-old', started_at: '2026-01-01T00:00:00.000Z' }),
      makeSummary({ id: 'run-new', started_at: '2026-01-03T00:00:00.000Z' }),
    ])
    const { exitCode, stdout } = await history({ outputFormat: 'json' })

    expect(exitCode).toBe(HISTORY_EXIT_SUCCESS)
    const parsed: { command: string; version: string } = JSON.parse(stdout)
    expect(parsed.command).toBe('lattice history')
    expect(parsed.version).toBe('1.2.3')
    expect(parseRuns(stdout).map((run) => run.id)).toEqual(['run-new', 'run-old'])
  })

  it('filters by pipeline and honours the limit', async () => {
    seed([
      makeSummary({ id: 'a-1', pipeline: 'a', started_at: '2026-01-01T00:00:00.000Z' }),
      makeSummary({ id: 'b-1', pipeline: 'b', started_at: '2026-01-02T00:00:00.000Z' }),
      makeSummary({ id: 'a-2', pipeline: 'a', started_at: '2026-01-03T00:00:00.000Z' }),
    ])

    const filtered = await history({ outputFormat: 'json', pipeline: 'a' })
    expect(parseRuns(filtered.stdout).map((run) => run.id)).toEqual(['a-2', 'a-1'])

    const limited = await history({ outputFormat: 'json', limit: 1 })
    expect(parseRuns(limited.stdout).map((run) => run.id)).toEqual(['a-2'])
  })

  it('rejects a non-positive limit', async () => {
    const { exitCode, stderr } = await history({ limit: 0 })

    expect(exitCode).toBe(HISTORY_EXIT_ERROR)
    expect(stderr).toBe('Error: --limit must be a positive integer, got 0\n')
  })

  it('lists the summary recorded by lattice run', async () => {
    const runner: TaskRunner = {
      invoke: async (): Promise<InvocationResult> => ({
        exitCode: 0,
        stdout: '',
        stderr: '',
        durationMs: 1,
        timedOut: false,
        cancelled: false,
      }),
    }
    await writeFile(
      join(testDir, 'lattice.yml'),
      "version: '1'\nname: nightly\njobs:\n  test:\n    steps:\n      - name: test\n        run: make test\n",
      'utf-8',
    )

    const output = captureOutput()
    try {
      await runRunAction({
        projectRoot: testDir,
        globalConfigDir,
        env: {},
        event: 'push',
        ref: 'refs/heads/main',
        taskRunner: runner,
        color: false,
        handleSignals: false,
      })
    } finally {
      output.restore()
    }

    const { stdout } = await history({ outputFormat: 'json' })
    const runs = parseRuns(stdout)
    expect(runs).toHaveLength(1)
    expect(runs[0]).toMatchObject({
      pipeline: 'nightly',
      trigger_kind: 'push',
      ref: 'refs/heads/main',
      verdict: 'success',
      succeeded: 1,
      failed: 0,
      skipped: 0,
      cancelled: 0,
    })
  })
})
