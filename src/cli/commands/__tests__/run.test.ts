/**
 * Unit tests for the `lattice run` command
 *
 * Tests:
 *  - exit codes for success, failure, best-effort failure and usage errors
 *  - dry run listing
 *  - NDJSON streaming
 *  - skip history across runs and --no-history
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdir, writeFile, rm } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import {
  runRunAction,
  RUN_EXIT_SUCCESS,
  RUN_EXIT_FAILURE,
  RUN_EXIT_USAGE_ERROR,
} from '../run.js'
import type { RunActionOptions } from '../run.js'
import type { Invocation } from '../../../core/types.js'
import type { InvocationResult, TaskRunner } from '../../../modules/task-runner/types.js'

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

const PIPELINE = `version: '1'
name: ci
jobs:
  build:
    matrix:
      axes:
        os: [linux, mac]
    steps:
      - name: compile
        command: compile
        args: ['\${{ matrix.os }}']
  lint:
    continue_on_error: true
    steps:
      - name: lint
        run: lint
`

let testDir: string
let globalConfigDir: string

beforeEach(async () => {
  testDir = join(tmpdir(), `lattice-run-cmd-test-${String(Date.now())}-${Math.random().toString(36).slice(2)}`)
  globalConfigDir = join(testDir, 'global', '.lattice')
  await mkdir(globalConfigDir, { recursive: true })
  await writeFile(join(testDir, 'lattice.yml'), PIPELINE, 'utf-8')
})

afterEach(async () => {
  await rm(testDir, { recursive: true, force: true })
  vi.restoreAllMocks()
})

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Exit codes keyed by "command args..." or shell script */
class FakeTaskRunner implements TaskRunner {
  readonly invoked: string[] = []

  constructor(private readonly _exitCodes: Record<string, number> = {}) {}

  async invoke(invocation: Invocation): Promise<InvocationResult> {
    const key =
      invocation.kind === 'exec' ? [invocation.command, ...invocation.args].join(' ') : invocation.script
    this.invoked.push(key)
    const exitCode = this._exitCodes[key] ?? 0
    return { exitCode, stdout: '', stderr: '', durationMs: 1, timedOut: false, cancelled: false }
  }
}

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

async function run(
  overrides: Partial<RunActionOptions> = {},
): Promise<{ exitCode: number; stdout: string; stderr: string }> {
  const output = captureOutput()
  try {
    const exitCode = await runRunAction({
      projectRoot: testDir,
      globalConfigDir,
      env: {},
      color: false,
      taskRunner: new FakeTaskRunner(),
      ...overrides,
    })
    return { exitCode, stdout: output.getStdout(), stderr: output.getStderr() }
  } finally {
    output.restore()
  }
}

// ---------------------------------------------------------------------------
// Verdicts and exit codes
// ---------------------------------------------------------------------------

describe('runRunAction verdicts', () => {
  it('exits 0 and prints the report when every job succeeds', async () => {
    const runner = new FakeTaskRunner()
    const { exitCode, stdout } = await run({ taskRunner: runner })

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    expect([...runner.invoked].sort()).toEqual(['compile linux', 'compile mac', 'lint'])
    expect(stdout).toContain('Running 3 jobs (trigger: manual, concurrency: 4)\n')
    expect(stdout).toContain('→ [running] build (linux)\n')
    expect(stdout).toContain('Pipeline success: 3 succeeded, 0 failed, 0 skipped, 0 cancelled')
  })

  it('exits 1 when a required job fails', async () => {
    const { exitCode, stdout } = await run({ taskRunner: new FakeTaskRunner({ 'compile mac': 1 }) })

    expect(exitCode).toBe(RUN_EXIT_FAILURE)
    expect(stdout).toContain('Pipeline failure: 2 succeeded, 1 failed, 0 skipped, 0 cancelled')
  })

  it('exits 0 when only a best-effort job fails', async () => {
    const { exitCode, stdout } = await run({ taskRunner: new FakeTaskRunner({ lint: 1 }) })

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    expect(stdout).toContain('Pipeline success: 2 succeeded, 1 failed, 0 skipped, 0 cancelled')
  })

  it('uses the concurrency limit from the command line', async () => {
    const { stdout } = await run({ maxConcurrency: 1 })
    expect(stdout).toContain('Running 3 jobs (trigger: manual, concurrency: 1)\n')
  })
})

// ---------------------------------------------------------------------------
// Usage errors
// ---------------------------------------------------------------------------

describe('runRunAction usage errors', () => {
  it('exits 2 when the pipeline file is missing', async () => {
    const runner = new FakeTaskRunner()
    const { exitCode, stderr } = await run({ pipelineFile: 'missing.yml', taskRunner: runner })

    expect(exitCode).toBe(RUN_EXIT_USAGE_ERROR)
    expect(stderr).toContain(`Error: Pipeline file not found: ${join(testDir, 'missing.yml')}`)
    expect(runner.invoked).toEqual([])
  })

  it('exits 2 for an invalid pipeline definition', async () => {
    await writeFile(join(testDir, 'empty.yml'), "version: '1'\nname: ci\njobs: {}\n", 'utf-8')
    const { exitCode, stderr } = await run({ pipelineFile: 'empty.yml' })

    expect(exitCode).toBe(RUN_EXIT_USAGE_ERROR)
    expect(stderr).toContain('A pipeline needs at least one job')
  })

  it('exits 2 for an unknown trigger event', async () => {
    const { exitCode, stderr } = await run({ event: 'tag' })

    expect(exitCode).toBe(RUN_EXIT_USAGE_ERROR)
    expect(stderr).toContain('Unknown trigger event "tag". Expected one of: manual, pull_request, push')
  })

  it('exits 2 for an invalid concurrency limit', async () => {
    const runner = new FakeTaskRunner()
    const { exitCode, stderr } = await run({ maxConcurrency: 0, taskRunner: runner })

    expect(exitCode).toBe(RUN_EXIT_USAGE_ERROR)
    expect(stderr).toContain('Configuration validation failed')
    expect(runner.invoked).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// Dry run and output formats
// ---------------------------------------------------------------------------

describe('runRunAction output', () => {
  it('lists the expanded jobs without running them on --dry-run', async () => {
    const runner = new FakeTaskRunner()
    const { exitCode, stdout } = await run({ dryRun: true, taskRunner: runner })

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    expect(stdout).toBe(
      'Dry run: 3 jobs\n' +
        '  - build (linux): compile\n' +
        '  - build (mac): compile\n' +
        '  - lint [best-effort]: lint\n',
    )
    expect(runner.invoked).toEqual([])
  })

  it('streams NDJSON events with --output-format json', async () => {
    const { exitCode, stdout } = await run({ outputFormat: 'json' })

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    const events: Array<{ event: string; data: Record<string, unknown> }> = stdout
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line))

    expect(events[0]?.event).toBe('pipeline:start')
    expect(events[0]?.data).toMatchObject({ jobCount: 3, trigger: 'manual' })
    expect(events.at(-1)?.event).toBe('pipeline:complete')
    expect(events.at(-1)?.data).toMatchObject({ verdict: 'success', succeeded: 3 })
    expect(events.filter((e) => e.event === 'job:finished')).toHaveLength(3)
  })
})

// ---------------------------------------------------------------------------
// Skip history
// ---------------------------------------------------------------------------

describe('runRunAction skip history', () => {
  it('skips jobs of a repeated pull request run with unchanged inputs', async () => {
    const runner = new FakeTaskRunner()
    await run({ event: 'pull_request', taskRunner: runner })
    const second = await run({ event: 'pull_request', taskRunner: runner })

    expect(second.exitCode).toBe(RUN_EXIT_SUCCESS)
    expect(second.stdout).toContain('↷ [skipped] build (linux) (duplicate-of-successful-run)\n')
    expect(second.stdout).toContain('Pipeline success: 0 succeeded, 0 failed, 3 skipped, 0 cancelled')
    expect(runner.invoked).toHaveLength(3)
    expect(existsSync(join(testDir, '.lattice', 'history.db'))).toBe(true)
  })

  it('runs every job with --no-skip', async () => {
    const runner = new FakeTaskRunner()
    await run({ event: 'pull_request', taskRunner: runner })
    await run({ event: 'pull_request', taskRunner: runner, skip: false })

    expect(runner.invoked).toHaveLength(6)
  })

  it('writes no state database with --no-history', async () => {
    const runner = new FakeTaskRunner()
    await run({ event: 'pull_request', taskRunner: runner, history: false })
    await run({ event: 'pull_request', taskRunner: runner, history: false })

    expect(runner.invoked).toHaveLength(6)
    expect(existsSync(join(testDir, '.lattice', 'history.db'))).toBe(false)
  })
})
