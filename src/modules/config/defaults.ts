/**
 * Built-in default values for the Lattice configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import type { GlobalSettings, LatticeConfig, RunnerSettings, SkipSettings } from './config-schema.js'

export const DEFAULT_GLOBAL_SETTINGS: GlobalSettings = {
  log_level: 'warn',
  max_concurrent_jobs: 4,
  fail_fast: false,
  state_dir: '.lattice',
}

export const DEFAULT_RUNNER_SETTINGS: RunnerSettings = {
  kill_grace_ms: 5000,
  default_timeout_minutes: 0,
  output_tail_lines: 50,
}

export const DEFAULT_SKIP_SETTINGS: SkipSettings = {
  enabled: true,
  do_not_skip: ['manual', 'push'],
}

export const DEFAULT_CONFIG: LatticeConfig = {
  config_format_version: '1',
  global: DEFAULT_GLOBAL_SETTINGS,
  runner: DEFAULT_RUNNER_SETTINGS,
  skip: DEFAULT_SKIP_SETTINGS,
}
