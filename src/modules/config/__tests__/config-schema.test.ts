/**
 * Unit tests for config-schema.ts
 */

import { describe, it, expect } from 'vitest'
import {
  GlobalSettingsSchema,
  LatticeConfigSchema,
  PartialLatticeConfigSchema,
  RunnerSettingsSchema,
  SkipSettingsSchema,
} from '../config-schema.js'
import { DEFAULT_CONFIG } from '../defaults.js'

describe('LatticeConfigSchema', () => {
  it('accepts the defaults', () => {
    expect(LatticeConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true)
  })

  it('requires every section', () => {
    const { runner: _runner, ...rest } = DEFAULT_CONFIG
    expect(LatticeConfigSchema.safeParse(rest).success).toBe(false)
  })

  it('rejects an unknown config format version', () => {
    expect(LatticeConfigSchema.safeParse({ ...DEFAULT_CONFIG, config_format_version: '2' }).success).toBe(false)
  })
})

describe('GlobalSettingsSchema', () => {
  it.each([0, 65, 1.5])('rejects max_concurrent_jobs %s', (value) => {
    expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_CONFIG.global, max_concurrent_jobs: value }).success).toBe(false)
  })

  it.each([1, 64])('accepts max_concurrent_jobs %s', (value) => {
    expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_CONFIG.global, max_concurrent_jobs: value }).success).toBe(true)
  })

  it('rejects an unknown log level', () => {
    expect(GlobalSettingsSchema.safeParse({ ...DEFAULT_CONFIG.global, log_level: 'loud' }).success).toBe(false)
  })
})

describe('RunnerSettingsSchema', () => {
  it('allows a zero timeout and rejects a negative grace period', () => {
    expect(RunnerSettingsSchema.safeParse({ ...DEFAULT_CONFIG.runner, default_timeout_minutes: 0 }).success).toBe(true)
    expect(RunnerSettingsSchema.safeParse({ ...DEFAULT_CONFIG.runner, kill_grace_ms: -1 }).success).toBe(false)
  })
})

describe('SkipSettingsSchema', () => {
  it('only accepts known trigger kinds', () => {
    expect(SkipSettingsSchema.safeParse({ enabled: true, do_not_skip: ['push'] }).success).toBe(true)
    expect(SkipSettingsSchema.safeParse({ enabled: true, do_not_skip: ['tag'] }).success).toBe(false)
  })
})

describe('PartialLatticeConfigSchema', () => {
  it('accepts partial sections', () => {
    expect(PartialLatticeConfigSchema.parse({ global: { fail_fast: true } })).toEqual({ global: { fail_fast: true } })
  })

  it('rejects unknown sections', () => {
    expect(PartialLatticeConfigSchema.safeParse({ providers: {} }).success).toBe(false)
  })
})
