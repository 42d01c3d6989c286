/**
 * Zod validation schemas for the Lattice configuration system.
 *
 * Defines schemas for all config sections:
 *  - global settings
 *  - step runner settings
 *  - skip settings
 *  - full config document
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Global settings
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal'])
export type LogLevelValue = z.infer<typeof LogLevelSchema>

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Jobs running at once */
    max_concurrent_jobs: z.number().int().min(1).max(64),
    /** Cancel every required job after the first required failure */
    fail_fast: z.boolean(),
    /** Directory holding the skip-history database, relative to the working directory */
    state_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

// ---------------------------------------------------------------------------
// Runner settings
// ---------------------------------------------------------------------------

export const RunnerSettingsSchema = z
  .object({
    /** Delay between SIGTERM and SIGKILL when a step is cancelled */
    kill_grace_ms: z.number().int().min(0),
    /** Step timeout when neither step nor job sets one (0 = none) */
    default_timeout_minutes: z.number().min(0),
    /** Lines of step output kept in each step result */
    output_tail_lines: z.number().int().min(0),
  })
  .strict()

export type RunnerSettings = z.infer<typeof RunnerSettingsSchema>

// ---------------------------------------------------------------------------
// Skip settings
// ---------------------------------------------------------------------------

export const TriggerKindSchema = z.enum(['manual', 'pull_request', 'push'])

export const SkipSettingsSchema = z
  .object({
    enabled: z.boolean(),
    /** Trigger kinds that always run; a pipeline's own list takes precedence */
    do_not_skip: z.array(TriggerKindSchema),
  })
  .strict()

export type SkipSettings = z.infer<typeof SkipSettingsSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

/** Current supported config format version */
export const CURRENT_CONFIG_FORMAT_VERSION = '1'

export const LatticeConfigSchema = z
  .object({
    config_format_version: z.literal('1'),
    global: GlobalSettingsSchema,
    runner: RunnerSettingsSchema,
    skip: SkipSettingsSchema,
  })
  .strict()

export type LatticeConfig = z.infer<typeof LatticeConfigSchema>

// ---------------------------------------------------------------------------
// Partial config (config files, env vars and CLI flags before merging)
// ---------------------------------------------------------------------------

export const PartialLatticeConfigSchema = z
  .object({
    config_format_version: z.literal('1').optional(),
    global: GlobalSettingsSchema.partial().optional(),
    runner: RunnerSettingsSchema.partial().optional(),
    skip: SkipSettingsSchema.partial().optional(),
  })
  .strict()

export type PartialLatticeConfig = z.infer<typeof PartialLatticeConfigSchema>
