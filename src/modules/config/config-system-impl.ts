/**
 * ConfigSystem implementation: loads configuration in hierarchy order and
 * exposes get/set operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.lattice/config.yaml)
 *     → project config      (./.lattice/config.yaml)
 *     → environment vars    (LATTICE_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { readFile, writeFile, mkdir, access } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { isPlainObject } from '../../utils/helpers.js'
import { ConfigError } from '../../core/errors.js'
import {
  LatticeConfigSchema,
  PartialLatticeConfigSchema,
  type LatticeConfig,
  type PartialLatticeConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of LATTICE_ environment variable names to config paths.
 * Only overrides scalar values, plus the comma-separated do-not-skip list.
 */
export const ENV_VAR_MAP: Record<string, string> = {
  LATTICE_LOG_LEVEL: 'global.log_level',
  LATTICE_MAX_CONCURRENT_JOBS: 'global.max_concurrent_jobs',
  LATTICE_FAIL_FAST: 'global.fail_fast',
  LATTICE_STATE_DIR: 'global.state_dir',
  LATTICE_KILL_GRACE_MS: 'runner.kill_grace_ms',
  LATTICE_DEFAULT_TIMEOUT_MINUTES: 'runner.default_timeout_minutes',
  LATTICE_OUTPUT_TAIL_LINES: 'runner.output_tail_lines',
  LATTICE_SKIP_ENABLED: 'skip.enabled',
  LATTICE_DO_NOT_SKIP: 'skip.do_not_skip',
}

const LIST_PATHS = new Set(['skip.do_not_skip'])

/** Coerce a string from the environment or the command line to a JS value */
export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '')
}

/**
 * Read relevant environment variables and return a partial config overlay.
 * Invalid overrides are logged and ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): PartialLatticeConfig {
  let overrides: Record<string, unknown> = {}

  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined) continue
    const value = LIST_PATHS.has(configPath) ? splitList(rawValue) : coerceValue(rawValue)
    overrides = setByPath(overrides, configPath, value)
  }

  const parsed = PartialLatticeConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

/**
 * Get a value from a nested object using dot-notation key.
 */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Creates intermediate objects as needed.
 */
export function setByPath(obj: Record<string, unknown>, path: string, value: unknown): Record<string, unknown> {
  const [head = '', ...rest] = path.split('.')
  if (rest.length === 0) {
    return { ...obj, [head]: value }
  }
  const existing = obj[head]
  const child = isPlainObject(existing) ? existing : {}
  return { ...obj, [head]: setByPath(child, rest.join('.'), value) }
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: LatticeConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialLatticeConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.lattice')
    this._globalConfigDir = options.globalConfigDir
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.lattice')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    merged = deepMerge(merged, readEnvOverrides(this._env))
    merged = deepMerge(merged, this._cliOverrides)

    const result = LatticeConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): LatticeConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().', {})
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)

    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (isPlainObject(existing)) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, { key })
    }
    const next = Array.isArray(existing) && typeof value === 'string' ? splitList(value) : value

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw: Record<string, unknown> = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, next)

    const partial = PartialLatticeConfigSchema.safeParse(updated)
    if (!partial.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(partial.error.issues)}`, {
        key,
        value,
        issues: partial.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(partial.data), 'utf-8')
    logger.info({ key, file: projectConfigPath }, 'Updated project configuration')

    await this.load()
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialLatticeConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    // An empty file parses to undefined
    if (parsed === undefined || parsed === null) return {}

    const result = PartialLatticeConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
