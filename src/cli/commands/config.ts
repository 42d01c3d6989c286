/**
 * `lattice config` command group
 *
 * Subcommands:
 *   - `lattice config show`                 : display the merged configuration
 *   - `lattice config get <key>`            : print one value by dot-notation key
 *   - `lattice config set <key> <value>`    : update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { createConfigSystem, coerceValue } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { ConfigError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Shared loading
// ---------------------------------------------------------------------------

export interface ConfigCommandOptions {
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Load the merged configuration, reporting failures on stderr.
 * @returns the loaded system, or the exit code to return
 */
async function loadSystem(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })

  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const config = system.getConfig()
  if ((opts.format ?? 'yaml') === 'json') {
    process.stdout.write(JSON.stringify(config, null, 2) + '\n')
  } else {
    process.stdout.write('# Lattice Configuration\n\n')
    process.stdout.write(yaml.dump(config))
  }

  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  const value = system.get(key)
  if (value === undefined) {
    process.stderr.write(`  Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    process.stdout.write(yaml.dump(value))
  } else if (Array.isArray(value)) {
    process.stdout.write(value.map(String).join(',') + '\n')
  } else {
    process.stdout.write(`${String(value)}\n`)
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(
  key: string,
  rawValue: string,
  opts: ConfigCommandOptions = {},
): Promise<number> {
  if (!key || key.trim() === '') {
    process.stderr.write('  Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const value = coerceValue(rawValue)

  const system = await loadSystem(opts)
  if (typeof system === 'number') return system

  try {
    await system.set(key, value)
    process.stdout.write(`  Set ${key} = ${JSON.stringify(system.get(key))}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    const message = err instanceof Error ? err.message : String(err)
    process.stderr.write(`  Error updating configuration: ${message}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// registerConfigCommand
// ---------------------------------------------------------------------------

/**
 * Register the `lattice config` command group with the CLI program.
 */
export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Show and modify Lattice configuration')

  configCmd
    .command('show')
    .description('Show the merged configuration')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { format: string }) => {
      const format = opts.format === 'json' ? 'json' : 'yaml'
      process.exitCode = await runConfigShow({ format })
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value (dot-notation key, e.g. global.max_concurrent_jobs)')
    .action(async (key: string) => {
      process.exitCode = await runConfigGet(key)
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a value in the project configuration (dot-notation key)')
    .action(async (key: string, value: string) => {
      process.exitCode = await runConfigSet(key, value)
    })
}
