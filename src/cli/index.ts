#!/usr/bin/env node
/**
 * Lattice CLI - Main entry point
 * Provides the `lattice` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerRunCommand } from './commands/run.js'
import { registerConfigCommand } from './commands/config.js'
import { registerHistoryCommand } from './commands/history.js'

const logger = createLogger('cli')

/** Resolve the package.json path relative to this file */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  // Run from dist/cli or src/cli
  const paths = [resolve(here, '../../package.json'), resolve(here, '../package.json')]

  for (const pkgPath of paths) {
    let content: string
    try {
      content = await readFile(pkgPath, 'utf-8')
    } catch {
      continue
    }
    const pkg = JSON.parse(content) as unknown
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(projectRoot = process.cwd()): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('lattice')
    .description('Lattice - CI matrix orchestrator')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program, projectRoot)
  registerHistoryCommand(program, version, projectRoot)
  registerConfigCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(3)
  }
}

// Errors are handled internally by main()
void main()
