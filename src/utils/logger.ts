/**
 * Logger utility for Lattice
 * Uses pino for structured JSON logging with pretty printing in development
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Default log level based on environment */
function getDefaultLogLevel(): string {
  const envLevel = process.env.LOG_LEVEL
  if (envLevel) return envLevel
  if (process.env.NODE_ENV === 'production') return 'info'
  if (process.env.NODE_ENV === 'test' || process.env.NODE_ENV === 'development') return 'debug'
  // No NODE_ENV set (typical CLI use): warn, so logs do not interleave with the report
  return 'warn'
}

/** Whether to use pretty printing (development mode) */
function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  // Only enable pretty printing when NODE_ENV is explicitly 'development' or 'test'.
  // In CLI use (no NODE_ENV set) or production, use plain JSON to avoid pino-pretty
  // worker threads adding excess exit listeners to process.
  return process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'test'
}

function buildLogger(name: string, options: LoggerOptions): pino.Logger {
  const level = options.level ?? getDefaultLogLevel()
  const pretty = options.pretty ?? isPrettyMode()

  const baseOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (pretty) {
    // Note: pino transport errors are asynchronous and cannot be caught here.
    // pino-pretty is a devDependency; only use in non-production environments.
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino(baseOptions, pino.destination(2))
}

const created = new Set<pino.Logger>()
let levelOverride: string | null = null

/**
 * Create a named logger that follows `setLogLevel()`.
 * Logs go to stderr so stdout stays free for reports and NDJSON events.
 * @param name - Logger name (module identifier)
 * @param options - Optional logger configuration overrides
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? levelOverride
  const log = buildLogger(name, level !== null ? { ...options, level } : options)
  if (options.level === undefined) created.add(log)
  return log
}

/**
 * Change the level of every logger created without an explicit level,
 * and of those created later. `LOG_LEVEL` in the environment wins.
 */
export function setLogLevel(level: string): void {
  if (process.env.LOG_LEVEL) return
  levelOverride = level
  for (const log of created) log.level = level
}

/** Root application logger */
export const logger = createLogger('lattice')

/** Create a child logger with additional context */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
