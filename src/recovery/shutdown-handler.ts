/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for a pipeline run.
 *
 * On the first signal every pending and running job is cancelled; running
 * steps get SIGTERM, then SIGKILL after the kill grace period. The run then
 * resolves normally and the caller reports it as interrupted.
 *
 * A second signal exits immediately with code 130.
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import type pino from 'pino'
import type { Orchestrator } from '../core/orchestrator.js'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

/** Exit code of a run stopped by a signal */
export const INTERRUPTED_EXIT_CODE = 130

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShutdownHandlerOptions {
  orchestrator: Pick<Orchestrator, 'cancel'>
  logger?: pino.Logger
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * Register SIGTERM and SIGINT handlers that cancel the current run.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { orchestrator } = options
  const log = options.logger ?? defaultLogger
  let received: string | null = null

  const handle = (signal: string): void => {
    if (received !== null) {
      log.warn({ signal, first: received }, 'Second signal received; exiting immediately')
      process.exit(INTERRUPTED_EXIT_CODE)
    }
    received = signal
    log.info({ signal }, 'Graceful shutdown initiated')
    orchestrator.cancel(`interrupted by ${signal}`)
  }

  const sigintHandler = (): void => {
    handle('SIGINT')
  }

  const sigtermHandler = (): void => {
    handle('SIGTERM')
  }

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  // Return cleanup function for test teardown
  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
