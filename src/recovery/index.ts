/**
 * Public API for the recovery module.
 */

export {
  setupGracefulShutdown,
  INTERRUPTED_EXIT_CODE,
  type ShutdownHandlerOptions,
} from './shutdown-handler.js'
