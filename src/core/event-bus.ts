/**
 * TypedEventBus: typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Key design constraints:
 *  - Event dispatch is SYNCHRONOUS: handlers run immediately when emit() is called.
 *  - No async/Promise-based dispatch; async work should be scheduled separately.
 *  - TypeScript `keyof` constraint enforces handler type safety at compile time.
 *  - EventBus depends on no module other than core types.
 */

import { EventEmitter } from 'node:events'
import type { PipelineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `PipelineEvents` map.
 */
export interface TypedEventBus {
  /**
   * Emit an event with a strongly-typed payload.
   * Dispatch is synchronous: all registered handlers run before emit() returns.
   */
  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void

  /**
   * Subscribe to an event. The handler is called synchronously on each emit.
   */
  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void

  /**
   * Unsubscribe a previously registered handler.
   * If the handler was not registered, this is a no-op.
   */
  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('job:finished', ({ jobId, status }) => {
 *   console.log(`${jobId} ${status}`)
 * })
 * bus.emit('job:finished', { jobId: 'build (linux)', policy: 'required', status: 'succeeded', durationMs: 12 })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    // One CLI run attaches a listener per event for each output sink
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 *
 * @example
 * const bus = createEventBus()
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
