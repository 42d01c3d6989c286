/**
 * StreamingFormatter: NDJSON event emitter for `lattice run --output-format json`.
 *
 * Writes newline-delimited JSON events to stdout as the pipeline progresses.
 * Each event follows: {"event":"<name>","timestamp":"<ISO8601>","data":{...}}
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { PipelineEvents } from '../../core/event-bus.types.js'

/** Events forwarded to the NDJSON stream, in lifecycle order */
export const STREAMED_EVENTS = [
  'pipeline:start',
  'job:queued',
  'job:skipped',
  'job:started',
  'step:started',
  'step:output',
  'step:finished',
  'job:cancelled',
  'job:finished',
  'pipeline:complete',
] as const satisfies ReadonlyArray<keyof PipelineEvents>

// ---------------------------------------------------------------------------
// emitEvent
// ---------------------------------------------------------------------------

/**
 * Write a single NDJSON event to stdout.
 *
 * @param event - Event name (e.g. "job:started", "pipeline:complete")
 * @param data  - Event payload data
 */
export function emitEvent(event: string, data: object): void {
  const line = JSON.stringify({
    event,
    timestamp: new Date().toISOString(),
    data,
  })
  process.stdout.write(line + '\n')
}

// ---------------------------------------------------------------------------
// streamEvents
// ---------------------------------------------------------------------------

/**
 * Forward every pipeline event on the bus to stdout as NDJSON.
 *
 * @returns function that unsubscribes all handlers
 */
export function streamEvents(eventBus: TypedEventBus): () => void {
  const unsubscribers = STREAMED_EVENTS.map((event) => subscribe(eventBus, event))
  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe()
  }
}

function subscribe<K extends keyof PipelineEvents>(eventBus: TypedEventBus, event: K): () => void {
  const handler = (payload: PipelineEvents[K]): void => {
    emitEvent(event, payload)
  }
  eventBus.on(event, handler)
  return () => {
    eventBus.off(event, handler)
  }
}
