/**
 * skip-history module: history stores and the skip decision.
 */

export { InMemoryHistoryStore } from './history-store.js'
export type { HistoryEntry, HistoryStore } from './history-store.js'
export { SqliteHistoryStore, createSqliteHistoryStore } from './sqlite-history-store.js'
export { shouldSkip } from './skip-decider.js'
export type { SkipOptions } from './skip-decider.js'
