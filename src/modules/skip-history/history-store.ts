/**
 * HistoryStore: fingerprints of the last successful run per history key.
 *
 * The store is the only state shared between concurrently running jobs.
 * Writes are last-writer-wins by completion time, not by arrival order.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryEntry {
  fingerprint: string
  /** Epoch milliseconds of the successful run's completion */
  completedAt: number
}

export interface HistoryStore {
  /**
   * Most recent successful run for `key`, or undefined if there is none.
   * @throws {SkipHistoryUnavailableError} when the store cannot be read
   */
  lookup(key: string): Promise<HistoryEntry | undefined>

  /**
   * Record a successful run. Ignored if a later completion is already stored.
   */
  record(key: string, fingerprint: string, completedAt: number): Promise<void>
}

// ---------------------------------------------------------------------------
// InMemoryHistoryStore
// ---------------------------------------------------------------------------

/**
 * Process-local store, used when persistence is disabled and in tests.
 */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly _entries = new Map<string, HistoryEntry>()

  constructor(seed: Record<string, HistoryEntry> = {}) {
    for (const [key, entry] of Object.entries(seed)) {
      this._entries.set(key, { ...entry })
    }
  }

  async lookup(key: string): Promise<HistoryEntry | undefined> {
    const entry = this._entries.get(key)
    return entry !== undefined ? { ...entry } : undefined
  }

  async record(key: string, fingerprint: string, completedAt: number): Promise<void> {
    const existing = this._entries.get(key)
    if (existing !== undefined && existing.completedAt > completedAt) return
    this._entries.set(key, { fingerprint, completedAt })
  }

  /** Number of keys currently stored */
  get size(): number {
    return this._entries.size
  }
}
