/**
 * SqliteHistoryStore: HistoryStore backed by the `skip_history` table.
 */

import type { DatabaseService } from '../../persistence/database.js'
import { getSkipHistory, upsertSkipHistory } from '../../persistence/queries/skip-history.js'
import type { SkipHistoryRow } from '../../persistence/queries/skip-history.js'
import { SkipHistoryUnavailableError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { HistoryEntry, HistoryStore } from './history-store.js'

const logger = createLogger('skip-history:sqlite')

export class SqliteHistoryStore implements HistoryStore {
  private readonly _database: DatabaseService

  constructor(database: DatabaseService) {
    this._database = database
  }

  async lookup(key: string): Promise<HistoryEntry | undefined> {
    let row: SkipHistoryRow | undefined
    try {
      row = getSkipHistory(this._database.db, key)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new SkipHistoryUnavailableError(`Skip history lookup failed: ${message}`, { key })
    }
    if (row === undefined) return undefined
    return { fingerprint: row.fingerprint, completedAt: row.completed_at }
  }

  async record(key: string, fingerprint: string, completedAt: number): Promise<void> {
    const written = upsertSkipHistory(this._database.db, { jobKey: key, fingerprint, completedAt })
    if (!written) {
      logger.debug({ key, completedAt }, 'Kept newer skip history entry')
    }
  }
}

export function createSqliteHistoryStore(database: DatabaseService): HistoryStore {
  return new SqliteHistoryStore(database)
}
