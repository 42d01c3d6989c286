/**
 * Migration 001: skip history.
 *
 * One row per history key holding the fingerprint of its most recent
 * successful run. `completed_at` is epoch milliseconds.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const skipHistoryMigration: Migration = {
  version: 1,
  name: '001-skip-history',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS skip_history (
        job_key      TEXT PRIMARY KEY,
        fingerprint  TEXT    NOT NULL,
        completed_at INTEGER NOT NULL,
        recorded_at  TEXT    NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_skip_history_completed_at ON skip_history(completed_at);
    `)
  },
}
