/**
 * Skip history query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row type
// ---------------------------------------------------------------------------

export interface SkipHistoryRow {
  job_key: string
  fingerprint: string
  /** Epoch milliseconds */
  completed_at: number
  recorded_at: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Fetch the last successful run recorded for a history key.
 */
export function getSkipHistory(db: BetterSqlite3Database, jobKey: string): SkipHistoryRow | undefined {
  return db
    .prepare<[string], SkipHistoryRow>(
      'SELECT job_key, fingerprint, completed_at, recorded_at FROM skip_history WHERE job_key = ?',
    )
    .get(jobKey)
}

/**
 * Record a successful run. An existing row is only replaced by a run that
 * completed at the same time or later, so concurrent writers settle on the
 * latest completion regardless of write order.
 *
 * @returns true if the row was inserted or replaced
 */
export function upsertSkipHistory(
  db: BetterSqlite3Database,
  input: { jobKey: string; fingerprint: string; completedAt: number },
): boolean {
  const result = db
    .prepare(
      `
      INSERT INTO skip_history (job_key, fingerprint, completed_at)
      VALUES (@jobKey, @fingerprint, @completedAt)
      ON CONFLICT(job_key) DO UPDATE SET
        fingerprint  = excluded.fingerprint,
        completed_at = excluded.completed_at,
        recorded_at  = datetime('now')
      WHERE excluded.completed_at >= skip_history.completed_at
    `,
    )
    .run(input)
  return result.changes > 0
}

/**
 * List every recorded key, most recent completion first.
 */
export function listSkipHistory(db: BetterSqlite3Database, limit = 100): SkipHistoryRow[] {
  return db
    .prepare<[number], SkipHistoryRow>(
      'SELECT job_key, fingerprint, completed_at, recorded_at FROM skip_history ORDER BY completed_at DESC LIMIT ?',
    )
    .all(limit)
}

/**
 * Delete history rows. With a prefix, only keys starting with it (e.g. `ci/`).
 *
 * @returns number of rows deleted
 */
export function clearSkipHistory(db: BetterSqlite3Database, keyPrefix?: string): number {
  if (keyPrefix === undefined) {
    return db.prepare('DELETE FROM skip_history').run().changes
  }
  return db
    .prepare<{ prefix: string }>('DELETE FROM skip_history WHERE substr(job_key, 1, length(@prefix)) = @prefix')
    .run({ prefix: keyPrefix }).changes
}
