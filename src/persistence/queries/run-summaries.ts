/**
 * Pipeline run summary query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Row type
// ---------------------------------------------------------------------------

export type RunSummaryVerdict = 'success' | 'failure' | 'interrupted'

export interface RunSummary {
  id: string
  pipeline: string
  trigger_kind: string
  ref: string
  fingerprint: string
  verdict: RunSummaryVerdict
  succeeded: number
  failed: number
  skipped: number
  cancelled: number
  duration_ms: number
  /** ISO-8601 timestamp */
  started_at: string
}

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Insert the summary of a finished pipeline run.
 */
export function insertRunSummary(db: BetterSqlite3Database, summary: RunSummary): void {
  db.prepare(
    `
    INSERT INTO run_summaries (
      id, pipeline, trigger_kind, ref, fingerprint, verdict,
      succeeded, failed, skipped, cancelled, duration_ms, started_at
    ) VALUES (
      @id, @pipeline, @trigger_kind, @ref, @fingerprint, @verdict,
      @succeeded, @failed, @skipped, @cancelled, @duration_ms, @started_at
    )
  `,
  ).run(summary)
}

/**
 * Most recent runs first, optionally restricted to one pipeline.
 */
export function listRunSummaries(
  db: BetterSqlite3Database,
  options: { pipeline?: string; limit?: number } = {},
): RunSummary[] {
  const limit = options.limit ?? 20
  if (options.pipeline !== undefined) {
    return db
      .prepare<[string, number], RunSummary>(
        'SELECT * FROM run_summaries WHERE pipeline = ? ORDER BY started_at DESC, rowid DESC LIMIT ?',
      )
      .all(options.pipeline, limit)
  }
  return db
    .prepare<[number], RunSummary>('SELECT * FROM run_summaries ORDER BY started_at DESC, rowid DESC LIMIT ?')
    .all(limit)
}
