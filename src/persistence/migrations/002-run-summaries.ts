/**
 * Migration 002: pipeline run summaries.
 *
 * Written once per `lattice run` so `lattice history` can list past verdicts.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const runSummariesMigration: Migration = {
  version: 2,
  name: '002-run-summaries',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS run_summaries (
        id           TEXT PRIMARY KEY,
        pipeline     TEXT    NOT NULL,
        trigger_kind TEXT    NOT NULL,
        ref          TEXT    NOT NULL,
        fingerprint  TEXT    NOT NULL,
        verdict      TEXT    NOT NULL CHECK (verdict IN ('success', 'failure', 'interrupted')),
        succeeded    INTEGER NOT NULL DEFAULT 0,
        failed       INTEGER NOT NULL DEFAULT 0,
        skipped      INTEGER NOT NULL DEFAULT 0,
        cancelled    INTEGER NOT NULL DEFAULT 0,
        duration_ms  INTEGER NOT NULL,
        started_at   TEXT    NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_run_summaries_pipeline ON run_summaries(pipeline, started_at);
    `)
  },
}
