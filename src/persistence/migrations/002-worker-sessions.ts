/**
 * Migration 002: worker sessions.
 *
 * Records finished worker sessions handed over through the `session.persist`
 * capability, so a host can find and resume a worker's session later.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const workerSessionsMigration: Migration = {
  version: 2,
  name: '002-worker-sessions',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS worker_sessions (
        session_id  TEXT PRIMARY KEY,
        parent_id   TEXT NOT NULL,
        issue_id    TEXT NOT NULL,
        pool        TEXT NOT NULL,
        bundle      TEXT NOT NULL,
        output      TEXT NOT NULL,
        recorded_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_worker_sessions_parent
        ON worker_sessions(parent_id);
    `)
  },
}
