/**
 * Worker session query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { WorkerSessionRecord } from '../../host/types.js'

export interface WorkerSessionRow {
  session_id: string
  parent_id: string
  issue_id: string
  pool: string
  bundle: string
  output: string
  recorded_at: string
}

/** Insert or replace the record of a finished worker session */
export function recordWorkerSession(db: BetterSqlite3Database, record: WorkerSessionRecord): void {
  db.prepare<Omit<WorkerSessionRow, 'recorded_at'>>(`
    INSERT OR REPLACE INTO worker_sessions (session_id, parent_id, issue_id, pool, bundle, output)
    VALUES (@session_id, @parent_id, @issue_id, @pool, @bundle, @output)
  `).run({
    session_id: record.sessionId,
    parent_id: record.parentId,
    issue_id: record.issueId,
    pool: record.pool,
    bundle: record.bundle,
    output: record.output,
  })
}

/** Worker sessions spawned from a parent session, in the order they were recorded */
export function listWorkerSessions(db: BetterSqlite3Database, parentId: string): WorkerSessionRow[] {
  return db
    .prepare<[string], WorkerSessionRow>(
      'SELECT * FROM worker_sessions WHERE parent_id = ? ORDER BY recorded_at ASC, rowid ASC',
    )
    .all(parentId)
}
