/**
 * Conversation message query functions for the SQLite persistence layer.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'

// ---------------------------------------------------------------------------
// Message types
// ---------------------------------------------------------------------------

export interface MessageRow {
  id: number
  session_id: string
  role: string
  content: string
  created_at: string
}

export type AppendMessageInput = Pick<MessageRow, 'session_id' | 'role' | 'content'>

// ---------------------------------------------------------------------------
// Query functions
// ---------------------------------------------------------------------------

/**
 * Append a message to a session's history.
 *
 * @returns the row id of the new message
 */
export function appendMessage(db: BetterSqlite3Database, input: AppendMessageInput): number {
  const stmt = db.prepare<AppendMessageInput>(`
    INSERT INTO conversation_messages (session_id, role, content)
    VALUES (@session_id, @role, @content)
  `)
  return Number(stmt.run(input).lastInsertRowid)
}

/**
 * Messages of a session, oldest first. With a limit, only the most recent
 * `limit` messages are returned (still oldest first).
 */
export function listMessages(db: BetterSqlite3Database, sessionId: string, limit?: number): MessageRow[] {
  if (limit !== undefined) {
    return db
      .prepare<[string, number], MessageRow>(
        `SELECT * FROM (
           SELECT * FROM conversation_messages WHERE session_id = ? ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`,
      )
      .all(sessionId, limit)
  }

  return db
    .prepare<[string], MessageRow>('SELECT * FROM conversation_messages WHERE session_id = ? ORDER BY id ASC')
    .all(sessionId)
}

/** Session ids with stored messages, most recently active first */
export function listSessions(db: BetterSqlite3Database): Array<{ session_id: string; messages: number }> {
  return db
    .prepare<[], { session_id: string; messages: number }>(
      `SELECT session_id, COUNT(*) AS messages
         FROM conversation_messages
        GROUP BY session_id
        ORDER BY MAX(id) DESC`,
    )
    .all()
}
