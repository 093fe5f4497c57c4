/**
 * Migration 001: conversation history.
 *
 * One row per message added through SqliteConversationContext. Rows are read
 * back in insertion order (`id`), never by timestamp.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { Migration } from './index.js'

export const conversationHistoryMigration: Migration = {
  version: 1,
  name: '001-conversation-history',
  up(db: BetterSqlite3Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS conversation_messages (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id  TEXT NOT NULL,
        role        TEXT NOT NULL,
        content     TEXT NOT NULL,
        created_at  TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_conversation_messages_session
        ON conversation_messages(session_id, id);
    `)
  },
}
