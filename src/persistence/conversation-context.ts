/**
 * SQLite-backed implementations of the host contracts a foreman turn writes
 * through: the conversation context and the `session.persist` capability.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { ConversationContext, HistoryMessage, WorkerSessionRecord } from '../host/types.js'
import { appendMessage, listMessages } from './queries/messages.js'
import { recordWorkerSession } from './queries/worker-sessions.js'

export class SqliteConversationContext implements ConversationContext {
  constructor(
    private readonly _db: BetterSqlite3Database,
    readonly sessionId: string,
  ) {}

  async getMessages(): Promise<HistoryMessage[]> {
    return listMessages(this._db, this.sessionId).map((row) => ({ role: row.role, content: row.content }))
  }

  async addMessage(message: HistoryMessage): Promise<void> {
    appendMessage(this._db, { session_id: this.sessionId, role: message.role, content: message.content })
  }
}

/** A `session.persist` capability value that stores worker sessions in the database */
export function createSessionPersister(
  db: BetterSqlite3Database,
): (record: WorkerSessionRecord) => Promise<void> {
  return async (record) => {
    recordWorkerSession(db, record)
  }
}
