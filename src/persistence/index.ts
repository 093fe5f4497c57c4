export { DatabaseWrapper, openDatabase, type DatabaseOpenOptions } from './database.js'
export {
  LATEST_SCHEMA_VERSION,
  pendingMigrations,
  runMigrations,
  schemaVersion,
  type Migration,
} from './migrations/index.js'
export { SqliteConversationContext, createSessionPersister } from './conversation-context.js'
export {
  appendMessage,
  listMessages,
  listSessions,
  type AppendMessageInput,
  type MessageRow,
} from './queries/messages.js'
export { listWorkerSessions, recordWorkerSession, type WorkerSessionRow } from './queries/worker-sessions.js'
