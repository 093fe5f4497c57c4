/**
 * Schema versioning for the conversation store.
 *
 * Each applied migration leaves a row in `schema_migrations`. Pending
 * migrations are applied together in one transaction, so a database is either
 * fully upgraded or left at its previous version.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { createLogger } from '../../utils/logger.js'
import { conversationHistoryMigration } from './001-conversation-history.js'
import { workerSessionsMigration } from './002-worker-sessions.js'

const logger = createLogger('persistence:migrations')

export interface Migration {
  version: number
  name: string
  up(db: BetterSqlite3Database): void
}

export const MIGRATIONS: readonly Migration[] = [conversationHistoryMigration, workerSessionsMigration]

/** Version a fully migrated database reports */
export const LATEST_SCHEMA_VERSION = Math.max(...MIGRATIONS.map((m) => m.version))

function hasTrackingTable(db: BetterSqlite3Database): boolean {
  const row = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'",
    )
    .get()
  return row !== undefined
}

function appliedVersions(db: BetterSqlite3Database): Set<number> {
  if (!hasTrackingTable(db)) return new Set()
  return new Set(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version),
  )
}

/**
 * Highest applied migration version; 0 for a database with no foreman
 * schema. Only reads, so it is safe on a read-only connection.
 */
export function schemaVersion(db: BetterSqlite3Database): number {
  let highest = 0
  for (const version of appliedVersions(db)) {
    highest = Math.max(highest, version)
  }
  return highest
}

/** Registered migrations not yet applied, lowest version first */
export function pendingMigrations(db: BetterSqlite3Database): Migration[] {
  const applied = appliedVersions(db)
  return MIGRATIONS.filter((m) => !applied.has(m.version)).sort((a, b) => a.version - b.version)
}

/**
 * Bring the database up to {@link LATEST_SCHEMA_VERSION} and return the
 * versions applied by this call.
 */
export function runMigrations(db: BetterSqlite3Database): number[] {
  const upgrade = db.transaction((): number[] => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version    INTEGER PRIMARY KEY,
        name       TEXT    NOT NULL,
        applied_at TEXT    NOT NULL DEFAULT (datetime('now'))
      )
    `)
    const pending = pendingMigrations(db)
    const record = db.prepare<[number, string]>('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
    for (const migration of pending) {
      logger.debug({ version: migration.version, name: migration.name }, 'Applying migration')
      migration.up(db)
      record.run(migration.version, migration.name)
    }
    return pending.map((m) => m.version)
  })

  const applied = upgrade()
  if (applied.length > 0) {
    logger.info({ applied, version: schemaVersion(db) }, 'Conversation store schema upgraded')
  }
  return applied
}
