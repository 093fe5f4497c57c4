/**
 * Tests for schema versioning: runMigrations, schemaVersion, pendingMigrations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  LATEST_SCHEMA_VERSION,
  pendingMigrations,
  runMigrations,
  schemaVersion,
} from '../../../src/persistence/migrations/index.js'

function tableNames(db: BetterSqlite3Database): string[] {
  return db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name)
}

describe('runMigrations', () => {
  let db: BetterSqlite3Database

  beforeEach(() => {
    db = new BetterSqlite3(':memory:')
  })

  afterEach(() => {
    db.close()
  })

  it('creates the tracking table and every schema table', () => {
    runMigrations(db)
    expect(tableNames(db)).toEqual(['conversation_messages', 'schema_migrations', 'worker_sessions'])
  })

  it('records each applied migration by version and name', () => {
    runMigrations(db)
    const rows = db
      .prepare<[], { version: number; name: string }>('SELECT version, name FROM schema_migrations ORDER BY version')
      .all()
    expect(rows).toEqual([
      { version: 1, name: '001-conversation-history' },
      { version: 2, name: '002-worker-sessions' },
    ])
  })

  it('returns the versions it applied, and nothing on a second run', () => {
    expect(runMigrations(db)).toEqual([1, 2])
    expect(runMigrations(db)).toEqual([])
  })

  it('is idempotent', () => {
    runMigrations(db)
    expect(() => runMigrations(db)).not.toThrow()
    const count = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM schema_migrations').get()
    expect(count?.n).toBe(2)
  })

  it('creates the session index on conversation messages', () => {
    runMigrations(db)
    const index = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='index' AND name='idx_conversation_messages_session'",
      )
      .get()
    expect(index?.name).toBe('idx_conversation_messages_session')
  })

  it('applies only what an older database lacks', () => {
    runMigrations(db)
    db.exec('DROP TABLE worker_sessions')
    db.exec('DELETE FROM schema_migrations WHERE version = 2')

    expect(pendingMigrations(db).map((m) => m.name)).toEqual(['002-worker-sessions'])
    expect(runMigrations(db)).toEqual([2])
    expect(tableNames(db)).toContain('worker_sessions')
  })
})

describe('schemaVersion', () => {
  it('is 0 for a database with no foreman schema and creates nothing', () => {
    const db = new BetterSqlite3(':memory:')
    expect(schemaVersion(db)).toBe(0)
    expect(tableNames(db)).toEqual([])
    expect(pendingMigrations(db)).toHaveLength(2)
    db.close()
  })

  it('reports the latest version once migrated', () => {
    const db = new BetterSqlite3(':memory:')
    runMigrations(db)
    expect(LATEST_SCHEMA_VERSION).toBe(2)
    expect(schemaVersion(db)).toBe(2)
    expect(pendingMigrations(db)).toEqual([])
    db.close()
  })
})
