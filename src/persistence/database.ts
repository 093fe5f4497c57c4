/**
 * DatabaseWrapper: thin wrapper around better-sqlite3 for the conversation
 * history store.
 *
 * Responsibilities:
 *  - Open a SQLite database with the required PRAGMAs (WAL mode, etc.)
 *  - Expose the raw BetterSqlite3.Database instance for use by query modules
 *  - Implement the BaseService lifecycle so a host can register it
 */

import BetterSqlite3 from 'better-sqlite3'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type { BaseService } from '../core/di.js'
import { runMigrations } from './migrations/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('persistence:database')

// ---------------------------------------------------------------------------
// DatabaseWrapper
// ---------------------------------------------------------------------------

/**
 * Thin wrapper that opens a SQLite database, applies required PRAGMAs,
 * and exposes the raw BetterSqlite3 instance.
 */
export interface DatabaseOpenOptions {
  /**
   * Open without write access. The file must already exist; no PRAGMA that
   * changes the file is issued and migrations cannot run.
   */
  readonly?: boolean
}

export class DatabaseWrapper implements BaseService {
  private _db: BetterSqlite3Database | null = null
  private readonly _path: string
  private readonly _readonly: boolean

  constructor(databasePath: string, options: DatabaseOpenOptions = {}) {
    this._path = databasePath
    this._readonly = options.readonly ?? false
  }

  /**
   * Open the database at the configured path and apply all required PRAGMAs.
   * No-op when already open.
   */
  open(): void {
    if (this._db !== null) {
      return
    }

    logger.debug({ path: this._path, readonly: this._readonly }, 'Opening SQLite database')
    if (this._readonly) {
      this._db = new BetterSqlite3(this._path, { readonly: true, fileMustExist: true })
      this._db.pragma('busy_timeout = 5000')
      return
    }

    this._db = new BetterSqlite3(this._path)

    // In-memory databases report "memory" and stay that way
    const journalMode = this._db.pragma('journal_mode = WAL', { simple: true })
    if (journalMode !== 'wal' && this._path !== ':memory:') {
      logger.warn({ journalMode }, 'WAL mode unavailable; continuing with the reported journal mode')
    }
    this._db.pragma('busy_timeout = 5000')
    this._db.pragma('synchronous = NORMAL')
    this._db.pragma('foreign_keys = ON')

    logger.debug({ path: this._path }, 'SQLite database opened')
  }

  /**
   * Close the database; no-op when already closed.
   */
  close(): void {
    if (this._db === null) {
      return
    }

    this._db.close()
    this._db = null
    logger.debug({ path: this._path }, 'SQLite database closed')
  }

  /**
   * Return the raw BetterSqlite3 instance.
   * @throws {Error} if the database has not been opened yet.
   */
  get db(): BetterSqlite3Database {
    if (this._db === null) {
      throw new Error('DatabaseWrapper: database is not open. Call open() first.')
    }
    return this._db
  }

  /** Whether the database is currently open */
  get isOpen(): boolean {
    return this._db !== null
  }

  /** Open the database and, unless read-only, apply pending migrations */
  async initialize(): Promise<void> {
    this.open()
    if (!this._readonly) {
      runMigrations(this.db)
    }
  }

  async shutdown(): Promise<void> {
    this.close()
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Open (creating if needed) a conversation database and bring its schema up
 * to date. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(databasePath: string): DatabaseWrapper {
  const wrapper = new DatabaseWrapper(databasePath)
  wrapper.open()
  runMigrations(wrapper.db)
  return wrapper
}
