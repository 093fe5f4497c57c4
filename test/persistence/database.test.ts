/**
 * Tests for DatabaseWrapper and openDatabase.
 *
 * Uses :memory: databases for speed and zero cleanup.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { DatabaseWrapper, openDatabase } from '../../src/persistence/database.js'

describe('DatabaseWrapper', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = new DatabaseWrapper(':memory:')
  })

  afterEach(() => {
    if (wrapper.isOpen) wrapper.close()
  })

  it('should start in a closed state', () => {
    expect(wrapper.isOpen).toBe(false)
  })

  it('should throw when accessing db before open', () => {
    expect(() => wrapper.db).toThrow('database is not open')
  })

  it('should be idempotent on repeated open calls', () => {
    wrapper.open()
    const db1 = wrapper.db
    wrapper.open()
    expect(wrapper.db).toBe(db1)
  })

  it('should be idempotent on repeated close calls', () => {
    wrapper.open()
    wrapper.close()
    expect(() => wrapper.close()).not.toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  describe('PRAGMA verification', () => {
    it('should set busy_timeout to 5000', () => {
      wrapper.open()
      expect(wrapper.db.pragma('busy_timeout', { simple: true })).toBe(5000)
    })

    it('should set synchronous to NORMAL (1)', () => {
      wrapper.open()
      expect(wrapper.db.pragma('synchronous', { simple: true })).toBe(1)
    })

    it('should enable foreign keys', () => {
      wrapper.open()
      expect(wrapper.db.pragma('foreign_keys', { simple: true })).toBe(1)
    })
  })

  describe('service lifecycle', () => {
    it('opens and migrates on initialize() and closes on shutdown()', async () => {
      await wrapper.initialize()
      const row = wrapper.db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name='conversation_messages'",
        )
        .get()
      expect(row?.name).toBe('conversation_messages')

      await wrapper.shutdown()
      expect(wrapper.isOpen).toBe(false)
    })
  })
})

describe('openDatabase', () => {
  it('returns an open, migrated database', () => {
    const wrapper = openDatabase(':memory:')
    const versions = wrapper.db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations ORDER BY version')
      .all()
      .map((row) => row.version)
    expect(versions).toEqual([1, 2])
    wrapper.close()
  })
})

describe('DatabaseWrapper read-only mode', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'foreman-db-ro-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('refuses to create a missing file', () => {
    const wrapper = new DatabaseWrapper(join(dir, 'missing.db'), { readonly: true })
    expect(() => wrapper.open()).toThrow()
    expect(wrapper.isOpen).toBe(false)
  })

  it('skips migrations on initialize() and rejects writes', async () => {
    const path = join(dir, 'store.db')
    openDatabase(path).close()

    const wrapper = new DatabaseWrapper(path, { readonly: true })
    await wrapper.initialize()
    expect(wrapper.db.readonly).toBe(true)
    expect(() => wrapper.db.exec('CREATE TABLE scratch (a TEXT)')).toThrow()
    await wrapper.shutdown()
  })
})
