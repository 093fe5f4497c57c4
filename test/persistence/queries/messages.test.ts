/**
 * Tests for the conversation message queries.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import { openDatabase, type DatabaseWrapper } from '../../../src/persistence/database.js'
import { appendMessage, listMessages, listSessions } from '../../../src/persistence/queries/messages.js'

describe('message queries', () => {
  let wrapper: DatabaseWrapper
  let db: BetterSqlite3Database

  beforeEach(() => {
    wrapper = openDatabase(':memory:')
    db = wrapper.db
  })

  afterEach(() => {
    wrapper.close()
  })

  it('appends and lists messages in insertion order', () => {
    appendMessage(db, { session_id: 's1', role: 'user', content: 'first' })
    appendMessage(db, { session_id: 's1', role: 'assistant', content: 'second' })
    appendMessage(db, { session_id: 's2', role: 'user', content: 'other session' })

    expect(listMessages(db, 's1').map((m) => [m.role, m.content])).toEqual([
      ['user', 'first'],
      ['assistant', 'second'],
    ])
  })

  it('returns increasing row ids', () => {
    const a = appendMessage(db, { session_id: 's1', role: 'user', content: 'a' })
    const b = appendMessage(db, { session_id: 's1', role: 'user', content: 'b' })
    expect(b).toBeGreaterThan(a)
  })

  it('limits to the most recent messages, oldest first', () => {
    for (const content of ['one', 'two', 'three', 'four']) {
      appendMessage(db, { session_id: 's1', role: 'user', content })
    }
    expect(listMessages(db, 's1', 2).map((m) => m.content)).toEqual(['three', 'four'])
  })

  it('lists sessions by most recent activity with message counts', () => {
    appendMessage(db, { session_id: 'older', role: 'user', content: 'a' })
    appendMessage(db, { session_id: 'newer', role: 'user', content: 'b' })
    appendMessage(db, { session_id: 'older', role: 'assistant', content: 'c' })
    appendMessage(db, { session_id: 'newer', role: 'assistant', content: 'd' })
    appendMessage(db, { session_id: 'newer', role: 'user', content: 'e' })

    expect(listSessions(db)).toEqual([
      { session_id: 'newer', messages: 3 },
      { session_id: 'older', messages: 2 },
    ])
  })
})
