/**
 * Tests for SqliteConversationContext and the session persister.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { openDatabase, type DatabaseWrapper } from '../../src/persistence/database.js'
import {
  SqliteConversationContext,
  createSessionPersister,
} from '../../src/persistence/conversation-context.js'
import { listWorkerSessions } from '../../src/persistence/queries/worker-sessions.js'

describe('SqliteConversationContext', () => {
  let wrapper: DatabaseWrapper

  beforeEach(() => {
    wrapper = openDatabase(':memory:')
  })

  afterEach(() => {
    wrapper.close()
  })

  it('round-trips messages for its own session only', async () => {
    const mine = new SqliteConversationContext(wrapper.db, 'mine')
    const theirs = new SqliteConversationContext(wrapper.db, 'theirs')

    await mine.addMessage({ role: 'user', content: 'build a parser' })
    await theirs.addMessage({ role: 'user', content: 'unrelated' })
    await mine.addMessage({ role: 'assistant', content: '📋 Created issue #1' })

    expect(await mine.getMessages()).toEqual([
      { role: 'user', content: 'build a parser' },
      { role: 'assistant', content: '📋 Created issue #1' },
    ])
  })

  it('survives reopening through a second context on the same database', async () => {
    await new SqliteConversationContext(wrapper.db, 's').addMessage({ role: 'user', content: 'hello' })
    const reopened = new SqliteConversationContext(wrapper.db, 's')
    expect(await reopened.getMessages()).toEqual([{ role: 'user', content: 'hello' }])
  })
})

describe('createSessionPersister', () => {
  it('stores worker session records', async () => {
    const wrapper = openDatabase(':memory:')
    const persist = createSessionPersister(wrapper.db)

    await persist({
      sessionId: 'worker-1',
      parentId: 'parent-1',
      issueId: '3',
      pool: 'research',
      bundle: '/repo/workers/research',
      output: 'findings',
    })

    expect(listWorkerSessions(wrapper.db, 'parent-1').map((r) => r.issue_id)).toEqual(['3'])
    wrapper.close()
  })
})
