/**
 * Unit tests for setupGracefulShutdown
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import Database from 'better-sqlite3'
import { setupGracefulShutdown } from '../shutdown-handler.js'
import { flush } from '../../../test/helpers/fakes.js'

function lastListener(signal: 'SIGINT' | 'SIGTERM'): NodeJS.SignalsListener | undefined {
  const listeners = process.listeners(signal)
  return listeners[listeners.length - 1]
}

describe('setupGracefulShutdown', () => {
  let cleanup: (() => void) | null = null

  afterEach(() => {
    cleanup?.()
    cleanup = null
  })

  it('registers SIGTERM and SIGINT handlers and removes them on cleanup', () => {
    const before = {
      int: process.listenerCount('SIGINT'),
      term: process.listenerCount('SIGTERM'),
    }
    const foreman = { shutdown: vi.fn().mockResolvedValue(undefined) }
    const remove = setupGracefulShutdown({ foreman, exit: vi.fn() })

    expect(process.listenerCount('SIGINT')).toBe(before.int + 1)
    expect(process.listenerCount('SIGTERM')).toBe(before.term + 1)

    remove()
    expect(process.listenerCount('SIGINT')).toBe(before.int)
    expect(process.listenerCount('SIGTERM')).toBe(before.term)
  })

  it('on SIGTERM: shuts the foreman down with the signal name and exits 0', async () => {
    const foreman = { shutdown: vi.fn().mockResolvedValue(undefined) }
    const exit = vi.fn()
    cleanup = setupGracefulShutdown({ foreman, exit })

    lastListener('SIGTERM')?.('SIGTERM')
    await flush()

    expect(foreman.shutdown).toHaveBeenCalledWith('SIGTERM')
    expect(exit).toHaveBeenCalledWith(0)
  })

  it('still exits when the foreman shutdown rejects', async () => {
    const foreman = { shutdown: vi.fn().mockRejectedValue(new Error('worker stuck')) }
    const exit = vi.fn()
    cleanup = setupGracefulShutdown({ foreman, exit })

    lastListener('SIGINT')?.('SIGINT')
    await flush()

    expect(foreman.shutdown).toHaveBeenCalledWith('SIGINT')
    expect(exit).toHaveBeenCalledWith(0)
  })

  it('checkpoints an open conversation database before exiting', async () => {
    const db = new Database(':memory:')
    const pragma = vi.spyOn(db, 'pragma')
    const foreman = { shutdown: vi.fn().mockResolvedValue(undefined) }
    const exit = vi.fn()
    cleanup = setupGracefulShutdown({ foreman, db, exit })

    lastListener('SIGTERM')?.('SIGTERM')
    await flush()

    expect(pragma).toHaveBeenCalledWith('wal_checkpoint(FULL)')
    expect(exit).toHaveBeenCalledWith(0)
    db.close()
  })
})
