/**
 * setupGracefulShutdown: registers SIGTERM and SIGINT handlers for hosts
 * that run the foreman as their main workload.
 *
 * On signal receipt:
 *  1. Shuts the foreman down, cancelling every live worker
 *  2. Flushes the conversation database WAL to disk, when one is given
 *  3. Exits with code 0
 *
 * Returns a cleanup function that removes the listeners (for test teardown).
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import type pino from 'pino'
import type { Foreman } from '../core/foreman.js'
import { createLogger } from '../utils/logger.js'

const defaultLogger = createLogger('shutdown-handler')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShutdownHandlerOptions {
  foreman: Pick<Foreman, 'shutdown'>
  db?: BetterSqlite3Database
  logger?: pino.Logger
  exit?: (code: number) => void
}

// ---------------------------------------------------------------------------
// setupGracefulShutdown
// ---------------------------------------------------------------------------

/**
 * Register SIGTERM and SIGINT handlers for graceful shutdown.
 *
 * @returns Cleanup function that removes the signal listeners
 */
export function setupGracefulShutdown(options: ShutdownHandlerOptions): () => void {
  const { foreman, db } = options
  const log = options.logger ?? defaultLogger
  const exit = options.exit ?? ((code: number) => process.exit(code))

  const shutdown = async (signal: string): Promise<void> => {
    log.info({ signal }, 'Graceful shutdown initiated')

    try {
      await foreman.shutdown(signal)
    } catch (err) {
      log.error({ err }, 'Foreman shutdown reported errors')
    }

    if (db !== undefined && db.open) {
      db.pragma('wal_checkpoint(FULL)')
    }

    log.info('Graceful shutdown complete')
    exit(0)
  }

  const sigintHandler = (): void => {
    void shutdown('SIGINT')
  }

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM')
  }

  process.on('SIGINT', sigintHandler)
  process.on('SIGTERM', sigtermHandler)

  return (): void => {
    process.removeListener('SIGINT', sigintHandler)
    process.removeListener('SIGTERM', sigtermHandler)
  }
}
