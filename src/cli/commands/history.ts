/**
 * `foreman history` command
 *
 * Reads the conversation store written by the SQLite conversation context.
 * The database is opened read-only and never migrated.
 *
 * Usage:
 *   foreman history --db <path>                     List sessions, most recent first
 *   foreman history --db <path> --session <id>      Print a session's messages
 *   foreman history ... --session <id> --workers    Also list the session's worker sessions
 *   foreman history ... --limit <n>                 Only the last n messages
 *   foreman history ... --json                      JSON output
 *
 * Exit codes:
 *   0 - Success (including empty result)
 *   1 - Error (database not found or not migrated, query error, invalid option)
 */

import type { Command } from 'commander'
import { existsSync } from 'node:fs'
import { errorMessage } from '../../core/errors.js'
import { DatabaseWrapper } from '../../persistence/database.js'
import { listMessages, listSessions, type MessageRow } from '../../persistence/queries/messages.js'
import { listWorkerSessions, type WorkerSessionRow } from '../../persistence/queries/worker-sessions.js'
import { LATEST_SCHEMA_VERSION, schemaVersion } from '../../persistence/migrations/index.js'
import { buildJsonOutput, formatTable } from '../utils/formatting.js'

export const HISTORY_EXIT_SUCCESS = 0
export const HISTORY_EXIT_ERROR = 1

export interface HistoryOptions {
  dbPath: string
  sessionId?: string
  limit?: number
  workers?: boolean
  json?: boolean
  version?: string
}

export interface HistoryJsonData {
  sessionId: string
  messages: MessageRow[]
  workers?: WorkerSessionRow[]
}

/** One `[role] content` line per message; multi-line content is indented */
export function formatMessages(messages: MessageRow[]): string {
  return messages
    .map((m) => `[${m.role}] ${m.content.split('\n').join('\n    ')}`)
    .join('\n')
}

export function formatWorkerSessions(rows: WorkerSessionRow[]): string {
  return formatTable(
    ['Issue', 'Pool', 'Session', 'Recorded'],
    rows.map((r) => ({ issue: r.issue_id, pool: r.pool, session: r.session_id, recorded: r.recorded_at })),
    ['issue', 'pool', 'session', 'recorded'],
  )
}

export async function runHistory(options: HistoryOptions): Promise<number> {
  const { dbPath, sessionId, limit, workers = false, json = false, version = '0.0.0' } = options

  if (!existsSync(dbPath)) {
    process.stderr.write(`Error: No conversation database found at ${dbPath}\n`)
    return HISTORY_EXIT_ERROR
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    process.stderr.write('Error: --limit must be a positive integer\n')
    return HISTORY_EXIT_ERROR
  }

  const wrapper = new DatabaseWrapper(dbPath, { readonly: true })
  try {
    wrapper.open()
    const schema = schemaVersion(wrapper.db)
    if (schema === 0) {
      process.stderr.write(`Error: ${dbPath} is not a conversation database\n`)
      return HISTORY_EXIT_ERROR
    }
    if (schema < LATEST_SCHEMA_VERSION) {
      process.stderr.write(
        `Error: ${dbPath} is at schema version ${String(schema)}; open it with the foreman once to upgrade it to ${String(LATEST_SCHEMA_VERSION)}\n`,
      )
      return HISTORY_EXIT_ERROR
    }

    if (sessionId === undefined) {
      const sessions = listSessions(wrapper.db)
      if (json) {
        process.stdout.write(JSON.stringify(buildJsonOutput('foreman history', sessions, version), null, 2) + '\n')
      } else if (sessions.length === 0) {
        process.stdout.write('No sessions recorded\n')
      } else {
        const rows = sessions.map((s) => ({ session: s.session_id, messages: String(s.messages) }))
        process.stdout.write(formatTable(['Session', 'Messages'], rows, ['session', 'messages']) + '\n')
      }
      return HISTORY_EXIT_SUCCESS
    }

    const messages = listMessages(wrapper.db, sessionId, limit)
    const workerRows = workers ? listWorkerSessions(wrapper.db, sessionId) : undefined

    if (json) {
      const data: HistoryJsonData = {
        sessionId,
        messages,
        ...(workerRows !== undefined && { workers: workerRows }),
      }
      process.stdout.write(JSON.stringify(buildJsonOutput('foreman history', data, version), null, 2) + '\n')
      return HISTORY_EXIT_SUCCESS
    }

    process.stdout.write(
      messages.length === 0 ? `No messages for session ${sessionId}\n` : formatMessages(messages) + '\n',
    )
    if (workerRows !== undefined) {
      process.stdout.write(
        workerRows.length === 0
          ? '\nNo worker sessions\n'
          : '\nWorker sessions:\n' + formatWorkerSessions(workerRows) + '\n',
      )
    }
    return HISTORY_EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return HISTORY_EXIT_ERROR
  } finally {
    if (wrapper.isOpen) wrapper.close()
  }
}

export function registerHistoryCommand(program: Command, version = '0.0.0'): void {
  program
    .command('history')
    .description('Show conversation sessions recorded in a SQLite store')
    .requiredOption('--db <path>', 'Path to the conversation database')
    .option('--session <id>', 'Session to print (lists sessions when omitted)')
    .option('--limit <n>', 'Only the last n messages')
    .option('--workers', 'Also list worker sessions spawned from the session', false)
    .option('--json', 'Output JSON', false)
    .action(async (opts: { db: string; session?: string; limit?: string; workers: boolean; json: boolean }) => {
      const exitCode = await runHistory({
        dbPath: opts.db,
        ...(opts.session !== undefined && { sessionId: opts.session }),
        ...(opts.limit !== undefined && { limit: Number(opts.limit) }),
        workers: opts.workers,
        json: opts.json,
        version,
      })
      process.exit(exitCode)
    })
}
