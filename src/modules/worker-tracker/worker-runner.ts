/**
 * The body of a background worker task.
 *
 * Loads the pool's bundle, builds a child session parented to the foreman's
 * session and runs the worker instruction to completion. The child session
 * is released on every exit path.
 */

import type { IssueId } from '../../core/types.js'
import type {
  BundleLoader,
  ParentSession,
  WorkerSessionRecord,
} from '../../host/types.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('worker-runner')

/** Everything a launched worker needs, fixed at spawn time */
export interface WorkerLaunch {
  issueId: IssueId
  pool: string
  bundleUri: string
  instruction: string
  parent: ParentSession
  workingDir: string
  loadBundle: BundleLoader
  /** Host hook that makes the worker session discoverable later, when offered */
  persist: ((record: WorkerSessionRecord) => Promise<void>) | null
}

/**
 * Run one worker session. Rejects when any step fails or the signal aborts.
 *
 * @returns the worker session's final output
 */
export async function runWorkerSession(launch: WorkerLaunch, signal: AbortSignal): Promise<string> {
  const log = logger.child({ issueId: launch.issueId, pool: launch.pool })

  const bundle = await launch.loadBundle(launch.bundleUri)
  signal.throwIfAborted()

  // Bundles without their own providers run on the parent's
  const providers = bundle.providers.length > 0 ? bundle.providers : launch.parent.providers
  const prepared = await bundle.prepare({ providers })
  signal.throwIfAborted()

  const session = await prepared.createSession({
    parentId: launch.parent.id,
    workingDir: launch.workingDir,
    issueId: launch.issueId,
  })
  log.debug({ sessionId: session.id, bundle: bundle.name }, 'Worker session created')

  try {
    const output = await session.execute(launch.instruction, { signal })

    if (launch.persist !== null) {
      try {
        await launch.persist({
          sessionId: session.id,
          parentId: launch.parent.id,
          issueId: launch.issueId,
          pool: launch.pool,
          bundle: launch.bundleUri,
          output,
        })
      } catch (err) {
        // The work itself is done; the issue status remains the durable record
        log.warn({ err, sessionId: session.id }, 'Failed to persist worker session')
      }
    }

    return output
  } finally {
    try {
      await session.cleanup()
    } catch (err) {
      log.warn({ err, sessionId: session.id }, 'Worker session cleanup failed')
    }
  }
}
