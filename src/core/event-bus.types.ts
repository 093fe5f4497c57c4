/**
 * Typed events for the internal event bus.
 *
 * Event naming convention: {module}:{action} (e.g., "worker:completed", "recovery:complete")
 * These events are internal to the foreman. Host-facing lifecycle signals go
 * through the host's HookEmitter instead.
 */

import type { IssueId } from './types.js'

// ---------------------------------------------------------------------------
// ForemanEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the foreman event bus.
 * Use `keyof ForemanEvents` to constrain event keys.
 */
export interface ForemanEvents {
  // -------------------------------------------------------------------------
  // Worker lifecycle events
  // -------------------------------------------------------------------------

  /** A background worker task was launched for an issue */
  'worker:spawned': { issueId: IssueId; pool: string; bundle: string }

  /** A spawn was skipped because a live task already exists for the issue */
  'worker:duplicate': { issueId: IssueId }

  /** A background worker task finished without error */
  'worker:completed': { issueId: IssueId; pool: string; elapsedMs: number }

  /** A background worker task finished with an error */
  'worker:failed': { issueId: IssueId; pool: string; elapsedMs: number; error: string }

  /** A background worker task was cancelled */
  'worker:cancelled': { issueId: IssueId; pool: string; reason: string }

  /** The foreman could not start, or a running worker could not finish, its issue */
  'worker:spawn-failed': { issueId: IssueId; message: string }

  /** Finished tasks were swept from the live-task table */
  'worker:reaped': { issueIds: IssueId[] }

  // -------------------------------------------------------------------------
  // Recovery events
  // -------------------------------------------------------------------------

  /** The one-time orphan scan finished */
  'recovery:complete': { orphaned: number }

  // -------------------------------------------------------------------------
  // Foreman lifecycle events
  // -------------------------------------------------------------------------

  /** A conversational turn finished */
  'turn:complete': { iterations: number; status: 'success' | 'incomplete' }

  /** The foreman is shutting down */
  'foreman:shutdown': { reason: string }
}
