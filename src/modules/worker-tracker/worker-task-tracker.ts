/**
 * WorkerTaskTracker: interface and factory for the background worker pool.
 *
 * Owns the mapping from issue id to a detached worker task and guarantees at
 * most one live worker per issue. Finished tasks remain in the table, with
 * their outcome readable, until reap() sweeps them out; a finished task never
 * blocks a fresh spawn for its issue.
 *
 * Event emissions:
 *  - worker:spawned / worker:duplicate on spawn attempts
 *  - worker:completed / worker:failed / worker:cancelled on settlement
 *  - worker:spawn-failed for every failure converted into a blocked issue
 *  - worker:reaped when finished tasks are swept
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { IssueId, SpawnOutcome, WorkerState } from '../../core/types.js'
import type { ResolvedCapabilities } from '../../host/capabilities.js'
import type { ParentSession } from '../../host/types.js'
import type { ForemanConfig } from '../config/config-schema.js'
import type { IssueStore } from '../issue-store/issue-client.js'
import type { Issue } from '../issue-store/issue-schema.js'
import type { IssueRouter } from '../routing/issue-router.js'
import type { WorkerTask } from './worker-task.js'
import { WorkerTaskTrackerImpl } from './worker-task-tracker-impl.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Per-turn context a spawn needs. Passed on every call rather than stored,
 * so a spawn always sees the session and capabilities of the turn that
 * requested it.
 */
export interface WorkerSpawnContext {
  session: ParentSession | null
  capabilities: ResolvedCapabilities
  issues: IssueStore
}

/** Snapshot of one tracked task */
export interface WorkerInfo {
  issueId: IssueId
  pool: string
  bundle: string
  state: WorkerState
  startedAt: Date
  elapsedMs: number
}

// ---------------------------------------------------------------------------
// WorkerTaskTracker interface
// ---------------------------------------------------------------------------

export interface WorkerTaskTracker extends BaseService {
  /**
   * Start a background worker for the issue unless one is already live.
   * Resolves as soon as the worker is launched (or the attempt failed); it
   * never rejects and never waits for the worker to finish.
   */
  maybeSpawnWorker(issue: Issue, ctx: WorkerSpawnContext): Promise<SpawnOutcome>

  /** State of every tracked task, computed at call time */
  getWorkerStatus(): Record<IssueId, WorkerState>

  getWorkers(): WorkerInfo[]

  /** True while an unfinished task, or a launch in preparation, exists for the issue */
  isLive(issueId: IssueId): boolean

  runningCount(): number

  /** True once any spawn attempt was made for the issue in this process */
  hasEverSpawned(issueId: IssueId): boolean

  /** Remove finished tasks from the table and return them */
  reap(): WorkerTask[]

  /**
   * Cancel one live worker. The issue's status is left as the worker last
   * set it. Resolves false when no live worker exists for the issue.
   */
  cancelWorker(issueId: IssueId, reason: string): Promise<boolean>

  /**
   * Cancel every live worker and wait for them to settle. The tracker is
   * closed from then on: launches still in preparation are abandoned and
   * later spawn attempts resolve `closed`.
   */
  cancelAll(reason: string): Promise<void>
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface WorkerTaskTrackerOptions {
  eventBus: TypedEventBus
  router: IssueRouter
  config: Pick<ForemanConfig, 'bundle_markers' | 'issue_tool'>
  /** How long cancellation waits for a worker to settle before giving up */
  cancelGraceMs?: number
}

export function createWorkerTaskTracker(options: WorkerTaskTrackerOptions): WorkerTaskTracker {
  return new WorkerTaskTrackerImpl(
    options.eventBus,
    options.router,
    options.config,
    options.cancelGraceMs,
  )
}
