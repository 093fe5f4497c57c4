/**
 * OrphanScanner: detects issues left without a worker by a previous process.
 *
 * Responsibilities:
 *  - Scan the issue store once per process for `open` issues and for
 *    `in_progress` issues with no live worker in this process
 *  - Hold the result until the next progress report drains it
 *
 * Orphans are reported, never respawned. Respawning means loading bundles,
 * which the first turn after a restart must not wait on; the user or a fresh
 * work request re-triggers spawning.
 */

import type { TypedEventBus } from '../core/event-bus.js'
import { errorMessage } from '../core/errors.js'
import type { IssueId, IssueStatus } from '../core/types.js'
import type { IssueReader } from '../modules/issue-store/issue-client.js'
import type { Issue } from '../modules/issue-store/issue-schema.js'
import type { WorkerTaskTracker } from '../modules/worker-tracker/worker-task-tracker.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('orphan-scanner')

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OrphanScannerOptions {
  tracker: Pick<WorkerTaskTracker, 'isLive'>
  eventBus: TypedEventBus
}

// ---------------------------------------------------------------------------
// OrphanScanner
// ---------------------------------------------------------------------------

export class OrphanScanner {
  private readonly _tracker: Pick<WorkerTaskTracker, 'isLive'>
  private readonly _eventBus: TypedEventBus

  private _hasRun = false
  private _pending: Issue[] = []

  constructor(options: OrphanScannerOptions) {
    this._tracker = options.tracker
    this._eventBus = options.eventBus
  }

  get hasRun(): boolean {
    return this._hasRun
  }

  /**
   * Scan for orphaned issues on the first call; every later call is a no-op
   * returning 0. A status query that fails contributes no issues, and the
   * scan still counts as done.
   *
   * @returns the number of orphans found by this call
   */
  async maybeRecoverOrphanedIssues(issues: IssueReader): Promise<number> {
    if (this._hasRun) return 0
    this._hasRun = true

    const open = await this._list(issues, 'open')
    const inProgress = (await this._list(issues, 'in_progress')).filter(
      (issue) => !this._tracker.isLive(issue.id),
    )

    const byId = new Map<IssueId, Issue>()
    for (const issue of [...open, ...inProgress]) {
      if (!byId.has(issue.id)) byId.set(issue.id, issue)
    }
    this._pending = Array.from(byId.values())

    const orphaned = this._pending.length
    if (orphaned > 0) {
      logger.info({ orphaned, ids: Array.from(byId.keys()) }, 'Orphaned issues found from a previous session')
    }
    this._eventBus.emit('recovery:complete', { orphaned })
    return orphaned
  }

  /** Return the orphans awaiting report and clear them */
  takePendingOrphans(): Issue[] {
    const pending = this._pending
    this._pending = []
    return pending
  }

  private async _list(issues: IssueReader, status: IssueStatus): Promise<Issue[]> {
    try {
      return await issues.listByStatus(status)
    } catch (err) {
      logger.warn({ status, error: errorMessage(err) }, 'Orphan scan could not list issues')
      return []
    }
  }
}
