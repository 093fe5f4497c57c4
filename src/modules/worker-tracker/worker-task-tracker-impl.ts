/**
 * Concrete WorkerTaskTracker.
 *
 * Spawn pipeline: route → resolve bundle path → build instruction → launch.
 * A failure before launch and a failure inside the running unit both end in
 * a spawn-error record and a `blocked` issue; cancellation ends in neither.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import {
  BundleResolutionError,
  CapabilityUnavailableError,
  ForemanError,
  RoutingError,
  errorMessage,
} from '../../core/errors.js'
import type { IssueId, SpawnOutcome, WorkerState } from '../../core/types.js'
import { capabilityOr } from '../../host/capabilities.js'
import { createLogger } from '../../utils/logger.js'
import { resolveBundlePath } from '../bundle-resolver/bundle-path-resolver.js'
import type { ForemanConfig } from '../config/config-schema.js'
import { issueTypeOf, type IssueStore } from '../issue-store/issue-client.js'
import type { Issue } from '../issue-store/issue-schema.js'
import type { IssueRouter } from '../routing/issue-router.js'
import { buildWorkerInstruction } from './worker-instruction.js'
import { runWorkerSession, type WorkerLaunch } from './worker-runner.js'
import { WorkerTask, type WorkerTaskSettlement } from './worker-task.js'
import type {
  WorkerInfo,
  WorkerSpawnContext,
  WorkerTaskTracker,
} from './worker-task-tracker.js'

const logger = createLogger('worker-tracker')

// Time cancellation waits for units to honour their abort signal
const DEFAULT_CANCEL_GRACE_MS = 5_000

// ---------------------------------------------------------------------------
// WorkerTaskTrackerImpl
// ---------------------------------------------------------------------------

export class WorkerTaskTrackerImpl implements WorkerTaskTracker {
  private readonly _eventBus: TypedEventBus
  private readonly _router: IssueRouter
  private readonly _config: Pick<ForemanConfig, 'bundle_markers' | 'issue_tool'>
  private readonly _cancelGraceMs: number

  private readonly _tasks: Map<IssueId, WorkerTask> = new Map()
  /** Issues whose launch is being prepared; they count as live */
  private readonly _launching: Set<IssueId> = new Set()
  private readonly _everSpawned: Set<IssueId> = new Set()
  private _closed = false

  constructor(
    eventBus: TypedEventBus,
    router: IssueRouter,
    config: Pick<ForemanConfig, 'bundle_markers' | 'issue_tool'>,
    cancelGraceMs: number = DEFAULT_CANCEL_GRACE_MS,
  ) {
    this._eventBus = eventBus
    this._router = router
    this._config = config
    this._cancelGraceMs = cancelGraceMs
  }

  // ---------------------------------------------------------------------------
  // BaseService lifecycle
  // ---------------------------------------------------------------------------

  async initialize(): Promise<void> {
    logger.debug('WorkerTaskTracker.initialize()')
  }

  async shutdown(): Promise<void> {
    logger.debug('WorkerTaskTracker.shutdown()')
    await this.cancelAll('shutdown')
  }

  // ---------------------------------------------------------------------------
  // Spawning
  // ---------------------------------------------------------------------------

  async maybeSpawnWorker(issue: Issue, ctx: WorkerSpawnContext): Promise<SpawnOutcome> {
    const issueId = issue.id

    if (this._closed) {
      logger.warn({ issueId }, 'Tracker is shut down; not spawning a worker')
      return 'closed'
    }

    if (this.isLive(issueId)) {
      logger.debug({ issueId }, 'Worker already live for issue; skipping spawn')
      this._eventBus.emit('worker:duplicate', { issueId })
      return 'duplicate'
    }

    // Claimed synchronously so a second call in the same tick sees it as live
    this._launching.add(issueId)
    this._everSpawned.add(issueId)

    let launch: WorkerLaunch
    try {
      launch = await this._prepareLaunch(issue, ctx)
    } catch (err) {
      this._launching.delete(issueId)
      await this._recordFailure(
        issueId,
        `Failed to spawn worker for issue ${issueId}: ${errorMessage(err)}`,
        ctx.issues,
      )
      return 'failed'
    }

    if (this._closed) {
      this._launching.delete(issueId)
      logger.warn({ issueId }, 'Tracker shut down while the worker was being prepared; launch abandoned')
      return 'closed'
    }

    const task = new WorkerTask(
      { issueId, pool: launch.pool, bundle: launch.bundleUri },
      (signal) => this._runUnit(launch, signal, ctx.issues),
    )
    this._tasks.set(issueId, task)
    this._launching.delete(issueId)

    void task.done.then((settlement) => {
      this._onSettled(task, settlement)
    })

    this._eventBus.emit('worker:spawned', { issueId, pool: launch.pool, bundle: launch.bundleUri })
    logger.info({ issueId, pool: launch.pool, bundle: launch.bundleUri }, 'Worker spawned')
    return 'spawned'
  }

  private async _prepareLaunch(issue: Issue, ctx: WorkerSpawnContext): Promise<WorkerLaunch> {
    const pool = this._router.route(issue)
    if (pool === null) {
      throw new RoutingError(issue.id, issueTypeOf(issue))
    }
    if (pool.worker_bundle === undefined) {
      throw new BundleResolutionError(`Worker pool "${pool.name}" has no worker_bundle configured`, {
        pool: pool.name,
      })
    }

    const parent = ctx.session
    const workingDir = capabilityOr(ctx.capabilities.workingDir, parent?.workingDir ?? process.cwd())
    const repoRoot = ctx.capabilities.repoRoot
    const resolution = await resolveBundlePath(pool.worker_bundle, {
      cwd: workingDir,
      markers: this._config.bundle_markers,
      ...(repoRoot.kind === 'present' ? { repoRoot: repoRoot.value } : {}),
    })

    const instruction = buildWorkerInstruction(issue, this._config.issue_tool)

    const bundleLoad = ctx.capabilities.bundleLoad
    if (bundleLoad.kind === 'absent') {
      throw new CapabilityUnavailableError(bundleLoad.name)
    }
    if (parent === null) {
      throw new ForemanError('No parent session to spawn the worker from', 'NO_PARENT_SESSION', {
        issueId: issue.id,
      })
    }

    const persist = ctx.capabilities.persistSession
    return {
      issueId: issue.id,
      pool: pool.name,
      bundleUri: resolution.path,
      instruction,
      parent,
      workingDir,
      loadBundle: bundleLoad.value,
      persist: persist.kind === 'present' ? persist.value : null,
    }
  }

  private async _runUnit(launch: WorkerLaunch, signal: AbortSignal, issues: IssueStore): Promise<void> {
    try {
      await runWorkerSession(launch, signal)
    } catch (err) {
      if (!signal.aborted) {
        await this._recordFailure(
          launch.issueId,
          `Worker execution failed for issue ${launch.issueId}: ${errorMessage(err)}`,
          issues,
        )
      }
      throw err
    }
  }

  /**
   * Record a spawn error and mark the issue blocked. This is the one place
   * the foreman sets a status on a worker's issue: the worker never started,
   * or died, and cannot report it.
   */
  private async _recordFailure(issueId: IssueId, message: string, issues: IssueStore): Promise<void> {
    logger.warn({ issueId }, message)
    this._eventBus.emit('worker:spawn-failed', { issueId, message })
    try {
      await issues.update(issueId, { status: 'blocked', block_reason: message })
    } catch (err) {
      logger.error({ issueId, err }, 'Failed to mark issue blocked after worker failure')
    }
  }

  private _onSettled(task: WorkerTask, settlement: WorkerTaskSettlement): void {
    const { issueId, pool } = task
    const { elapsedMs } = settlement

    switch (settlement.state) {
      case 'completed':
        logger.info({ issueId, pool, elapsedMs }, 'Worker completed')
        this._eventBus.emit('worker:completed', { issueId, pool, elapsedMs })
        break
      case 'failed': {
        const error = settlement.error?.message ?? 'unknown error'
        logger.warn({ issueId, pool, elapsedMs, error }, 'Worker failed')
        this._eventBus.emit('worker:failed', { issueId, pool, elapsedMs, error })
        break
      }
      case 'cancelled': {
        const reason = task.cancelReason ?? 'aborted'
        logger.info({ issueId, pool, reason }, 'Worker cancelled')
        this._eventBus.emit('worker:cancelled', { issueId, pool, reason })
        break
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Introspection
  // ---------------------------------------------------------------------------

  getWorkerStatus(): Record<IssueId, WorkerState> {
    const status: Record<IssueId, WorkerState> = {}
    for (const [issueId, task] of this._tasks) {
      status[issueId] = task.state
    }
    return status
  }

  getWorkers(): WorkerInfo[] {
    return Array.from(this._tasks.values()).map((task) => ({
      issueId: task.issueId,
      pool: task.pool,
      bundle: task.bundle,
      state: task.state,
      startedAt: task.startedAt,
      elapsedMs: task.elapsedMs,
    }))
  }

  isLive(issueId: IssueId): boolean {
    if (this._launching.has(issueId)) return true
    const task = this._tasks.get(issueId)
    return task !== undefined && !task.isFinished
  }

  runningCount(): number {
    let count = 0
    for (const task of this._tasks.values()) {
      if (!task.isFinished) count++
    }
    return count
  }

  hasEverSpawned(issueId: IssueId): boolean {
    return this._everSpawned.has(issueId)
  }

  // ---------------------------------------------------------------------------
  // Supervision
  // ---------------------------------------------------------------------------

  reap(): WorkerTask[] {
    const reaped: WorkerTask[] = []
    for (const [issueId, task] of this._tasks) {
      if (task.isFinished) {
        this._tasks.delete(issueId)
        reaped.push(task)
      }
    }
    if (reaped.length > 0) {
      this._eventBus.emit('worker:reaped', { issueIds: reaped.map((t) => t.issueId) })
      logger.debug({ count: reaped.length }, 'Reaped finished worker tasks')
    }
    return reaped
  }

  async cancelWorker(issueId: IssueId, reason: string): Promise<boolean> {
    const task = this._tasks.get(issueId)
    if (task === undefined || task.isFinished) {
      return false
    }
    await this._awaitWithGrace([task.cancel(reason)])
    return true
  }

  async cancelAll(reason: string): Promise<void> {
    this._closed = true
    const live = Array.from(this._tasks.values()).filter((t) => !t.isFinished)
    if (live.length === 0) return

    logger.info({ count: live.length, reason }, 'Cancelling all live workers')
    await this._awaitWithGrace(live.map((t) => t.cancel(reason)))
  }

  private async _awaitWithGrace(settlements: Promise<WorkerTaskSettlement>[]): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this._cancelGraceMs)
    })
    try {
      const result = await Promise.race([Promise.all(settlements), timedOut])
      if (result === 'timeout') {
        logger.warn(
          { graceMs: this._cancelGraceMs },
          'Some workers did not stop within the cancellation grace period',
        )
      }
    } finally {
      clearTimeout(timer)
    }
  }
}
