/**
 * WorkerTask: one detached background unit of work for an issue.
 *
 * Responsibilities:
 *  - Launching the unit as soon as the task is constructed
 *  - Owning the AbortController the unit observes
 *  - Deriving its state from settlement and the abort signal
 *  - Exposing a `done` promise that always resolves, never rejects
 */

import type { IssueId, WorkerState } from '../../core/types.js'

/** The unit of work; it must honour the abort signal */
export type WorkerRun = (signal: AbortSignal) => Promise<void>

export interface WorkerTaskMeta {
  issueId: IssueId
  pool: string
  /** Resolved bundle URI the worker was built from */
  bundle: string
}

/** Terminal outcome of a task */
export interface WorkerTaskSettlement {
  state: Exclude<WorkerState, 'running'>
  error: Error | null
  elapsedMs: number
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

// ---------------------------------------------------------------------------
// WorkerTask
// ---------------------------------------------------------------------------

export class WorkerTask {
  readonly issueId: IssueId
  readonly pool: string
  readonly bundle: string
  readonly startedAt: Date

  /** Resolves once the unit has settled, whatever the outcome */
  readonly done: Promise<WorkerTaskSettlement>

  private readonly _controller = new AbortController()
  private _settled = false
  private _finishedAt: Date | null = null
  private _error: Error | null = null
  private _cancelReason: string | null = null

  constructor(meta: WorkerTaskMeta, run: WorkerRun) {
    this.issueId = meta.issueId
    this.pool = meta.pool
    this.bundle = meta.bundle
    this.startedAt = new Date()

    const signal = this._controller.signal
    // Deferred to a microtask so the caller can register the task before the
    // unit makes progress
    this.done = Promise.resolve()
      .then(() => run(signal))
      .then(
        () => this._settle(null),
        (err: unknown) => this._settle(toError(err)),
      )
  }

  /** Live state, computed from the settlement flags on every read */
  get state(): WorkerState {
    return this._settled ? this._terminalState() : 'running'
  }

  get isFinished(): boolean {
    return this._settled
  }

  get error(): Error | null {
    return this._error
  }

  get finishedAt(): Date | null {
    return this._finishedAt
  }

  get cancelReason(): string | null {
    return this._cancelReason
  }

  get elapsedMs(): number {
    const end = this._finishedAt ?? new Date()
    return end.getTime() - this.startedAt.getTime()
  }

  /**
   * Request cancellation. A task that has already settled keeps its outcome.
   * Returns the settlement promise.
   */
  cancel(reason: string): Promise<WorkerTaskSettlement> {
    if (!this._settled && !this._controller.signal.aborted) {
      this._cancelReason = reason
      this._controller.abort(new Error(`Worker cancelled: ${reason}`))
    }
    return this.done
  }

  private _settle(error: Error | null): WorkerTaskSettlement {
    this._settled = true
    this._finishedAt = new Date()
    this._error = error
    const state = this._terminalState()
    return {
      state,
      error: state === 'failed' ? error : null,
      elapsedMs: this.elapsedMs,
    }
  }

  // Abort wins over the unit's own result: a unit that returns after being
  // cancelled still counts as cancelled
  private _terminalState(): WorkerTaskSettlement['state'] {
    if (this._controller.signal.aborted) return 'cancelled'
    return this._error !== null ? 'failed' : 'completed'
  }
}
