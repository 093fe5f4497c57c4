/**
 * Foreman interface: the public contract the agent-hosting framework mounts.
 *
 * Create an instance via `createForeman()` from foreman-impl.ts. The host
 * calls `execute()` once per conversational turn, passing that turn's
 * context, providers, tools, hooks and coordinator.
 */

import type { ForemanTurn } from '../modules/agent-loop/agent-loop-driver.js'
import type { ForemanConfig, ForemanConfigInput } from '../modules/config/config-schema.js'
import type { WorkerInfo } from '../modules/worker-tracker/worker-task-tracker.js'
import type { TypedEventBus } from './event-bus.js'
import type { IssueId, WorkerState } from './types.js'

// ---------------------------------------------------------------------------
// ForemanOptions
// ---------------------------------------------------------------------------

export interface ForemanOptions {
  /** Raw configuration (snake_case keys, as in foreman.yaml); validated on creation */
  config?: ForemanConfigInput

  /**
   * How long cancellation waits for a worker to settle.
   * @default 5000
   */
  cancelGraceMs?: number
}

// ---------------------------------------------------------------------------
// Foreman interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle:
 *  1. Create via `createForeman(options)`
 *  2. `initialize()` attaches internal subscriptions (the first `execute()`
 *     does so if the host has not)
 *  3. `execute()` per turn; workers outlive the turn that spawned them
 *  4. `shutdown()` cancels every live worker
 */
export interface Foreman {
  /** Internal event bus; hosts may subscribe for diagnostics */
  readonly events: TypedEventBus

  readonly config: ForemanConfig

  readonly isReady: boolean

  initialize(): Promise<void>

  /**
   * Run one conversational turn and return the reply text.
   *
   * @throws {ForemanError} with code FOREMAN_SHUT_DOWN after shutdown()
   */
  execute(prompt: string, turn: ForemanTurn): Promise<string>

  /** Live state of every tracked worker, keyed by issue id */
  getWorkerStatus(): Record<IssueId, WorkerState>

  getWorkers(): WorkerInfo[]

  /**
   * Cancel the live worker of one issue; the issue's status is not changed.
   * Resolves false when the issue has no live worker.
   */
  cancelWorker(issueId: IssueId, reason?: string): Promise<boolean>

  /**
   * Cancel all live workers and stop services. Safe to call more than once.
   */
  shutdown(reason?: string): Promise<void>
}
