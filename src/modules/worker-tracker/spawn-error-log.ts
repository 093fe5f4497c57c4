/**
 * SpawnErrorLog: single-consumer drain queue of spawn and execution failures.
 *
 * Listens to `worker:spawn-failed` on the event bus. The progress reporter
 * drains it once per turn; messages not drained before exit are lost, which
 * is acceptable because each failure was also written to the issue store as
 * a `blocked` status.
 */

import type { BaseService } from '../../core/di.js'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { ForemanEvents } from '../../core/event-bus.types.js'

export class SpawnErrorLog implements BaseService {
  private readonly _eventBus: TypedEventBus
  private _messages: string[] = []

  private readonly _onSpawnFailed: (payload: ForemanEvents['worker:spawn-failed']) => void

  constructor(eventBus: TypedEventBus) {
    this._eventBus = eventBus
    this._onSpawnFailed = ({ message }) => {
      this.record(message)
    }
  }

  async initialize(): Promise<void> {
    this._eventBus.on('worker:spawn-failed', this._onSpawnFailed)
  }

  async shutdown(): Promise<void> {
    this._eventBus.off('worker:spawn-failed', this._onSpawnFailed)
  }

  record(message: string): void {
    this._messages.push(message)
  }

  /** Return every accumulated message and clear the log */
  drain(): string[] {
    const drained = this._messages
    this._messages = []
    return drained
  }
}
