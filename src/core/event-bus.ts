/**
 * Typed internal bus between the foreman's services.
 *
 * Dispatch is synchronous: every handler has run when `emit()` returns. A
 * handler that throws is logged and skipped; the emitter and the remaining
 * handlers carry on.
 */

import { EventEmitter } from 'node:events'
import { createLogger } from '../utils/logger.js'
import type { ForemanEvents } from './event-bus.types.js'

const logger = createLogger('event-bus')

export type ForemanEventName = keyof ForemanEvents & string

export type ForemanEventHandler<K extends ForemanEventName> = (payload: ForemanEvents[K]) => void

export interface TypedEventBus {
  /** Run every handler of `event`, in registration order */
  emit<K extends ForemanEventName>(event: K, payload: ForemanEvents[K]): void
  on<K extends ForemanEventName>(event: K, handler: ForemanEventHandler<K>): void
  /** No-op for a handler that is not registered */
  off<K extends ForemanEventName>(event: K, handler: ForemanEventHandler<K>): void
}

export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor() {
    this._emitter.setMaxListeners(100)
  }

  emit<K extends ForemanEventName>(event: K, payload: ForemanEvents[K]): void {
    // Snapshot so a handler that calls off() does not skip its neighbour
    for (const listener of this._emitter.listeners(event)) {
      try {
        Reflect.apply(listener, undefined, [payload])
      } catch (err) {
        logger.error({ event, err }, 'Event handler threw; continuing with the remaining handlers')
      }
    }
  }

  on<K extends ForemanEventName>(event: K, handler: ForemanEventHandler<K>): void {
    this._emitter.on(event, handler)
  }

  off<K extends ForemanEventName>(event: K, handler: ForemanEventHandler<K>): void {
    this._emitter.off(event, handler)
  }
}

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
