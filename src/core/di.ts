/**
 * Service lifecycle and registry.
 *
 * Stateful foreman parts (the spawn error log, the worker task tracker) take
 * part in an explicit initialize/shutdown lifecycle so that event
 * subscriptions are attached before the first turn and live workers are
 * cancelled when the host shuts down.
 */

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for foreman services.
 */
export interface BaseService {
  /** Subscribe to events and acquire resources before the first turn. */
  initialize(): Promise<void>

  /** Release resources; called in reverse registration order. */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named registry of services, initialized in registration order and shut
 * down in reverse.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('spawnErrors', spawnErrorLog)
 * registry.register('workerTracker', tracker)
 * await registry.initializeAll()
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  private readonly _order: string[] = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
    this._order.push(name)
  }

  has(name: string): boolean {
    return this._services.has(name)
  }

  /**
   * Initialize all services in registration order, failing fast on the
   * first error.
   */
  async initializeAll(): Promise<void> {
    for (const name of this._order) {
      const service = this._services.get(name)
      if (service !== undefined) {
        await service.initialize()
      }
    }
  }

  /**
   * Shut down every service in reverse order. Errors are collected and
   * re-thrown together once all services have been given the chance to stop.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []

    for (const name of [...this._order].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${errors.length} service(s)`)
    }
  }

  /** Names of all registered services in registration order */
  get serviceNames(): string[] {
    return [...this._order]
  }
}
