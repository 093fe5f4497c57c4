/**
 * ForemanImpl: concrete implementation of the Foreman interface.
 *
 * The createForeman() factory:
 *  1. Validates the configuration
 *  2. Instantiates the TypedEventBus
 *  3. Creates the router, spawn error log, worker task tracker, orphan
 *     scanner, progress reporter and agent loop driver via constructor injection
 *  4. Registers the stateful services in a ServiceRegistry
 *
 * Nothing here holds the host coordinator; it arrives with each turn.
 */

import { createLogger } from '../utils/logger.js'
import { AgentLoopDriver, type ForemanTurn } from '../modules/agent-loop/agent-loop-driver.js'
import { parseForemanConfig } from '../modules/config/config-loader.js'
import type { ForemanConfig } from '../modules/config/config-schema.js'
import { ProgressReporter } from '../modules/progress/progress-reporter.js'
import { IssueRouter } from '../modules/routing/issue-router.js'
import { SpawnErrorLog } from '../modules/worker-tracker/spawn-error-log.js'
import {
  createWorkerTaskTracker,
  type WorkerInfo,
  type WorkerTaskTracker,
} from '../modules/worker-tracker/worker-task-tracker.js'
import { OrphanScanner } from '../recovery/orphan-scanner.js'
import { ServiceRegistry } from './di.js'
import { ForemanError } from './errors.js'
import { createEventBus, type TypedEventBus } from './event-bus.js'
import type { Foreman, ForemanOptions } from './foreman.js'
import type { IssueId, WorkerState } from './types.js'

const logger = createLogger('foreman')

// ---------------------------------------------------------------------------
// ForemanImpl
// ---------------------------------------------------------------------------

interface ForemanParts {
  config: ForemanConfig
  eventBus: TypedEventBus
  registry: ServiceRegistry
  tracker: WorkerTaskTracker
  driver: AgentLoopDriver
}

class ForemanImpl implements Foreman {
  readonly events: TypedEventBus
  readonly config: ForemanConfig
  private readonly _registry: ServiceRegistry
  private readonly _tracker: WorkerTaskTracker
  private readonly _driver: AgentLoopDriver
  private _initializing: Promise<void> | null = null
  private _ready = false
  private _shutdown = false

  constructor(parts: ForemanParts) {
    this.config = parts.config
    this.events = parts.eventBus
    this._registry = parts.registry
    this._tracker = parts.tracker
    this._driver = parts.driver
  }

  get isReady(): boolean {
    return this._ready
  }

  initialize(): Promise<void> {
    if (this._initializing === null) {
      this._initializing = this._initialize()
    }
    return this._initializing
  }

  private async _initialize(): Promise<void> {
    try {
      await this._registry.initializeAll()
    } catch (err) {
      logger.error({ err }, 'Service initialization failed; shutting down initialized services')
      try {
        await this._registry.shutdownAll()
      } catch (shutdownErr) {
        logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
      }
      this._initializing = null
      throw err
    }
    this._ready = true
    logger.info({ pools: this.config.worker_pools.map((p) => p.name) }, 'Foreman ready')
  }

  async execute(prompt: string, turn: ForemanTurn): Promise<string> {
    if (this._shutdown) {
      throw new ForemanError('Foreman has been shut down', 'FOREMAN_SHUT_DOWN')
    }
    await this.initialize()
    return this._driver.execute(prompt, turn)
  }

  getWorkerStatus(): Record<IssueId, WorkerState> {
    return this._tracker.getWorkerStatus()
  }

  getWorkers(): WorkerInfo[] {
    return this._tracker.getWorkers()
  }

  cancelWorker(issueId: IssueId, reason = 'cancelled by host'): Promise<boolean> {
    return this._tracker.cancelWorker(issueId, reason)
  }

  async shutdown(reason = 'shutdown'): Promise<void> {
    if (this._shutdown) return
    this._shutdown = true

    logger.info({ reason, live: this._tracker.runningCount() }, 'Foreman shutdown initiated')
    this.events.emit('foreman:shutdown', { reason })

    try {
      await this._tracker.cancelAll(reason)
      await this._registry.shutdownAll()
    } catch (err) {
      logger.error({ err }, 'Error during foreman shutdown')
    }

    this._ready = false
    logger.info('Foreman shutdown complete')
  }
}

// ---------------------------------------------------------------------------
// createForeman factory
// ---------------------------------------------------------------------------

/**
 * Build a foreman with all modules wired via constructor injection.
 *
 * @throws {ConfigError} when the configuration is invalid
 */
export function createForeman(options: ForemanOptions = {}): Foreman {
  const config = parseForemanConfig(options.config ?? {})
  const eventBus = createEventBus()

  const router = new IssueRouter(config)
  const spawnErrors = new SpawnErrorLog(eventBus)
  const tracker = createWorkerTaskTracker({
    eventBus,
    router,
    config,
    cancelGraceMs: options.cancelGraceMs,
  })
  const scanner = new OrphanScanner({ tracker, eventBus })
  const reporter = new ProgressReporter({ tracker, scanner, spawnErrors, config })
  const driver = new AgentLoopDriver({ config, tracker, scanner, reporter, eventBus })

  // The error log must be listening before the tracker can report failures
  const registry = new ServiceRegistry()
  registry.register('spawnErrors', spawnErrors)
  registry.register('workerTracker', tracker)

  return new ForemanImpl({ config, eventBus, registry, tracker, driver })
}
