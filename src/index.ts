/**
 * issue-foreman - Main module exports
 * Public API surface for hosts embedding the foreman
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'

// Foreman
export { createForeman } from './core/foreman-impl.js'
export type { Foreman, ForemanOptions } from './core/foreman.js'
export type { ForemanTurn, TurnStatus } from './modules/agent-loop/agent-loop-driver.js'
export type { WorkerInfo } from './modules/worker-tracker/worker-task-tracker.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { ForemanEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Dependency Injection
export type { BaseService } from './core/di.js'
export { ServiceRegistry } from './core/di.js'

// Host contracts
export type * from './host/types.js'
export type {
  Capability,
  CapabilityMap,
  CapabilityName,
  HostCoordinator,
  ResolvedCapabilities,
} from './host/capabilities.js'
export { resolveCapabilities, capabilityOr } from './host/capabilities.js'

// Configuration
export * from './modules/config/index.js'

// Issues and routing
export * from './modules/issue-store/index.js'
export * from './modules/routing/index.js'
export * from './modules/bundle-resolver/index.js'

// Persistence
export * from './persistence/index.js'

// Recovery
export { setupGracefulShutdown } from './recovery/index.js'
export type { ShutdownHandlerOptions } from './recovery/index.js'
