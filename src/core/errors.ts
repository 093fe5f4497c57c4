/**
 * Error definitions for the foreman
 * Provides a structured error hierarchy for routing, spawning and host integration
 */

/** Base error class for all foreman errors */
export class ForemanError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'ForemanError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ForemanError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid or missing */
export class ConfigError extends ForemanError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when no worker pool can be resolved for an issue */
export class RoutingError extends ForemanError {
  constructor(issueId: string, issueType: string) {
    super(`No worker pool for issue ${issueId} (type: ${issueType})`, 'ROUTING_ERROR', {
      issueId,
      issueType,
    })
    this.name = 'RoutingError'
  }
}

/** Error thrown when a worker pool carries no usable bundle reference */
export class BundleResolutionError extends ForemanError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BUNDLE_RESOLUTION_ERROR', context)
    this.name = 'BundleResolutionError'
  }
}

/** Error thrown when a host capability required for an operation is absent */
export class CapabilityUnavailableError extends ForemanError {
  constructor(capability: string) {
    super(`${capability} capability not available`, 'CAPABILITY_UNAVAILABLE', {
      capability,
    })
    this.name = 'CapabilityUnavailableError'
  }
}

/** Error thrown when a background worker session fails */
export class WorkerExecutionError extends ForemanError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'WORKER_EXECUTION_ERROR', context)
    this.name = 'WorkerExecutionError'
  }
}

/** Error thrown when the issue tool returns a payload of the wrong shape */
export class IssueStoreError extends ForemanError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'ISSUE_STORE_ERROR', context)
    this.name = 'IssueStoreError'
  }
}

/** Render any thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
