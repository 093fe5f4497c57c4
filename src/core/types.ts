/**
 * Core types for the foreman
 * Shared type definitions used across all modules
 */

/** Opaque identifier of an issue in the external issue store */
export type IssueId = string

/** Status values the issue store understands */
export const ISSUE_STATUSES = [
  'open',
  'in_progress',
  'completed',
  'blocked',
  'pending_user_input',
] as const

/** Status of an issue, the only externally visible progress signal */
export type IssueStatus = (typeof ISSUE_STATUSES)[number]

/** Live state of a tracked worker task, derived from its settlement */
export type WorkerState = 'running' | 'completed' | 'failed' | 'cancelled'

/** Result of a spawn attempt; `closed` once the tracker has been shut down */
export type SpawnOutcome = 'spawned' | 'duplicate' | 'failed' | 'closed'

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const

/** Severity level for log messages */
export type LogLevel = (typeof LOG_LEVELS)[number]
