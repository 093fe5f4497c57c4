/**
 * Module loggers for the foreman.
 *
 * All module loggers are children of one pino root per output mode, so the
 * pretty transport's worker thread is started at most once. Each child
 * carries a `module` binding and its own level:
 *
 *   LOG_LEVEL_<MODULE>  level for one module (`worker-tracker` reads LOG_LEVEL_WORKER_TRACKER)
 *   LOG_LEVEL           level for every other module
 *   NODE_ENV            info in production, debug in development, silent under test, otherwise warn
 *
 * An unknown level name in either variable is ignored.
 */

import pino from 'pino'
import { LOG_LEVELS, type LogLevel } from '../core/types.js'

export interface LoggerOptions {
  level?: LogLevel
  pretty?: boolean
}

/**
 * Paths redacted from every log record. Provider configurations handed in by
 * the host may carry credentials.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'providers.*.apiKey',
  'providers.*.api_key',
]

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === normalized)
}

/** `worker-tracker` becomes `LOG_LEVEL_WORKER_TRACKER` */
export function moduleLevelVariable(name: string): string {
  return `LOG_LEVEL_${name.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}`
}

export function resolveLogLevel(name: string): LogLevel {
  const level = parseLogLevel(process.env[moduleLevelVariable(name)]) ?? parseLogLevel(process.env.LOG_LEVEL)
  if (level !== undefined) return level
  switch (process.env.NODE_ENV) {
    case 'production':
      return 'info'
    case 'development':
      return 'debug'
    case 'test':
      return 'silent'
    default:
      return 'warn'
  }
}

function isPrettyMode(): boolean {
  if (process.env.LOG_PRETTY !== undefined) {
    return process.env.LOG_PRETTY === 'true'
  }
  return process.env.NODE_ENV === 'development'
}

const roots = new Map<boolean, pino.Logger>()

function rootLogger(pretty: boolean): pino.Logger {
  const existing = roots.get(pretty)
  if (existing !== undefined) return existing

  const options: pino.LoggerOptions = {
    name: 'foreman',
    // Children filter by their own level
    level: 'trace',
    redact: PINO_REDACT_PATHS,
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      },
    }),
  }
  const root = pino(options)
  roots.set(pretty, root)
  return root
}

/** Logger for one module; the level is fixed when it is created */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const root = rootLogger(options.pretty ?? isPrettyMode())
  return root.child({ module: name }, { level: options.level ?? resolveLogLevel(name) })
}

export const logger = createLogger('foreman')

export function childLogger(parent: pino.Logger, bindings: Record<string, unknown>): pino.Logger {
  return parent.child(bindings)
}
