/**
 * Loader for the foreman configuration document.
 *
 * The document is YAML on disk (`foreman.yaml` by default, or the file named
 * by FOREMAN_CONFIG) and a plain object when the host passes configuration
 * in directly. Both routes go through the same Zod schema.
 */

import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { load as yamlLoad } from 'js-yaml'
import type { ZodIssue } from 'zod'
import { ConfigError, errorMessage } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import { ForemanConfigSchema, type ForemanConfig } from './config-schema.js'
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_FILE } from './defaults.js'

const logger = createLogger('config')

function formatIssues(issues: readonly ZodIssue[]): string {
  return issues.map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n')
}

/**
 * Validate an in-memory configuration object and apply defaults.
 *
 * @param source - Label used in error messages (a file path, or "inline")
 * @throws {ConfigError} when validation fails
 */
export function parseForemanConfig(raw: unknown, source = 'inline'): ForemanConfig {
  const result = ForemanConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    const details = formatIssues(result.error.issues)
    throw new ConfigError(`Foreman config validation failed for "${source}":\n${details}`, {
      source,
      details,
    })
  }
  return result.data
}

/**
 * Load and validate a foreman configuration YAML file.
 *
 * @throws {ConfigError} if the file cannot be read, parsed or validated
 *
 * @example
 * const config = loadForemanConfig('foreman.yaml')
 */
export function loadForemanConfig(filePath: string): ForemanConfig {
  let rawContent: string
  try {
    rawContent = readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new ConfigError(`Cannot read foreman config file at "${filePath}": ${errorMessage(err)}`, {
      filePath,
    })
  }

  let rawObject: unknown
  try {
    rawObject = yamlLoad(rawContent)
  } catch (err) {
    throw new ConfigError(`Invalid YAML in foreman config file at "${filePath}": ${errorMessage(err)}`, {
      filePath,
    })
  }

  // An empty file is a valid, all-defaults document
  if (rawObject === undefined || rawObject === null) {
    rawObject = {}
  }
  if (typeof rawObject !== 'object' || Array.isArray(rawObject)) {
    throw new ConfigError(`Foreman config file at "${filePath}" must contain a YAML object`, {
      filePath,
    })
  }

  const config = parseForemanConfig(rawObject, filePath)
  for (const warning of findConfigWarnings(config)) {
    logger.warn({ filePath }, warning)
  }
  logger.debug({ filePath, pools: config.worker_pools.length }, 'Foreman config loaded')
  return config
}

/**
 * Report references to pools that do not exist. These are not errors: the
 * router resolves an unknown name to no pool at all, which surfaces as a
 * blocked issue at spawn time.
 */
export function findConfigWarnings(config: ForemanConfig): string[] {
  const poolNames = new Set(config.worker_pools.map((p) => p.name))
  const warnings: string[] = []

  config.routing.rules.forEach((rule, index) => {
    if (!poolNames.has(rule.then_pool)) {
      warnings.push(`Routing rule ${index + 1} targets unknown pool "${rule.then_pool}"`)
    }
  })

  const defaultPool = config.routing.default_pool
  if (defaultPool !== undefined && !poolNames.has(defaultPool)) {
    warnings.push(`Default pool "${defaultPool}" is not a configured worker pool`)
  }

  for (const pool of config.worker_pools) {
    if (pool.worker_bundle === undefined) {
      warnings.push(`Worker pool "${pool.name}" has no worker_bundle; spawns routed to it will fail`)
    }
  }

  return warnings
}

/**
 * Pick the configuration file path: an explicit path, then FOREMAN_CONFIG,
 * then foreman.yaml in the working directory.
 */
export function resolveConfigPath(explicit?: string, cwd: string = process.cwd()): string {
  const chosen = explicit ?? process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_FILE
  return resolve(cwd, chosen)
}
