/**
 * Configuration lookup shared by the CLI commands.
 */

import { existsSync } from 'node:fs'
import { loadForemanConfig, parseForemanConfig, resolveConfigPath } from '../modules/config/config-loader.js'
import type { ForemanConfig } from '../modules/config/config-schema.js'
import { CONFIG_PATH_ENV } from '../modules/config/defaults.js'

export interface CliConfig {
  config: ForemanConfig
  /** File the configuration came from, or null for built-in defaults */
  path: string | null
}

/**
 * Load the configuration named by `--config`, then FOREMAN_CONFIG, then
 * ./foreman.yaml. When nothing was named explicitly and the default file does
 * not exist, the built-in defaults are used.
 *
 * @throws {ConfigError} when the chosen file is unreadable or invalid
 */
export function loadCliConfig(explicit: string | undefined, cwd: string = process.cwd()): CliConfig {
  const path = resolveConfigPath(explicit, cwd)
  const named = explicit !== undefined || process.env[CONFIG_PATH_ENV] !== undefined
  if (!named && !existsSync(path)) {
    return { config: parseForemanConfig({}, 'defaults'), path: null }
  }
  return { config: loadForemanConfig(path), path }
}
