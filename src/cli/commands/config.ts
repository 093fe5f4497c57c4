/**
 * `foreman config` command group
 *
 * Subcommands:
 *   - `foreman config validate [--config <path>]`: validate and summarise the configuration
 *   - `foreman config show [--config <path>] [--format yaml|json]`: print the normalized configuration
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { ConfigError, errorMessage } from '../../core/errors.js'
import { findConfigWarnings } from '../../modules/config/config-loader.js'
import type { ForemanConfig } from '../../modules/config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { loadCliConfig, type CliConfig } from '../load-config.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1

export interface ConfigCommandOptions {
  configPath?: string
  cwd?: string
}

/** Load configuration, reporting failures on stderr; a number is the exit code to return */
function load(opts: ConfigCommandOptions): CliConfig | number {
  try {
    return loadCliConfig(opts.configPath, opts.cwd)
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`  Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_ERROR
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config validate` action
// ---------------------------------------------------------------------------

export function formatConfigSummary(config: ForemanConfig, source: string): string {
  const lines = [`Configuration: ${source}`, '', 'Worker pools:']
  if (config.worker_pools.length === 0) {
    lines.push('  (none)')
  }
  for (const pool of config.worker_pools) {
    const types = pool.route_types !== undefined && pool.route_types.length > 0 ? ` [${pool.route_types.join(', ')}]` : ''
    lines.push(`  - ${pool.name}: ${pool.worker_bundle ?? '(no worker_bundle)'}${types}`)
  }

  lines.push('', 'Routing rules:')
  if (config.routing.rules.length === 0) {
    lines.push('  (none)')
  }
  config.routing.rules.forEach((rule, i) => {
    lines.push(`  ${i + 1}. ${rule.if_metadata_type.join(', ')} -> ${rule.then_pool}`)
  })
  lines.push(`Default pool: ${config.routing.default_pool ?? '(first configured pool)'}`)
  lines.push(`Max iterations: ${config.max_iterations}`)
  return lines.join('\n') + '\n'
}

export async function runConfigValidate(opts: ConfigCommandOptions = {}): Promise<number> {
  const loaded = load(opts)
  if (typeof loaded === 'number') return loaded

  process.stdout.write(formatConfigSummary(loaded.config, loaded.path ?? 'built-in defaults'))

  const warnings = findConfigWarnings(loaded.config)
  if (warnings.length > 0) {
    process.stdout.write('\nWarnings:\n')
    for (const warning of warnings) {
      process.stdout.write(`  ! ${warning}\n`)
    }
  }

  process.stdout.write('\nConfiguration is valid.\n')
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const loaded = load(opts)
  if (typeof loaded === 'number') return loaded

  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(loaded.config, null, 2) + '\n')
  } else {
    process.stdout.write(yaml.dump(loaded.config))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Inspect the foreman configuration')

  configCmd
    .command('validate')
    .description('Validate the configuration and list pools, rules and warnings')
    .option('--config <path>', 'Path to the foreman configuration file')
    .action(async (opts: { config?: string }) => {
      const exitCode = await runConfigValidate({ configPath: opts.config })
      process.exit(exitCode)
    })

  configCmd
    .command('show')
    .description('Print the configuration with defaults applied')
    .option('--config <path>', 'Path to the foreman configuration file')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .action(async (opts: { config?: string; format: string }) => {
      const exitCode = await runConfigShow({
        configPath: opts.config,
        format: opts.format === 'json' ? 'json' : 'yaml',
      })
      process.exit(exitCode)
    })
}
