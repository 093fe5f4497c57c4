/**
 * `foreman route <issue-type>`: show which worker pool an issue type routes to.
 */

import type { Command } from 'commander'
import { IssueRouter } from '../../modules/routing/issue-router.js'
import { loadCliConfig } from '../load-config.js'
import { ConfigError, errorMessage } from '../../core/errors.js'

export interface RouteOptions {
  configPath?: string
  cwd?: string
}

export async function runRoute(issueType: string, opts: RouteOptions = {}): Promise<number> {
  let router: IssueRouter
  try {
    router = new IssueRouter(loadCliConfig(opts.configPath, opts.cwd).config)
  } catch (err) {
    const prefix = err instanceof ConfigError ? 'Configuration error' : 'Error loading configuration'
    process.stderr.write(`  ${prefix}: ${errorMessage(err)}\n`)
    return 2
  }

  const explanation = router.explainType(issueType)
  if (explanation.pool === null) {
    process.stdout.write(`No worker pool for issue type "${issueType}": ${explanation.rationale}\n`)
    return 1
  }

  process.stdout.write(`${explanation.pool.name}\n  ${explanation.rationale}\n`)
  if (explanation.pool.worker_bundle !== undefined) {
    process.stdout.write(`  bundle: ${explanation.pool.worker_bundle}\n`)
  }
  return 0
}

export function registerRouteCommand(program: Command): void {
  program
    .command('route <issue-type>')
    .description('Show the worker pool an issue of the given type is routed to')
    .option('--config <path>', 'Path to the foreman configuration file')
    .action(async (issueType: string, opts: { config?: string }) => {
      const exitCode = await runRoute(issueType, { configPath: opts.config })
      process.exit(exitCode)
    })
}
