#!/usr/bin/env node
/**
 * Foreman CLI - diagnostics for foreman configurations and conversation stores
 */

import { Command } from 'commander'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { createLogger } from '../utils/logger.js'
import { registerConfigCommand } from './commands/config.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerResolveBundleCommand } from './commands/resolve-bundle.js'
import { registerRouteCommand } from './commands/route.js'

const logger = createLogger('cli')

/** Read the version from package.json, whether running from src/ or dist/src/ */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const pkgPath = [resolve(here, '../../package.json'), resolve(here, '../../../package.json')].find((p) =>
    existsSync(p),
  )
  if (pkgPath === undefined) return '0.0.0'

  try {
    const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version
    }
  } catch (err) {
    logger.debug({ err, pkgPath }, 'Could not read package version')
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()

  program
    .name('foreman')
    .description('Inspect foreman configuration, routing and conversation history')
    .version(version, '-v, --version', 'Output the current version')

  registerConfigCommand(program)
  registerRouteCommand(program)
  registerResolveBundleCommand(program)
  registerHistoryCommand(program, version)

  return program
}

async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

void main()
