/**
 * `foreman resolve-bundle <ref>`: show where a worker bundle reference points.
 *
 * Relative references are anchored at the nearest ancestor directory holding
 * one of the configured bundle markers, then at --repo-root.
 */

import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import { resolveBundlePath } from '../../modules/bundle-resolver/bundle-path-resolver.js'
import { loadCliConfig } from '../load-config.js'

export interface ResolveBundleOptions {
  configPath?: string
  cwd?: string
  repoRoot?: string
}

export async function runResolveBundle(ref: string, opts: ResolveBundleOptions = {}): Promise<number> {
  const cwd = opts.cwd ?? process.cwd()

  let markers: readonly string[]
  try {
    markers = loadCliConfig(opts.configPath, cwd).config.bundle_markers
  } catch (err) {
    process.stderr.write(`  Error loading configuration: ${errorMessage(err)}\n`)
    return 2
  }

  const resolution = await resolveBundlePath(ref, {
    cwd,
    markers,
    ...(opts.repoRoot !== undefined && { repoRoot: opts.repoRoot }),
  })

  process.stdout.write(`${resolution.path}\n  source: ${resolution.source}\n`)
  return resolution.source === 'unresolved' ? 1 : 0
}

export function registerResolveBundleCommand(program: Command): void {
  program
    .command('resolve-bundle <ref>')
    .description('Resolve a worker bundle reference the way spawns do')
    .option('--config <path>', 'Path to the foreman configuration file')
    .option('--cwd <dir>', 'Directory the marker walk starts from (defaults to the working directory)')
    .option('--repo-root <dir>', 'Repository root to fall back on when no marker is found')
    .action(async (ref: string, opts: { config?: string; cwd?: string; repoRoot?: string }) => {
      const exitCode = await runResolveBundle(ref, {
        configPath: opts.config,
        cwd: opts.cwd,
        repoRoot: opts.repoRoot,
      })
      process.exit(exitCode)
    })
}
