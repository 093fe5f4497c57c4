/**
 * Bundle path resolution.
 *
 * Pool configuration may name a worker bundle by a path relative to the
 * repository. The working directory at spawn time is not necessarily the one
 * the configuration was written against, so relative references are anchored
 * to the repository root before the bundle loader sees them.
 */

import { join, normalize } from 'node:path'
import { createLogger } from '../../utils/logger.js'
import { findRepoRoot } from '../../utils/repo-root.js'

const logger = createLogger('bundle-resolver')

/** How a bundle reference was resolved */
export type BundlePathSource = 'absolute' | 'marker' | 'repo-root' | 'unresolved'

export interface BundleResolution {
  path: string
  source: BundlePathSource
}

export interface BundleResolveOptions {
  /** Directory the upward marker walk starts from */
  cwd: string
  markers: readonly string[]
  /** Host-supplied repository root, consulted when the walk finds nothing */
  repoRoot?: string
}

const ADDRESSABLE_PREFIXES = ['git+', 'http', 'file:', '/'] as const

/** True when the reference needs no anchoring (URL, file URI or absolute path) */
export function isAddressable(ref: string): boolean {
  return ADDRESSABLE_PREFIXES.some((prefix) => ref.startsWith(prefix))
}

/**
 * Resolve a bundle reference. Never throws: an unanchorable relative path is
 * returned unchanged with a logged warning.
 */
export async function resolveBundlePath(
  ref: string,
  options: BundleResolveOptions,
): Promise<BundleResolution> {
  if (isAddressable(ref)) {
    return { path: ref, source: 'absolute' }
  }

  const root = await findRepoRoot(options.cwd, options.markers)
  if (root !== null) {
    return { path: normalize(join(root, ref)), source: 'marker' }
  }

  if (options.repoRoot !== undefined && options.repoRoot !== '') {
    return { path: normalize(join(options.repoRoot, ref)), source: 'repo-root' }
  }

  logger.warn(
    { ref, cwd: options.cwd, markers: options.markers },
    'Could not anchor relative bundle path; using it unchanged',
  )
  return { path: ref, source: 'unresolved' }
}
