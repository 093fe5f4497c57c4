/**
 * Repository root discovery.
 *
 * Walks upward from a starting directory looking for a marker directory
 * (`.git`, or the foreman's own state directory). The first directory that
 * contains any marker is the root.
 */

import { stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Find the nearest ancestor of `startDir` (inclusive) containing one of the
 * marker directories, or `null` when the filesystem root is reached first.
 */
export async function findRepoRoot(
  startDir: string,
  markers: readonly string[],
): Promise<string | null> {
  let current = resolve(startDir)

  for (;;) {
    for (const marker of markers) {
      if (await isDirectory(join(current, marker))) {
        return current
      }
    }
    const parent = dirname(current)
    if (parent === current) return null
    current = parent
  }
}
