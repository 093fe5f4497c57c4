/**
 * Built-in default values for the foreman configuration.
 */

import type { ForemanConfig } from './config-schema.js'

export const DEFAULT_MAX_ITERATIONS = 20

export const DEFAULT_HISTORY_TURNS = 10

export const DEFAULT_PROGRESS_PREVIEW_LIMIT = 3

export const DEFAULT_ISSUE_TOOL = 'issue_manager'

/** Version-control marker first, then the application state directory */
export const DEFAULT_BUNDLE_MARKERS: readonly string[] = ['.git', '.foreman']

/** Configuration file the CLI reads when neither --config nor FOREMAN_CONFIG is given */
export const DEFAULT_CONFIG_FILE = 'foreman.yaml'

export const CONFIG_PATH_ENV = 'FOREMAN_CONFIG'

// ---------------------------------------------------------------------------
// Full default config document
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: ForemanConfig = {
  worker_pools: [],
  routing: { rules: [] },
  max_iterations: DEFAULT_MAX_ITERATIONS,
  history_turns: DEFAULT_HISTORY_TURNS,
  progress_preview_limit: DEFAULT_PROGRESS_PREVIEW_LIMIT,
  issue_tool: DEFAULT_ISSUE_TOOL,
  bundle_markers: [...DEFAULT_BUNDLE_MARKERS],
}
