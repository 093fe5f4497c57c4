/**
 * Zod validation schemas for the foreman configuration document.
 *
 * Defines schemas for all config sections:
 *  - worker pools
 *  - routing rules and default pool
 *  - agent loop and progress reporting limits
 *  - full config document
 */

import { z } from 'zod'
import {
  DEFAULT_BUNDLE_MARKERS,
  DEFAULT_HISTORY_TURNS,
  DEFAULT_ISSUE_TOOL,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_PROGRESS_PREVIEW_LIMIT,
} from './defaults.js'

// ---------------------------------------------------------------------------
// Worker pools
// ---------------------------------------------------------------------------

/** A named binding of issue categories to a worker bundle */
export const WorkerPoolSchema = z.object({
  name: z.string().min(1),
  /** URI or path of the bundle the pool's workers are built from */
  worker_bundle: z.string().min(1).optional(),
  /** Issue types this pool accepts when no explicit rule matches first */
  route_types: z.array(z.string().min(1)).optional(),
})

export type WorkerPool = z.infer<typeof WorkerPoolSchema>

// ---------------------------------------------------------------------------
// Routing
// ---------------------------------------------------------------------------

export const RoutingRuleSchema = z
  .object({
    if_metadata_type: z.array(z.string()).default([]),
    then_pool: z.string().min(1),
  })
  .strict()

export type RoutingRule = z.infer<typeof RoutingRuleSchema>

export const RoutingConfigSchema = z
  .object({
    rules: z.array(RoutingRuleSchema).default([]),
    default_pool: z.string().min(1).optional(),
  })
  .strict()

export type RoutingConfig = z.infer<typeof RoutingConfigSchema>

// ---------------------------------------------------------------------------
// Top-level configuration document
// ---------------------------------------------------------------------------

export const ForemanConfigSchema = z
  .object({
    worker_pools: z.array(WorkerPoolSchema).default([]),
    routing: RoutingConfigSchema.default({}),
    /** Model calls allowed per conversational turn */
    max_iterations: z.number().int().min(1).default(DEFAULT_MAX_ITERATIONS),
    /** History messages replayed to the model on each turn */
    history_turns: z.number().int().min(0).default(DEFAULT_HISTORY_TURNS),
    progress_preview_limit: z.number().int().min(1).default(DEFAULT_PROGRESS_PREVIEW_LIMIT),
    /** Name of the tool whose create operations trigger worker spawns */
    issue_tool: z.string().min(1).default(DEFAULT_ISSUE_TOOL),
    /** Directory names marking a repository root for bundle path resolution */
    bundle_markers: z
      .array(z.string().min(1))
      .min(1)
      .default([...DEFAULT_BUNDLE_MARKERS]),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>()
    config.worker_pools.forEach((pool, index) => {
      if (seen.has(pool.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['worker_pools', index, 'name'],
          message: `Duplicate worker pool name "${pool.name}"`,
        })
      }
      seen.add(pool.name)
    })
  })

/** Validated configuration with defaults applied */
export type ForemanConfig = z.output<typeof ForemanConfigSchema>

/** Configuration as written by callers, before defaults */
export type ForemanConfigInput = z.input<typeof ForemanConfigSchema>
