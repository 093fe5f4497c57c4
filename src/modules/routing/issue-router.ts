/**
 * Maps an issue's declared type to a worker pool.
 *
 * Resolution order:
 *  1. explicit `routing.rules`, in declared order (first match wins)
 *  2. pools' own `route_types`, in declared pool order
 *  3. `routing.default_pool`
 *  4. the first configured pool
 *
 * A rule or default that names an unknown pool resolves to `null`; it does
 * not fall through to the next step.
 */

import type { ForemanConfig, WorkerPool } from '../config/config-schema.js'
import type { Issue } from '../issue-store/issue-schema.js'
import { issueTypeOf } from '../issue-store/issue-client.js'

/** Which resolution step produced the routing result */
export type RoutingStep = 'rule' | 'route_types' | 'default' | 'first_pool' | 'none'

/**
 * The outcome of routing one issue, with the reasoning behind it.
 *
 * @example
 * {
 *   issueType: 'testing',
 *   pool: { name: 'qa', worker_bundle: 'workers/qa' },
 *   step: 'rule',
 *   rationale: 'Rule 2 maps type "testing" to pool "qa"',
 * }
 */
export interface RoutingExplanation {
  issueType: string
  pool: WorkerPool | null
  step: RoutingStep
  rationale: string
}

export class IssueRouter {
  private readonly _pools: readonly WorkerPool[]
  private readonly _routing: ForemanConfig['routing']

  constructor(config: Pick<ForemanConfig, 'worker_pools' | 'routing'>) {
    this._pools = config.worker_pools
    this._routing = config.routing
  }

  route(issue: Issue): WorkerPool | null {
    return this.explainType(issueTypeOf(issue)).pool
  }

  explain(issue: Issue): RoutingExplanation {
    return this.explainType(issueTypeOf(issue))
  }

  /** Route a bare issue type; used by the CLI's dry-run command */
  explainType(issueType: string): RoutingExplanation {
    const rules = this._routing.rules
    for (let i = 0; i < rules.length; i++) {
      const rule = rules[i]
      if (rule === undefined || !rule.if_metadata_type.includes(issueType)) continue
      const pool = this.getPool(rule.then_pool)
      return {
        issueType,
        pool,
        step: 'rule',
        rationale:
          pool !== null
            ? `Rule ${i + 1} maps type "${issueType}" to pool "${pool.name}"`
            : `Rule ${i + 1} maps type "${issueType}" to unknown pool "${rule.then_pool}"`,
      }
    }

    const accepting = this._pools.find((p) => p.route_types?.includes(issueType) === true)
    if (accepting !== undefined) {
      return {
        issueType,
        pool: accepting,
        step: 'route_types',
        rationale: `Pool "${accepting.name}" lists "${issueType}" in route_types`,
      }
    }

    const defaultPool = this._routing.default_pool
    if (defaultPool !== undefined) {
      const pool = this.getPool(defaultPool)
      return {
        issueType,
        pool,
        step: 'default',
        rationale:
          pool !== null
            ? `No rule matched; using default pool "${pool.name}"`
            : `No rule matched; default pool "${defaultPool}" is not configured`,
      }
    }

    const first = this._pools[0]
    if (first !== undefined) {
      return {
        issueType,
        pool: first,
        step: 'first_pool',
        rationale: `No rule or default matched; using first pool "${first.name}"`,
      }
    }

    return { issueType, pool: null, step: 'none', rationale: 'No worker pools are configured' }
  }

  getPool(name: string): WorkerPool | null {
    return this._pools.find((p) => p.name === name) ?? null
  }
}
