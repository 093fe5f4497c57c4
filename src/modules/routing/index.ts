/**
 * Barrel exports for the routing module.
 */

export { IssueRouter } from './issue-router.js'
export type { RoutingExplanation, RoutingStep } from './issue-router.js'
