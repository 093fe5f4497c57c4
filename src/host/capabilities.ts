/**
 * Typed capability registry.
 *
 * The host exposes environment facts and services by name. Each name maps to
 * one value type here, and every lookup result is either present or
 * explicitly absent, so callers must handle absence before use.
 */

import type { BundleLoader, ParentSession, WorkerSessionRecord } from './types.js'

/** Capability names and the type of value each one carries */
export interface CapabilityMap {
  'bundle.load': BundleLoader
  'repo.root_path': string
  'session.working_dir': string
  'session.persist': (record: WorkerSessionRecord) => Promise<void>
}

export type CapabilityName = keyof CapabilityMap

export type Capability<T> =
  | { kind: 'present'; value: T }
  | { kind: 'absent'; name: CapabilityName }

/** The host coordinator handed to the foreman on every turn */
export interface HostCoordinator {
  readonly session: ParentSession | null
  getCapability<K extends CapabilityName>(name: K): CapabilityMap[K] | undefined
}

/** Capabilities looked up once per turn */
export interface ResolvedCapabilities {
  bundleLoad: Capability<BundleLoader>
  repoRoot: Capability<string>
  workingDir: Capability<string>
  persistSession: Capability<(record: WorkerSessionRecord) => Promise<void>>
}

function lookup<K extends CapabilityName>(
  coordinator: HostCoordinator | null,
  name: K,
): Capability<CapabilityMap[K]> {
  const value = coordinator?.getCapability(name)
  if (value === undefined || value === null || value === '') {
    return { kind: 'absent', name }
  }
  return { kind: 'present', value }
}

/**
 * Resolve every known capability from the coordinator. A missing coordinator
 * resolves everything as absent.
 */
export function resolveCapabilities(coordinator: HostCoordinator | null): ResolvedCapabilities {
  return {
    bundleLoad: lookup(coordinator, 'bundle.load'),
    repoRoot: lookup(coordinator, 'repo.root_path'),
    workingDir: lookup(coordinator, 'session.working_dir'),
    persistSession: lookup(coordinator, 'session.persist'),
  }
}

/** Return the capability's value, or the fallback when absent */
export function capabilityOr<T>(capability: Capability<T>, fallback: T): T {
  return capability.kind === 'present' ? capability.value : fallback
}
