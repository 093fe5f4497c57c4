/**
 * Barrel exports for the worker-tracker module.
 */

export { createWorkerTaskTracker } from './worker-task-tracker.js'
export type {
  WorkerTaskTracker,
  WorkerTaskTrackerOptions,
  WorkerSpawnContext,
  WorkerInfo,
} from './worker-task-tracker.js'
export { WorkerTaskTrackerImpl } from './worker-task-tracker-impl.js'
export { WorkerTask } from './worker-task.js'
export type { WorkerRun, WorkerTaskMeta, WorkerTaskSettlement } from './worker-task.js'
export { SpawnErrorLog } from './spawn-error-log.js'
export { buildWorkerInstruction } from './worker-instruction.js'
export { runWorkerSession } from './worker-runner.js'
export type { WorkerLaunch } from './worker-runner.js'
