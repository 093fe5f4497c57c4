/**
 * Public API for the recovery module.
 */

export { OrphanScanner, type OrphanScannerOptions } from './orphan-scanner.js'

export {
  setupGracefulShutdown,
  type ShutdownHandlerOptions,
} from './shutdown-handler.js'
