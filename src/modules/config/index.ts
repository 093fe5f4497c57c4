/**
 * Barrel exports for the config module.
 */

export {
  ForemanConfigSchema,
  WorkerPoolSchema,
  RoutingRuleSchema,
  RoutingConfigSchema,
} from './config-schema.js'
export type {
  ForemanConfig,
  ForemanConfigInput,
  WorkerPool,
  RoutingRule,
  RoutingConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG, CONFIG_PATH_ENV, DEFAULT_CONFIG_FILE } from './defaults.js'
export {
  parseForemanConfig,
  loadForemanConfig,
  findConfigWarnings,
  resolveConfigPath,
} from './config-loader.js'
