/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  WorkcellConfigSchema,
  PartialWorkcellConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  WorkcellConfig,
  PartialWorkcellConfig,
  ProviderConfig,
  RefinementConfig,
  StaticAnalysisConfig,
  TestRunnerConfig,
  StateBackend,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
