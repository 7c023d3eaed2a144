/**
 * Barrel exports for the config module.
 */

export {
  createConfigSystem,
  ConfigSystemImpl,
  deepMerge,
  getByPath,
  setByPath,
  readEnvOverrides,
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
} from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  WaypointConfigSchema,
  PartialWaypointConfigSchema,
  CheckDefinitionSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  WaypointConfig,
  PartialWaypointConfig,
  CheckDefinitionConfig,
  GlobalSettings,
  PipelineSettings,
  ReleaseSettings,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
