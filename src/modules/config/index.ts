/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, coerceValue, readEnvOverrides } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  LatticeConfigSchema,
  PartialLatticeConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
} from './config-schema.js'
export type { LatticeConfig, PartialLatticeConfig } from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
