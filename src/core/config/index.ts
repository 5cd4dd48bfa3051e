/**
 * Engine configuration module
 *
 * @description Configuration schema, defaults and environment-based loading.
 */

export type { EngineConfig, ProvisionerConfig } from './interface'
export { EngineConfigSchema, ProvisionerConfigSchema } from './interface'
export { ConfigLoader, DEFAULT_CORE_CONFIG, CONFIG_ENV_VARS } from './default'
