import lodash from 'lodash'
import { PartialDeep } from 'type-fest'
import { ConfigurationError } from "../errors/errors"
import { EngineConfig, EngineConfigSchema } from "./interface"

export const DEFAULT_CORE_CONFIG: EngineConfig = EngineConfigSchema.parse({})

export const CONFIG_ENV_VARS = {
    STATE_FILE: 'GRAPHFORM_STATE_FILE',
    PARALLELISM: 'GRAPHFORM_PARALLELISM',
    REFRESH: 'GRAPHFORM_REFRESH',
    MODULE_DEPTH_LIMIT: 'GRAPHFORM_MODULE_DEPTH_LIMIT',
    PROVISIONER_MAX_ATTEMPTS: 'GRAPHFORM_PROVISIONER_MAX_ATTEMPTS',
} as const

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name]
    if (raw === undefined || raw === '') {
        return undefined
    }
    const value = Number(raw)
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`${name} must be a number, got "${raw}"`)
    }
    return value
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
    const raw = env[name]?.toLowerCase()
    if (raw === undefined || raw === '') {
        return undefined
    }
    if (raw === 'true' || raw === '1') {
        return true
    }
    if (raw === 'false' || raw === '0') {
        return false
    }
    throw new ConfigurationError(`${name} must be true or false, got "${raw}"`)
}

/**
 * Builds engine configuration from defaults, environment and explicit overrides (highest priority).
 */
export class ConfigLoader {

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    load(overrides: PartialDeep<EngineConfig> = {}): EngineConfig {
        const fromEnv: PartialDeep<EngineConfig> = {}

        const stateFile = this.env[CONFIG_ENV_VARS.STATE_FILE]
        if (stateFile) {
            fromEnv.stateFile = stateFile
        }
        const parallelism = envNumber(this.env, CONFIG_ENV_VARS.PARALLELISM)
        if (parallelism !== undefined) {
            fromEnv.parallelism = parallelism
        }
        const refresh = envBoolean(this.env, CONFIG_ENV_VARS.REFRESH)
        if (refresh !== undefined) {
            fromEnv.refresh = refresh
        }
        const moduleDepthLimit = envNumber(this.env, CONFIG_ENV_VARS.MODULE_DEPTH_LIMIT)
        if (moduleDepthLimit !== undefined) {
            fromEnv.moduleDepthLimit = moduleDepthLimit
        }
        const maxAttempts = envNumber(this.env, CONFIG_ENV_VARS.PROVISIONER_MAX_ATTEMPTS)
        if (maxAttempts !== undefined) {
            fromEnv.provisioner = { maxAttempts }
        }

        // merge skips undefined override values, keeping environment values
        const merged = lodash.merge({}, fromEnv, overrides)

        const result = EngineConfigSchema.safeParse(merged)
        if (!result.success) {
            throw new ConfigurationError(
                result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
                result.error
            )
        }
        return result.data
    }
}
