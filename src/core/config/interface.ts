import { z } from "zod"
import {
    DEFAULT_MODULE_DEPTH_LIMIT,
    DEFAULT_PARALLELISM,
    DEFAULT_STATE_FILE,
    PROVISIONER_DEFAULTS
} from "../const"

export const ProvisionerConfigSchema = z.object({
    maxAttempts: z.number().int().min(1).default(PROVISIONER_DEFAULTS.MAX_ATTEMPTS)
        .describe("Connection attempts before a provisioner gives up"),
    baseDelayMs: z.number().int().min(0).default(PROVISIONER_DEFAULTS.BASE_DELAY_MS)
        .describe("Delay before the second attempt, doubled on each further attempt"),
    maxDelayMs: z.number().int().min(0).default(PROVISIONER_DEFAULTS.MAX_DELAY_MS),
    connectTimeoutMs: z.number().int().min(1).default(PROVISIONER_DEFAULTS.CONNECT_TIMEOUT_MS),
})

export const EngineConfigSchema = z.object({
    stateFile: z.string().min(1).default(DEFAULT_STATE_FILE).describe("Path of the persisted state file"),
    parallelism: z.number().int().min(1).default(DEFAULT_PARALLELISM).describe("Maximum node operations running at once"),
    refresh: z.boolean().default(true).describe("Re-read every recorded node from its provider before planning"),
    moduleDepthLimit: z.number().int().min(1).default(DEFAULT_MODULE_DEPTH_LIMIT),
    provisioner: ProvisionerConfigSchema.default({}),
})

export type EngineConfig = z.infer<typeof EngineConfigSchema>
export type ProvisionerConfig = z.infer<typeof ProvisionerConfigSchema>
