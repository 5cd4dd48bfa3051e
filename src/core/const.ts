export const GRAPHFORM_VERSION = "0.1.0"

/** File holding a module body inside its directory */
export const MODULE_FILE_NAME = "main.json"

export const DEFAULT_STATE_FILE = "graphform.state.json"

export const STATE_FILE_FORMAT_VERSION = 1

export const DEFAULT_PARALLELISM = 10

export const DEFAULT_MODULE_DEPTH_LIMIT = 16

export const PROVISIONER_DEFAULTS = {
    /** Connection attempts before giving up, the target may still be booting */
    MAX_ATTEMPTS: 5,
    BASE_DELAY_MS: 2_000,
    MAX_DELAY_MS: 30_000,
    CONNECT_TIMEOUT_MS: 10_000,
    SSH_PORT: 22,
} as const
