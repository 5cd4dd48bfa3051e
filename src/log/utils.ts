import { ILogObj, Logger } from "tslog"

export type { Logger, ILogObj }

export type LogLevelName = 'silly' | 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'

const LOG_LEVELS: Record<LogLevelName, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
}

export const LOG_LEVEL_ENV_VAR = "GRAPHFORM_LOG_LEVEL"

export function isLogLevelName(value: string): value is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value)
}

function levelFromEnv(): number {
    const raw = process.env[LOG_LEVEL_ENV_VAR]?.toLowerCase()
    if (raw && isLogLevelName(raw)) {
        return LOG_LEVELS[raw]
    }
    return LOG_LEVELS.warn
}

let currentMinLevel = levelFromEnv()

// Loggers are created per component instance; keep track of them so a level change reaches existing ones
const loggers = new Set<Logger<ILogObj>>()

/**
 * Change minimum log level for all existing and future loggers.
 */
export function setLogLevel(level: LogLevelName): void {
    currentMinLevel = LOG_LEVELS[level]
    for (const logger of loggers) {
        logger.settings.minLevel = currentMinLevel
    }
}

export function getLogger(name: string): Logger<ILogObj> {
    const logger = new Logger<ILogObj>({
        name: name,
        minLevel: currentMinLevel,
        prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}}\t[{{name}}] ",
    })
    loggers.add(logger)
    return logger
}
