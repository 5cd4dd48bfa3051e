/**
 * Error handling utilities shared by providers, the executor and the provisioner runner
 */

import lodash from 'lodash'

const TRANSIENT_CONNECTION_CODES = new Set([
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EHOSTUNREACH',
    'ECONNRESET',
    'ENETUNREACH',
    'EAI_AGAIN',
])

export class ErrorUtils {
    /**
     * Extracts a string message from any error type
     */
    static extractErrorMessage(error: unknown): string {
        if (error instanceof Error) {
            return error.message
        }
        if (typeof error === 'string') {
            return error
        }
        return String(error)
    }

    /**
     * Returns the value as an Error, wrapping non-Error throwables
     */
    static toError(error: unknown): Error {
        return error instanceof Error ? error : new Error(ErrorUtils.extractErrorMessage(error))
    }

    /**
     * Reads the Node-style `code` property of an error, if any
     */
    static errorCode(error: unknown): string | undefined {
        if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
            return error.code
        }
        return undefined
    }

    /**
     * Whether a connection error is worth retrying (target still booting, network hiccup)
     */
    static isTransientConnectionError(error: unknown): boolean {
        const code = ErrorUtils.errorCode(error)
        if (code && TRANSIENT_CONNECTION_CODES.has(code)) {
            return true
        }

        const msg = ErrorUtils.extractErrorMessage(error)
        return /connection refused|timed out|no route to host|connection reset/i.test(msg)
    }
}

/**
 * Redact sensitive fields from objects for logging (passwords, tokens, secrets, keys),
 * plus any field named in `sensitiveKeys` whatever its value.
 */
export function redactSecrets<T extends object>(obj: T, sensitiveKeys: string[] = []): T {
    return lodash.cloneDeepWith(obj, (value: unknown, key) => {
        if (typeof key !== 'string') {
            return undefined
        }
        if (sensitiveKeys.includes(key) || (typeof value === 'string' && /password|token|secret|key/i.test(key))) {
            return '<redacted>'
        }
        return undefined
    })
}
