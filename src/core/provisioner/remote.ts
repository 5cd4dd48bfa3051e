/**
 * Remote execution collaborator used by provisioners.
 */

export interface RemoteTarget {
    host: string
    port: number
    timeoutMs: number
}

/**
 * Credential material is opaque to the engine: it is resolved from declarations and handed over as is.
 */
export interface RemoteCredentials {
    user: string
    password?: string
    privateKey?: string
}

export interface RemoteRunResult {
    exitCode: number
    /** Combined stdout and stderr */
    output: string
}

export interface RemoteExecutor<S = unknown> {

    /**
     * Open a channel to the target. Transient failures (refused, timed out, unreachable) should be
     * thrown with their Node error code (ECONNREFUSED, ETIMEDOUT...) so callers may retry.
     */
    connect(target: RemoteTarget): Promise<S>

    /**
     * Throws RemoteAuthenticationError when credentials are rejected.
     */
    authenticate(session: S, credentials: RemoteCredentials): Promise<void>

    run(session: S, script: string): Promise<RemoteRunResult>

    close(session: S): Promise<void>
}

export class RemoteAuthenticationError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'RemoteAuthenticationError'
    }
}
