import { z } from "zod"
import { getLogger } from "../../log/utils"
import { ErrorUtils } from "../../tools/error-utils"
import { PROVISIONER_DEFAULTS } from "../const"
import { ProvisionerFailure, ProvisionerPhase } from "../errors/errors"
import { AttributeMap } from "../graph/expression"
import { RemoteAuthenticationError, RemoteCredentials, RemoteExecutor, RemoteRunResult, RemoteTarget } from "./remote"

export type ProvisionerState = 'connecting' | 'authenticating' | 'executing' | 'completed' | 'failed'

export interface ProvisionerRunRequest {
    /** Node the provisioner belongs to */
    address: string
    target: RemoteTarget
    credentials: RemoteCredentials
    script: string
}

export interface ProvisionerRunReport {
    /** Connection attempts used */
    attempts: number
    output: string
}

export interface RemoteProvisionerRunnerArgs {
    executor: RemoteExecutor
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
    sleep?: (ms: number) => Promise<void>
    onTransition?: (address: string, state: ProvisionerState) => void
}

const ResolvedConnectionSchema = z.object({
    type: z.literal('ssh').default('ssh'),
    host: z.string().min(1),
    port: z.coerce.number().int().min(1).max(65535).default(PROVISIONER_DEFAULTS.SSH_PORT),
    user: z.string().min(1),
    password: z.string().optional(),
    private_key: z.string().optional(),
    timeout: z.coerce.number().positive().optional(),
})

/**
 * Turn evaluated connection attributes into a target and credentials.
 */
export function resolveConnection(values: AttributeMap, defaultTimeoutMs: number): { target: RemoteTarget, credentials: RemoteCredentials } {
    const result = ResolvedConnectionSchema.safeParse(values)
    if (!result.success) {
        throw new Error(`Invalid provisioner connection: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
    }
    const conn = result.data
    return {
        target: {
            host: conn.host,
            port: conn.port,
            timeoutMs: conn.timeout !== undefined ? conn.timeout * 1000 : defaultTimeoutMs,
        },
        credentials: {
            user: conn.user,
            password: conn.password,
            privateKey: conn.private_key,
        },
    }
}

/**
 * Runs a post-creation script on a remote target.
 *
 * Connecting -> Authenticating -> Executing -> Completed | Failed. Connection refusals and timeouts
 * are retried with exponential backoff up to `maxAttempts`, the target may still be booting.
 * Authentication failures and non-zero exit statuses are not retried.
 */
export class RemoteProvisionerRunner {

    private readonly logger = getLogger(RemoteProvisionerRunner.name)
    private readonly args: RemoteProvisionerRunnerArgs
    private readonly sleep: (ms: number) => Promise<void>

    constructor(args: RemoteProvisionerRunnerArgs) {
        this.args = args
        this.sleep = args.sleep ?? (ms => new Promise(r => setTimeout(r, ms)))
    }

    /**
     * Delay to wait after failed attempt number `attempt` (1-based)
     */
    backoffDelay(attempt: number): number {
        return Math.min(this.args.baseDelayMs * 2 ** (attempt - 1), this.args.maxDelayMs)
    }

    async run(request: ProvisionerRunRequest): Promise<ProvisionerRunReport> {
        const { executor, maxAttempts } = this.args
        const address = request.address
        const transition = (state: ProvisionerState) => {
            this.logger.debug(`Provisioner ${address}: ${state}`)
            this.args.onTransition?.(address, state)
        }
        const fail = (phase: ProvisionerPhase, attempts: number, output: string, details: string, cause?: unknown): ProvisionerFailure => {
            transition('failed')
            return new ProvisionerFailure(address, phase, attempts, output, details, cause === undefined ? undefined : ErrorUtils.toError(cause))
        }

        let session: unknown = undefined
        let connected = false
        let attempts = 0

        while (!connected) {
            attempts++
            transition('connecting')
            try {
                session = await executor.connect(request.target)
                connected = true
            } catch (e) {
                const transient = ErrorUtils.isTransientConnectionError(e)
                if (!transient || attempts >= maxAttempts) {
                    throw fail('connecting', attempts, '', ErrorUtils.extractErrorMessage(e), e)
                }
                const delay = this.backoffDelay(attempts)
                this.logger.warn(`Cannot connect to ${request.target.host}:${request.target.port} for ${address} (attempt ${attempts}/${maxAttempts}), retrying in ${delay}ms`, {
                    error: ErrorUtils.extractErrorMessage(e)
                })
                await this.sleep(delay)
            }
        }

        try {
            transition('authenticating')
            try {
                await executor.authenticate(session, request.credentials)
            } catch (e) {
                const details = e instanceof RemoteAuthenticationError
                    ? `authentication rejected: ${e.message}`
                    : ErrorUtils.extractErrorMessage(e)
                throw fail('authenticating', attempts, '', details, e)
            }

            transition('executing')
            let result: RemoteRunResult
            try {
                result = await executor.run(session, request.script)
            } catch (e) {
                throw fail('executing', attempts, '', ErrorUtils.extractErrorMessage(e), e)
            }

            if (result.exitCode !== 0) {
                throw fail('executing', attempts, result.output, `remote script exited with status ${result.exitCode}`)
            }

            transition('completed')
            return { attempts, output: result.output }

        } finally {
            await this.closeSession(session, address)
        }
    }

    private async closeSession(session: unknown, address: string): Promise<void> {
        try {
            await this.args.executor.close(session)
        } catch (e) {
            this.logger.warn(`Failed to close remote session for ${address}`, { error: ErrorUtils.extractErrorMessage(e) })
        }
    }
}
