import { spawn } from 'child_process'
import * as fs from 'fs/promises'
import * as net from 'net'
import * as os from 'os'
import * as path from 'path'
import { getLogger } from "../../log/utils"
import { RemoteAuthenticationError, RemoteCredentials, RemoteExecutor, RemoteRunResult, RemoteTarget } from "./remote"

export interface SshSession {
    target: RemoteTarget
    credentials?: RemoteCredentials
    /** Temporary file holding the private key, removed on close */
    keyFile?: string
}

export interface SshCommand {
    command: string
    args: string[]
    env: Record<string, string>
}

/** ssh exits with 255 when the connection itself (including authentication) failed */
const SSH_CONNECTION_FAILURE_EXIT_CODE = 255

/**
 * Build the command line running `remoteCommand` through the system ssh client.
 * Password authentication goes through sshpass, reading the password from its environment.
 */
export function buildSshCommand(session: SshSession, remoteCommand: string): SshCommand {
    const { target, credentials, keyFile } = session
    if (!credentials) {
        throw new Error(`Session to ${target.host} is not authenticated`)
    }

    const sshArgs = [
        '-o', 'StrictHostKeyChecking=no',
        '-o', 'UserKnownHostsFile=/dev/null',
        '-o', 'LogLevel=ERROR',
        '-o', `ConnectTimeout=${Math.max(1, Math.ceil(target.timeoutMs / 1000))}`,
        '-p', String(target.port),
    ]

    if (keyFile) {
        sshArgs.push('-i', keyFile, '-o', 'BatchMode=yes')
    }

    sshArgs.push(`${credentials.user}@${target.host}`, remoteCommand)

    if (credentials.password !== undefined && !keyFile) {
        return {
            command: 'sshpass',
            args: ['-e', 'ssh', ...sshArgs],
            env: { SSHPASS: credentials.password },
        }
    }

    return { command: 'ssh', args: sshArgs, env: {} }
}

/**
 * Remote executor backed by the system OpenSSH client.
 */
export class SshRemoteExecutor implements RemoteExecutor<SshSession> {

    private readonly logger = getLogger(SshRemoteExecutor.name)

    /**
     * Probe TCP reachability of the SSH port.
     */
    connect(target: RemoteTarget): Promise<SshSession> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host: target.host, port: target.port })
            socket.setTimeout(target.timeoutMs)

            socket.once('connect', () => {
                socket.destroy()
                resolve({ target })
            })
            socket.once('timeout', () => {
                socket.destroy()
                const err: NodeJS.ErrnoException = new Error(`Connection to ${target.host}:${target.port} timed out after ${target.timeoutMs}ms`)
                err.code = 'ETIMEDOUT'
                reject(err)
            })
            socket.once('error', (err) => {
                socket.destroy()
                reject(err)
            })
        })
    }

    async authenticate(session: SshSession, credentials: RemoteCredentials): Promise<void> {
        session.credentials = credentials

        if (credentials.privateKey !== undefined) {
            const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'graphform-ssh-'))
            session.keyFile = path.join(dir, 'id')
            await fs.writeFile(session.keyFile, credentials.privateKey.endsWith('\n') ? credentials.privateKey : credentials.privateKey + '\n', { mode: 0o600 })
        }

        const result = await this.exec(session, 'true')
        if (result.exitCode === SSH_CONNECTION_FAILURE_EXIT_CODE) {
            throw new RemoteAuthenticationError(`ssh to ${credentials.user}@${session.target.host} failed: ${result.output.trim()}`)
        }
        if (result.exitCode !== 0) {
            throw new Error(`Unexpected exit status ${result.exitCode} while checking ssh access: ${result.output.trim()}`)
        }
    }

    run(session: SshSession, script: string): Promise<RemoteRunResult> {
        this.logger.debug(`Running script on ${session.target.host} (${script.length} bytes)`)
        return this.exec(session, 'sh -s', script)
    }

    async close(session: SshSession): Promise<void> {
        if (session.keyFile) {
            await fs.rm(path.dirname(session.keyFile), { recursive: true, force: true })
            session.keyFile = undefined
        }
    }

    private exec(session: SshSession, remoteCommand: string, stdin?: string): Promise<RemoteRunResult> {
        const cmd = buildSshCommand(session, remoteCommand)

        return new Promise((resolve, reject) => {
            const child = spawn(cmd.command, cmd.args, {
                env: { ...process.env, ...cmd.env },
                stdio: ['pipe', 'pipe', 'pipe'],
            })

            let output = ''
            child.stdout.on('data', (chunk: Buffer) => { output += chunk.toString() })
            child.stderr.on('data', (chunk: Buffer) => { output += chunk.toString() })

            child.once('error', reject)
            child.once('close', (code) => {
                resolve({ exitCode: code ?? SSH_CONNECTION_FAILURE_EXIT_CODE, output })
            })

            child.stdin.end(stdin ?? '')
        })
    }
}
