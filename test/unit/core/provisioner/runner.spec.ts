import * as assert from 'assert'
import { ProvisionerFailure } from '../../../../src/core/errors/errors'
import { ProvisionerState, RemoteProvisionerRunner, resolveConnection } from '../../../../src/core/provisioner/runner'
import { FakeRemoteExecutor, recordingSleep } from '../../../helpers/fakes'

const REQUEST = {
    address: 'null_resource.setup',
    target: { host: '10.0.0.4', port: 22, timeoutMs: 5000 },
    credentials: { user: 'admin', password: 'test-secret' },
    script: 'echo ready',
}

function newRunner(executor: FakeRemoteExecutor, maxAttempts = 3) {
    const { sleep, delays } = recordingSleep()
    const transitions: ProvisionerState[] = []
    const runner = new RemoteProvisionerRunner({
        executor,
        maxAttempts,
        baseDelayMs: 100,
        maxDelayMs: 250,
        sleep,
        onTransition: (_address, state) => transitions.push(state),
    })
    return { runner, delays, transitions }
}

describe('Remote provisioner runner', () => {

    it('should connect, authenticate and run the script', async () => {
        const executor = new FakeRemoteExecutor({ output: 'ready\n' })
        const { runner, transitions, delays } = newRunner(executor)

        const report = await runner.run(REQUEST)

        assert.deepEqual(report, { attempts: 1, output: 'ready\n' })
        assert.deepEqual(transitions, ['connecting', 'authenticating', 'executing', 'completed'])
        assert.deepEqual(executor.credentials, [{ user: 'admin', password: 'test-secret' }])
        assert.deepEqual(executor.scripts, [{ host: '10.0.0.4', script: 'echo ready' }])
        assert.equal(executor.closed, 1)
        assert.deepEqual(delays, [])
    })

    it('should retry refused connections with exponential backoff', async () => {
        const executor = new FakeRemoteExecutor({ refusedConnections: 2 })
        const { runner, delays } = newRunner(executor)

        const report = await runner.run(REQUEST)

        assert.equal(report.attempts, 3)
        assert.deepEqual(delays, [100, 200])
        assert.equal(executor.connects.length, 3)
    })

    it('should fail after the last connection attempt', async () => {
        const executor = new FakeRemoteExecutor({ refusedConnections: Infinity })
        const { runner, delays, transitions } = newRunner(executor)

        await assert.rejects(runner.run(REQUEST), (err: unknown) => {
            assert.ok(err instanceof ProvisionerFailure)
            assert.equal(err.phase, 'connecting')
            assert.equal(err.attempts, 3)
            assert.equal(err.message, 'Provisioner for null_resource.setup failed while connecting after 3 attempt(s): connect ECONNREFUSED 10.0.0.4:22')
            return true
        })
        assert.deepEqual(delays, [100, 200])
        assert.deepEqual(transitions, ['connecting', 'connecting', 'connecting', 'failed'])
        assert.equal(executor.closed, 0)
    })

    it('should cap backoff delay', () => {
        const { runner } = newRunner(new FakeRemoteExecutor())
        assert.deepEqual([1, 2, 3, 4].map(a => runner.backoffDelay(a)), [100, 200, 250, 250])
    })

    it('should not retry rejected credentials', async () => {
        const executor = new FakeRemoteExecutor({ rejectCredentials: true })
        const { runner, transitions } = newRunner(executor)

        await assert.rejects(runner.run(REQUEST), (err: unknown) => {
            assert.ok(err instanceof ProvisionerFailure)
            assert.equal(err.phase, 'authenticating')
            assert.equal(err.attempts, 1)
            assert.match(err.message, /authentication rejected: Permission denied for admin@10.0.0.4$/)
            return true
        })
        assert.deepEqual(transitions, ['connecting', 'authenticating', 'failed'])
        assert.equal(executor.connects.length, 1)
        assert.equal(executor.closed, 1)
    })

    it('should fail on non-zero exit status and keep the output', async () => {
        const executor = new FakeRemoteExecutor({ exitCode: 2, output: 'apt: not found\n' })
        const { runner } = newRunner(executor)

        await assert.rejects(runner.run(REQUEST), (err: unknown) => {
            assert.ok(err instanceof ProvisionerFailure)
            assert.equal(err.phase, 'executing')
            assert.equal(err.output, 'apt: not found\n')
            assert.match(err.message, /remote script exited with status 2$/)
            return true
        })
        assert.equal(executor.closed, 1)
    })
})

describe('Provisioner connection resolution', () => {

    it('should apply default port and timeout', () => {
        assert.deepEqual(resolveConnection({ host: '10.0.0.4', user: 'admin', private_key: 'test-key' }, 10000), {
            target: { host: '10.0.0.4', port: 22, timeoutMs: 10000 },
            credentials: { user: 'admin', password: undefined, privateKey: 'test-key' },
        })
    })

    it('should convert timeout seconds and numeric strings', () => {
        const { target } = resolveConnection({ host: 'h', user: 'u', port: '2222', timeout: 3 }, 10000)
        assert.deepEqual(target, { host: 'h', port: 2222, timeoutMs: 3000 })
    })

    it('should reject a connection without host', () => {
        assert.throws(() => resolveConnection({ user: 'u' }, 10000), /Invalid provisioner connection: host: Required/)
    })
})
