import * as assert from 'assert'
import { buildSshCommand } from '../../../../src/core/provisioner/ssh'

const TARGET = { host: '10.0.0.4', port: 2222, timeoutMs: 2500 }

const COMMON_ARGS = [
    '-o', 'StrictHostKeyChecking=no',
    '-o', 'UserKnownHostsFile=/dev/null',
    '-o', 'LogLevel=ERROR',
    '-o', 'ConnectTimeout=3',
    '-p', '2222',
]

describe('SSH command builder', () => {

    it('should use the key file in batch mode', () => {
        const cmd = buildSshCommand({ target: TARGET, credentials: { user: 'admin', privateKey: 'test-key' }, keyFile: '/tmp/k/id' }, 'sh -s')
        assert.deepEqual(cmd, {
            command: 'ssh',
            args: [...COMMON_ARGS, '-i', '/tmp/k/id', '-o', 'BatchMode=yes', 'admin@10.0.0.4', 'sh -s'],
            env: {},
        })
    })

    it('should pass passwords through sshpass environment', () => {
        const cmd = buildSshCommand({ target: TARGET, credentials: { user: 'admin', password: 'test-secret' } }, 'true')
        assert.deepEqual(cmd, {
            command: 'sshpass',
            args: ['-e', 'ssh', ...COMMON_ARGS, 'admin@10.0.0.4', 'true'],
            env: { SSHPASS: 'test-secret' },
        })
    })

    it('should refuse an unauthenticated session', () => {
        assert.throws(() => buildSshCommand({ target: TARGET }, 'true'), /Session to 10.0.0.4 is not authenticated/)
    })
})
