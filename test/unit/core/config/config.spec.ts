import * as assert from 'assert'
import { ConfigLoader, DEFAULT_CORE_CONFIG } from '../../../../src/core/config'
import { ConfigurationError } from '../../../../src/core/errors/errors'

describe('Engine configuration', () => {

    it('should use defaults without environment or overrides', () => {
        const config = new ConfigLoader({}).load()
        assert.deepEqual(config, DEFAULT_CORE_CONFIG)
        assert.deepEqual(config, {
            stateFile: 'graphform.state.json',
            parallelism: 10,
            refresh: true,
            moduleDepthLimit: 16,
            provisioner: {
                maxAttempts: 5,
                baseDelayMs: 2000,
                maxDelayMs: 30000,
                connectTimeoutMs: 10000,
            },
        })
    })

    it('should read environment variables', () => {
        const config = new ConfigLoader({
            GRAPHFORM_STATE_FILE: 'env.state.json',
            GRAPHFORM_PARALLELISM: '4',
            GRAPHFORM_REFRESH: 'false',
            GRAPHFORM_PROVISIONER_MAX_ATTEMPTS: '2',
        }).load()

        assert.equal(config.stateFile, 'env.state.json')
        assert.equal(config.parallelism, 4)
        assert.equal(config.refresh, false)
        assert.equal(config.provisioner.maxAttempts, 2)
        assert.equal(config.provisioner.baseDelayMs, 2000)
    })

    it('should let overrides win over environment and ignore undefined overrides', () => {
        const config = new ConfigLoader({ GRAPHFORM_PARALLELISM: '4', GRAPHFORM_STATE_FILE: 'env.state.json' })
            .load({ parallelism: 2, stateFile: undefined, provisioner: { baseDelayMs: 0 } })

        assert.equal(config.parallelism, 2)
        assert.equal(config.stateFile, 'env.state.json')
        assert.equal(config.provisioner.baseDelayMs, 0)
        assert.equal(config.provisioner.maxAttempts, 5)
    })

    it('should reject malformed environment values', () => {
        assert.throws(() => new ConfigLoader({ GRAPHFORM_PARALLELISM: 'many' }).load(), (err: unknown) => {
            assert.ok(err instanceof ConfigurationError)
            assert.equal(err.message, 'Invalid engine configuration: GRAPHFORM_PARALLELISM must be a number, got "many"')
            return true
        })
        assert.throws(() => new ConfigLoader({ GRAPHFORM_REFRESH: 'maybe' }).load(), /GRAPHFORM_REFRESH must be true or false, got "maybe"/)
    })

    it('should reject out of range values', () => {
        assert.throws(() => new ConfigLoader({}).load({ parallelism: 0 }), /Invalid engine configuration: parallelism: /)
    })
})
