import * as assert from 'assert'
import { NullProvider } from '../../../../src/providers/null'
import { builtinProviders } from '../../../../src/providers'
import { ProviderRegistry } from '../../../../src/core/provider'

describe('Null provider', () => {

    const provider = new NullProvider()

    it('should create resources with a random id and keep triggers', async () => {
        const first = await provider.create('null_resource', { triggers: { version: '1' } })
        const second = await provider.create('null_resource', {})

        assert.notEqual(first.id, second.id)
        assert.deepEqual(first.attributes, { triggers: { version: '1' }, id: first.id })
        assert.deepEqual(await provider.read('null_resource', first.id), { id: first.id })
    })

    it('should replace on trigger changes', () => {
        assert.equal(provider.requiresReplacement('null_resource', 'triggers'), true)
    })

    it('should reject unknown attributes', async () => {
        await assert.rejects(provider.create('null_resource', { command: 'ls' }), /Invalid null_resource attributes: : Unrecognized key\(s\) in object: 'command'/)
    })
})

describe('Builtin providers', () => {

    it('should resolve providers from resource kind prefix', () => {
        const registry = new ProviderRegistry(builtinProviders('/tmp'))
        assert.deepEqual(registry.names(), ['local', 'null'])
        assert.equal(registry.forKind('null_resource').name, 'null')
        assert.equal(registry.forKind('local_file').name, 'local')
        assert.equal(registry.has('aws_instance'), false)
        assert.equal(registry.requiresReplacement('local_file', 'filename'), true)
    })
})
