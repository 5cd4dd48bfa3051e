import * as assert from 'assert'
import {
    CyclicDependencyError,
    MissingRequiredVariableError,
    ModuleRecursionLimitError,
    UnknownOutputError,
    UnknownVariableError
} from '../../../../src/core/errors/errors'
import { AttributeGraph } from '../../../../src/core/graph/graph'
import { DependencyResolver } from '../../../../src/core/graph/resolver'
import { ModuleExpander } from '../../../../src/core/module/expander'
import { RawModuleFile } from '../../../../src/core/declaration/schema'
import { InMemoryModuleLoader, rootModule } from '../../../helpers/fakes'

const NETWORK_MODULE: RawModuleFile = {
    variables: {
        cidr: {},
        name: { default: 'net' },
    },
    resources: [
        { kind: 'null_resource', name: 'vnet', attributes: { cidr: '${var.cidr}', label: '${var.name}-vnet' } },
        { kind: 'null_resource', name: 'subnet', attributes: { vnet: '${null_resource.vnet.id}' } },
    ],
    outputs: {
        subnet_id: { value: '${null_resource.subnet.id}' },
        cidr: { value: '${var.cidr}' },
    },
}

const PEER_MODULE: RawModuleFile = {
    variables: { peer: {} },
    resources: [
        { kind: 'null_resource', name: 'first' },
        { kind: 'null_resource', name: 'second', attributes: { peer: '${var.peer}' } },
    ],
    outputs: { first_id: { value: '${null_resource.first.id}' } },
}

describe('Module expander', () => {

    it('should namespace module nodes and rewrite internal references', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expander = new ModuleExpander({ loader, depthLimit: 4 })

        const expanded = await expander.expand(rootModule({
            modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' } }],
            resources: [{ kind: 'null_resource', name: 'vm', attributes: { subnet: '${module.network.subnet_id}', range: '${module.network.cidr}' } }],
        }), {})

        assert.deepEqual(expanded.nodes.map(n => `${n.modulePath.join('/')}:${n.kind}.${n.name}`), [
            ':null_resource.vm',
            'network:null_resource.vnet',
            'network:null_resource.subnet',
        ])

        const [vm, vnet, subnet] = expanded.nodes
        assert.deepEqual(vm.attributes.subnet, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'module.network.null_resource.subnet' }, path: ['id'] },
        })
        assert.deepEqual(vm.attributes.range, { type: 'literal', value: '10.0.0.0/16' })
        assert.deepEqual(vnet.attributes.cidr, { type: 'literal', value: '10.0.0.0/16' })
        assert.deepEqual(vnet.attributes.label, { type: 'template', parts: [{ type: 'literal', value: 'net' }, '-vnet'] })
        assert.deepEqual(subnet.attributes.vnet, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'module.network.null_resource.vnet' }, path: ['id'] },
        })
        assert.deepEqual(loader.loaded, ['./network'])
    })

    it('should give each module instance its own namespace', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            modules: [
                { name: 'blue', source: './network', inputs: { cidr: '10.1.0.0/16' } },
                { name: 'green', source: './network', inputs: { cidr: '10.2.0.0/16', name: 'green' } },
            ],
        }), {})

        assert.deepEqual(expanded.nodes.map(n => n.modulePath[0]), ['blue', 'blue', 'green', 'green'])
        assert.deepEqual(expanded.nodes[2].attributes.label, { type: 'template', parts: [{ type: 'literal', value: 'green' }, '-vnet'] })
    })

    it('should pass a parent node reference into a child module', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            resources: [{ kind: 'null_resource', name: 'ipam' }],
            modules: [{ name: 'network', source: './network', inputs: { cidr: '${null_resource.ipam.cidr}' } }],
        }), {})

        assert.deepEqual(expanded.nodes[1].attributes.cidr, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'null_resource.ipam' }, path: ['cidr'] },
        })
    })

    it('should expose root outputs with node references', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' } }],
            outputs: { subnet: { value: '${module.network.subnet_id}', sensitive: true } },
        }), {})

        assert.deepEqual(expanded.outputs, {
            subnet: {
                name: 'subnet',
                sensitive: true,
                value: { type: 'reference', ref: { root: { type: 'node', address: 'module.network.null_resource.subnet' }, path: ['id'] } },
            },
        })
    })

    it('should bind root variables from the caller', async () => {
        const expanded = await new ModuleExpander({ loader: new InMemoryModuleLoader(), depthLimit: 4 }).expand(rootModule({
            variables: { env: {} },
            resources: [{ kind: 'null_resource', name: 'a', attributes: { env: '${var.env}' } }],
        }), { env: 'prod' })

        assert.deepEqual(expanded.nodes[0].attributes.env, { type: 'literal', value: 'prod' })
    })

    it('should fail when a required variable is missing', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        await assert.rejects(
            new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({ modules: [{ name: 'network', source: './network' }] }), {}),
            (err: unknown) => {
                assert.ok(err instanceof MissingRequiredVariableError)
                assert.equal(err.message, 'Variable "cidr" of module.network has no default and is not set')
                return true
            }
        )
    })

    it('should fail on inputs the module does not declare', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        await assert.rejects(
            new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
                modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16', region: 'west' } }],
            }), {}),
            UnknownVariableError
        )
    })

    it('should fail on outputs the module does not declare', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        await assert.rejects(
            new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
                modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' } }],
                outputs: { gw: { value: '${module.network.gateway}' } },
            }), {}),
            (err: unknown) => {
                assert.ok(err instanceof UnknownOutputError)
                assert.equal(err.message, 'Module module.network does not declare output "gateway"')
                return true
            }
        )
    })

    it('should stop a module calling itself at the depth limit', async () => {
        const loader = new InMemoryModuleLoader({
            './loop': { modules: [{ name: 'again', source: './loop' }] },
        })
        await assert.rejects(
            new ModuleExpander({ loader, depthLimit: 3 }).expand(rootModule({ modules: [{ name: 'again', source: './loop' }] }), {}),
            (err: unknown) => {
                assert.ok(err instanceof ModuleRecursionLimitError)
                assert.equal(err.module, 'module.again.module.again.module.again.module.again')
                return true
            }
        )
    })

    it('should expand a sibling module after the module whose outputs it uses', async () => {
        const loader = new InMemoryModuleLoader({
            './network': NETWORK_MODULE,
            './app': {
                variables: { subnet: {} },
                resources: [{ kind: 'null_resource', name: 'server', attributes: { subnet: '${var.subnet}' } }],
            },
        })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            modules: [
                { name: 'app', source: './app', inputs: { subnet: '${module.network.subnet_id}' } },
                { name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' } },
            ],
        }), {})

        assert.deepEqual(expanded.nodes[0].attributes.subnet, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'module.network.null_resource.subnet' }, path: ['id'] },
        })
    })

    it('should let sibling modules read each other outputs when their nodes do not form a cycle', async () => {
        const loader = new InMemoryModuleLoader({ './peer': PEER_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            modules: [
                { name: 'a', source: './peer', inputs: { peer: '${module.b.first_id}' } },
                { name: 'b', source: './peer', inputs: { peer: '${module.a.first_id}' } },
            ],
        }), {})

        assert.deepEqual(expanded.nodes[1].attributes.peer, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'module.b.null_resource.first' }, path: ['id'] },
        })
        assert.deepEqual(expanded.nodes[3].attributes.peer, {
            type: 'reference',
            ref: { root: { type: 'node', address: 'module.a.null_resource.first' }, path: ['id'] },
        })

        const resolved = new DependencyResolver().resolve(AttributeGraph.fromDeclarations(expanded.nodes))
        assert.deepEqual(resolved.order, [
            'module.a.null_resource.first',
            'module.b.null_resource.first',
            'module.a.null_resource.second',
            'module.b.null_resource.second',
        ])
    })

    it('should fail when module values feed each other without any node in between', async () => {
        const loader = new InMemoryModuleLoader({
            './echo': { variables: { peer: {} }, outputs: { echo: { value: '${var.peer}' } } },
        })
        await assert.rejects(
            new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
                modules: [
                    { name: 'a', source: './echo', inputs: { peer: '${module.b.echo}' } },
                    { name: 'b', source: './echo', inputs: { peer: '${module.a.echo}' } },
                ],
            }), {}),
            (err: unknown) => {
                assert.ok(err instanceof CyclicDependencyError)
                assert.deepEqual(err.cycle, ['module.a.var.peer', 'module.b.echo', 'module.b.var.peer', 'module.a.echo'])
                assert.equal(err.message,
                    'Dependency cycle: module.a.var.peer -> module.b.echo -> module.b.var.peer -> module.a.echo -> module.a.var.peer')
                return true
            }
        )
    })

    it('should carry sensitivity of variables into attributes and outputs', async () => {
        const loader = new InMemoryModuleLoader({
            './db': {
                variables: { password: { sensitive: true } },
                resources: [{ kind: 'null_resource', name: 'db', attributes: { password: '${var.password}', user: 'admin' } }],
                outputs: {
                    conn: { value: 'admin:${var.password}' },
                    user: { value: '${null_resource.db.user}' },
                },
            },
        })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            variables: { token: { sensitive: true } },
            modules: [{ name: 'db', source: './db', inputs: { password: 'test-secret' } }],
            resources: [{ kind: 'null_resource', name: 'app', attributes: { secret: '${module.db.conn}', token: '${var.token}', name: 'app' } }],
            outputs: {
                conn: { value: '${module.db.conn}' },
                user: { value: '${module.db.user}' },
                token: { value: '${var.token}' },
            },
        }), { token: 'test-token' })

        assert.deepEqual(expanded.nodes.map(n => [n.name, n.sensitiveAttributes]), [
            ['app', ['secret', 'token']],
            ['db', ['password']],
        ])
        assert.deepEqual(Object.values(expanded.outputs).map(o => [o.name, o.sensitive]), [
            ['conn', true],
            ['user', false],
            ['token', true],
        ])
    })

    it('should turn module depends_on into hints on every node of the module', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            resources: [{ kind: 'null_resource', name: 'firewall' }],
            modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' }, depends_on: ['null_resource.firewall'] }],
        }), {})

        assert.deepEqual(expanded.nodes.map(n => n.dependsOn), [[], ['null_resource.firewall'], ['null_resource.firewall']])
    })

    it('should expand a module depends_on hint into the module nodes', async () => {
        const loader = new InMemoryModuleLoader({ './network': NETWORK_MODULE })
        const expanded = await new ModuleExpander({ loader, depthLimit: 4 }).expand(rootModule({
            modules: [{ name: 'network', source: './network', inputs: { cidr: '10.0.0.0/16' } }],
            resources: [{ kind: 'null_resource', name: 'app', depends_on: ['module.network'] }],
        }), {})

        assert.deepEqual(expanded.nodes[0].dependsOn, ['module.network.null_resource.vnet', 'module.network.null_resource.subnet'])
    })
})
