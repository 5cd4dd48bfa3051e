import * as assert from 'assert'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { DeclarationError, ModuleSourceError } from '../../../../src/core/errors/errors'
import { LocalModuleLoader } from '../../../../src/core/declaration/loader'
import { parseModuleDeclaration } from '../../../../src/core/declaration/parser'

describe('Module declaration parser', () => {

    it('should parse resources with defaults', () => {
        const decl = parseModuleDeclaration({
            resources: [{ kind: 'local_file', name: 'motd', attributes: { filename: 'motd.txt', content: '${var.greeting}' } }],
            variables: { greeting: { default: 'hello' } },
        }, 'main.json', '/work')

        assert.equal(decl.source, 'main.json')
        assert.deepEqual(decl.variables.greeting, { name: 'greeting', default: 'hello', hasDefault: true, sensitive: false })

        const resource = decl.resources[0]
        assert.deepEqual(resource.lifecycle, { createBeforeDestroy: false, preventDestroy: false, ignoreChanges: [] })
        assert.deepEqual(resource.dependsOn, [])
        assert.deepEqual(resource.attributes.filename, { type: 'literal', value: 'motd.txt' })
        assert.deepEqual(resource.attributes.content, { type: 'reference', ref: { root: { type: 'var', name: 'greeting' }, path: [] } })
    })

    it('should mark variables without default as required', () => {
        const decl = parseModuleDeclaration({ variables: { location: {} } }, 'main.json')
        assert.equal(decl.variables.location.hasDefault, false)
    })

    it('should keep a null default as a default', () => {
        const decl = parseModuleDeclaration({ variables: { tag: { default: null } } }, 'main.json')
        assert.equal(decl.variables.tag.hasDefault, true)
    })

    it('should resolve provisioner scripts against the module directory', () => {
        const decl = parseModuleDeclaration({
            resources: [{
                kind: 'null_resource',
                name: 'setup',
                provisioners: [{
                    type: 'remote-exec',
                    script: 'scripts/setup.sh',
                    connection: { host: '${vm.web.ip}', user: 'admin' },
                }],
            }],
        }, 'main.json', '/work/app')

        const provisioner = decl.resources[0].provisioners[0]
        assert.equal(provisioner.scriptPath, path.resolve('/work/app', 'scripts/setup.sh'))
        assert.equal(provisioner.onFailure, 'fail')
        assert.equal(provisioner.inline, undefined)
        assert.deepEqual(Object.keys(provisioner.connection), ['type', 'host', 'user'])
    })

    it('should parse lifecycle and module calls', () => {
        const decl = parseModuleDeclaration({
            resources: [{
                kind: 'null_resource',
                name: 'a',
                lifecycle: { create_before_destroy: true, ignore_changes: ['triggers'] },
            }],
            modules: [{ name: 'net', source: './network', inputs: { cidr: '10.0.0.0/16' }, depends_on: ['null_resource.a'] }],
            outputs: { secret: { value: '${module.net.key}', sensitive: true } },
        }, 'main.json')

        assert.deepEqual(decl.resources[0].lifecycle, { createBeforeDestroy: true, preventDestroy: false, ignoreChanges: ['triggers'] })
        assert.deepEqual(decl.modules[0], {
            name: 'net',
            source: './network',
            inputs: { cidr: { type: 'literal', value: '10.0.0.0/16' } },
            dependsOn: ['null_resource.a'],
        })
        assert.equal(decl.outputs.secret.sensitive, true)
    })

    it('should reject unknown fields with their path', () => {
        assert.throws(
            () => parseModuleDeclaration({ resources: [{ kind: 'null_resource', name: 'a', atributes: {} }] }, 'web/main.json'),
            (err: unknown) => {
                assert.ok(err instanceof DeclarationError)
                assert.equal(err.source, 'web/main.json')
                assert.match(err.message, /^Invalid declaration in web\/main.json: resources.0: /)
                return true
            }
        )
    })

    it('should require exactly one of script or inline', () => {
        assert.throws(() => parseModuleDeclaration({
            resources: [{
                kind: 'null_resource',
                name: 'a',
                provisioners: [{ type: 'remote-exec', connection: { host: 'h', user: 'u' } }],
            }],
        }, 'main.json'), /resources.0.provisioners.0: Exactly one of script or inline must be set/)
    })

    it('should reject invalid names', () => {
        assert.throws(() => parseModuleDeclaration({ resources: [{ kind: 'null_resource', name: 'my app' }] }, 'main.json'), /resources.0.name/)
    })

    it('should report expression syntax errors as declaration errors', () => {
        assert.throws(
            () => parseModuleDeclaration({ resources: [{ kind: 'null_resource', name: 'a', attributes: { x: '${var.}' } }] }, 'main.json'),
            /Invalid declaration in main.json: Invalid expression "\$\{var.\}": empty segment/
        )
    })
})

describe('Local module loader', () => {

    let workDir: string

    beforeEach(() => {
        workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphform-loader-'))
    })

    afterEach(() => {
        fs.rmSync(workDir, { recursive: true, force: true })
    })

    it('should load a module relative to the calling module directory', async () => {
        fs.mkdirSync(path.join(workDir, 'network'))
        fs.writeFileSync(path.join(workDir, 'network', 'main.json'), JSON.stringify({ outputs: { cidr: { value: '10.0.0.0/16' } } }))

        const decl = await new LocalModuleLoader().load('./network', workDir)

        assert.equal(decl.dir, path.join(workDir, 'network'))
        assert.equal(decl.source, path.join(workDir, 'network', 'main.json'))
        assert.deepEqual(decl.outputs.cidr.value, { type: 'literal', value: '10.0.0.0/16' })
    })

    it('should reject non local sources', async () => {
        await assert.rejects(new LocalModuleLoader().load('registry.example.com/net', workDir), ModuleSourceError)
    })

    it('should fail on a missing module file', async () => {
        await assert.rejects(new LocalModuleLoader().loadDirectory(workDir), /Cannot load module source ".*": cannot read .*main.json/)
    })

    it('should fail on invalid JSON', async () => {
        fs.writeFileSync(path.join(workDir, 'main.json'), '{ "resources": [')
        await assert.rejects(new LocalModuleLoader().loadDirectory(workDir), /Invalid declaration in .*main.json: invalid JSON/)
    })
})
