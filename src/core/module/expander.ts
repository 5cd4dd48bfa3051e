import { getLogger } from "../../log/utils"
import { ModuleSourceLoader } from "../declaration/loader"
import { ModuleDeclaration } from "../declaration/parser"
import {
    CyclicDependencyError,
    DeclarationError,
    MissingRequiredVariableError,
    ModuleRecursionLimitError,
    UnknownOutputError,
    UnknownReferenceError,
    UnknownVariableError
} from "../errors/errors"
import { formatAddress, formatModulePath, moduleLabel } from "../graph/address"
import {
    Expression,
    formatReference,
    LiteralValue,
    mapReferences,
    Reference,
    selectPath
} from "../graph/expression"
import { NodeDeclaration, ProvisionerSpec } from "../graph/graph"

/**
 * A module declaration with its child module calls loaded.
 */
export interface ModuleTree {
    path: string[]
    declaration: ModuleDeclaration
    children: Map<string, ModuleTree>
}

export interface ExpandedOutput {
    name: string
    /** Only references to node addresses remain */
    value: Expression
    sensitive: boolean
}

export interface ExpandedConfiguration {
    /** Every resource of every module instance, identities namespaced by module path */
    nodes: NodeDeclaration[]
    /** Root module outputs */
    outputs: Record<string, ExpandedOutput>
}

interface ScopedValue {
    expr: Expression
    /** Derived from a sensitive variable or output */
    sensitive: boolean
}

type Binding = () => ScopedValue

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Addresses of every resource of a module instance and its descendants: own resources first,
 * then each child in call order.
 */
function subtreeAddresses(tree: ModuleTree): string[] {
    return [
        ...tree.declaration.resources.map(r => formatAddress({ kind: r.kind, name: r.name, modulePath: tree.path })),
        ...tree.declaration.modules.flatMap(call => {
            const child = tree.children.get(call.name)
            return child ? subtreeAddresses(child) : []
        }),
    ]
}

/**
 * Variables and outputs being resolved. Meeting one of them again while resolving it means
 * values feed each other with no node in between.
 */
class ResolutionStack {

    private readonly active: string[] = []

    resolve<T>(key: string, fn: () => T): T {
        const idx = this.active.indexOf(key)
        if (idx >= 0) {
            throw new CyclicDependencyError(this.active.slice(idx))
        }
        this.active.push(key)
        try {
            return fn()
        } finally {
            this.active.pop()
        }
    }
}

/**
 * One module instance. Variables and outputs are resolved on first use and cached, so sibling
 * modules may read each other's outputs whatever their call order.
 */
class ModuleScope {

    readonly label: string
    private readonly prefix: string
    private readonly children = new Map<string, ModuleScope>()
    private readonly variables = new Map<string, ScopedValue>()
    private readonly outputs = new Map<string, ScopedValue>()

    constructor(
        private readonly tree: ModuleTree,
        private readonly bindings: Record<string, Binding>,
        private readonly inheritedDependsOn: string[],
        private readonly stack: ResolutionStack,
    ) {
        const decl = tree.declaration
        this.label = moduleLabel(tree.path)
        this.prefix = formatModulePath(tree.path)

        for (const name of Object.keys(bindings)) {
            if (!hasOwn(decl.variables, name)) {
                throw new UnknownVariableError(name, this.label)
            }
        }
        for (const variable of Object.values(decl.variables)) {
            if (!hasOwn(bindings, variable.name) && !variable.hasDefault) {
                throw new MissingRequiredVariableError(variable.name, this.label)
            }
        }

        for (const call of decl.modules) {
            const child = tree.children.get(call.name)
            if (!child) {
                throw new UnknownReferenceError(`module.${call.name}`, this.label)
            }
            const childLabel = moduleLabel(child.path)

            const childBindings: Record<string, Binding> = {}
            for (const [name, input] of Object.entries(call.inputs)) {
                childBindings[name] = () => this.rewrite(input, `${childLabel} input "${name}"`)
            }
            const childDependsOn = [...inheritedDependsOn, ...this.resolveHints(call.dependsOn, childLabel)]

            this.children.set(call.name, new ModuleScope(child, childBindings, childDependsOn, stack))
        }
    }

    /**
     * Every node of this instance and its descendants. Resolves every variable and output
     * on the way so bad inputs fail even when nothing reads them.
     */
    expandNodes(): NodeDeclaration[] {
        const decl = this.tree.declaration
        for (const name of Object.keys(decl.variables)) {
            this.variable(name, this.label)
        }

        const nodes: NodeDeclaration[] = []
        for (const resource of decl.resources) {
            const address = formatAddress({ kind: resource.kind, name: resource.name, modulePath: this.tree.path })

            const attributes: Record<string, Expression> = {}
            const sensitiveAttributes: string[] = []
            for (const [key, expr] of Object.entries(resource.attributes)) {
                const value = this.rewrite(expr, address)
                attributes[key] = value.expr
                if (value.sensitive) {
                    sensitiveAttributes.push(key)
                }
            }

            const provisioners: ProvisionerSpec[] = resource.provisioners.map(p => {
                const connection: Record<string, Expression> = {}
                for (const [key, expr] of Object.entries(p.connection)) {
                    connection[key] = this.rewrite(expr, address).expr
                }
                return { ...p, connection, inline: p.inline ? this.rewrite(p.inline, address).expr : undefined }
            })

            nodes.push({
                kind: resource.kind,
                name: resource.name,
                modulePath: this.tree.path,
                attributes,
                dependsOn: [...this.inheritedDependsOn, ...this.resolveHints(resource.dependsOn, address)],
                lifecycle: resource.lifecycle,
                provisioners,
                sensitiveAttributes,
            })
        }

        // children come after own resources, in call order
        for (const call of decl.modules) {
            const child = this.children.get(call.name)
            if (child) {
                nodes.push(...child.expandNodes())
            }
        }

        for (const name of Object.keys(decl.outputs)) {
            this.output(name)
        }

        return nodes
    }

    expandOutputs(): Record<string, ExpandedOutput> {
        const outputs: Record<string, ExpandedOutput> = {}
        for (const name of Object.keys(this.tree.declaration.outputs)) {
            const value = this.output(name)
            outputs[name] = { name, value: value.expr, sensitive: value.sensitive }
        }
        return outputs
    }

    private variable(name: string, source: string): ScopedValue {
        const variable = hasOwn(this.tree.declaration.variables, name) ? this.tree.declaration.variables[name] : undefined
        if (!variable) {
            throw new UnknownReferenceError(`var.${name}`, source)
        }

        const cached = this.variables.get(name)
        if (cached) {
            return cached
        }

        const key = this.prefix ? `${this.prefix}.var.${name}` : `var.${name}`
        const bound = this.stack.resolve(key, (): ScopedValue => hasOwn(this.bindings, name)
            ? this.bindings[name]()
            : { expr: { type: 'literal', value: variable.default ?? null }, sensitive: false })

        const value = { expr: bound.expr, sensitive: bound.sensitive || variable.sensitive }
        this.variables.set(name, value)
        return value
    }

    private output(name: string): ScopedValue {
        const output = hasOwn(this.tree.declaration.outputs, name) ? this.tree.declaration.outputs[name] : undefined
        if (!output) {
            throw new UnknownOutputError(name, this.label)
        }

        const cached = this.outputs.get(name)
        if (cached) {
            return cached
        }

        const key = this.prefix ? `${this.prefix}.${name}` : `output.${name}`
        const rewritten = this.stack.resolve(key, () => this.rewrite(output.value, `${this.label} output "${name}"`))

        const value = { expr: rewritten.expr, sensitive: rewritten.sensitive || output.sensitive }
        this.outputs.set(name, value)
        return value
    }

    /**
     * Rewrite references of an expression declared in this module: variables and child outputs
     * are replaced by their values, resources become namespaced node references.
     */
    private rewrite(expr: Expression, source: string): ScopedValue {
        let sensitive = false
        const rewritten = mapReferences(expr, ref => {
            const value = this.resolveReference(ref, source)
            sensitive = sensitive || value.sensitive
            return value.expr
        })
        return { expr: rewritten, sensitive }
    }

    private resolveReference(ref: Reference, source: string): ScopedValue {
        const root = ref.root
        switch (root.type) {
            case 'resource': {
                const address = formatAddress({ kind: root.kind, name: root.name, modulePath: this.tree.path })
                return { expr: { type: 'reference', ref: { root: { type: 'node', address }, path: ref.path } }, sensitive: false }
            }
            case 'var':
                return this.select(this.variable(root.name, source), ref, source)
            case 'module': {
                const child = this.children.get(root.name)
                if (!child) {
                    throw new UnknownReferenceError(`module.${root.name}`, source)
                }
                return this.select(child.output(root.output), ref, source)
            }
            case 'self':
            case 'node':
                return { expr: { type: 'reference', ref }, sensitive: false }
        }
    }

    private select(value: ScopedValue, ref: Reference, source: string): ScopedValue {
        const selected = selectPath(value.expr, ref.path)
        if (!selected) {
            throw new UnknownReferenceError(formatReference(ref), source)
        }
        return { expr: selected, sensitive: value.sensitive }
    }

    private resolveHints(hints: string[], source: string): string[] {
        return hints.flatMap(hint => {
            const segments = hint.split('.')
            if (segments.length === 2 && segments[0] === 'module') {
                const child = this.tree.children.get(segments[1])
                if (!child) {
                    throw new UnknownReferenceError(hint, source)
                }
                return subtreeAddresses(child)
            }
            if (segments.length === 2) {
                return [formatAddress({ kind: segments[0], name: segments[1], modulePath: this.tree.path })]
            }
            throw new UnknownReferenceError(hint, source)
        })
    }
}

export interface ModuleExpanderArgs {
    loader: ModuleSourceLoader
    /** Maximum module nesting, root module being level 0 */
    depthLimit: number
}

/**
 * Inlines module instances into a flat set of namespaced nodes.
 *
 * Loading the module tree is the only I/O; expansion itself is a pure pass: variables are
 * substituted by the caller's bound values, internal references are rewritten to namespaced node
 * addresses and references to a child's outputs are replaced by the output's (rewritten) value.
 * Ordering between nodes is left to the dependency resolver.
 */
export class ModuleExpander {

    private readonly logger = getLogger(ModuleExpander.name)
    private readonly loader: ModuleSourceLoader
    private readonly depthLimit: number

    constructor(args: ModuleExpanderArgs) {
        this.loader = args.loader
        this.depthLimit = args.depthLimit
    }

    async expand(root: ModuleDeclaration, variables: Record<string, LiteralValue>): Promise<ExpandedConfiguration> {
        const tree = await this.loadTree(root, [])
        return this.expandTree(tree, variables)
    }

    /**
     * Recursively load every module called from `declaration`.
     */
    async loadTree(declaration: ModuleDeclaration, path: string[]): Promise<ModuleTree> {
        if (path.length > this.depthLimit) {
            throw new ModuleRecursionLimitError(formatModulePath(path), this.depthLimit)
        }

        const children = new Map<string, ModuleTree>()
        for (const call of declaration.modules) {
            if (children.has(call.name)) {
                throw new DeclarationError(declaration.source, `module "${call.name}" is declared more than once`)
            }
            this.logger.debug(`Loading module ${formatModulePath([...path, call.name])} from ${call.source}`)
            const child = await this.loader.load(call.source, declaration.dir)
            children.set(call.name, await this.loadTree(child, [...path, call.name]))
        }

        return { path, declaration, children }
    }

    expandTree(tree: ModuleTree, variables: Record<string, LiteralValue>): ExpandedConfiguration {
        const bindings: Record<string, Binding> = {}
        for (const [name, value] of Object.entries(variables)) {
            bindings[name] = () => ({ expr: { type: 'literal', value }, sensitive: false })
        }

        const scope = new ModuleScope(tree, bindings, [], new ResolutionStack())
        const nodes = scope.expandNodes()
        const outputs = scope.expandOutputs()

        this.logger.debug(`Expanded ${nodes.length} node(s) from ${tree.children.size} top-level module call(s)`)
        return { nodes, outputs }
    }
}
