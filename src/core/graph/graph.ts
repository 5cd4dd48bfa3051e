import { DuplicateNodeError, UnknownReferenceError } from "../errors/errors"
import { formatAddress, NodeIdentity } from "./address"
import { collectReferences, Expression, formatReference, Reference } from "./expression"

export interface LifecyclePolicy {
    createBeforeDestroy: boolean
    preventDestroy: boolean
    /** Attribute names excluded from diffing */
    ignoreChanges: string[]
}

export const DEFAULT_LIFECYCLE: LifecyclePolicy = {
    createBeforeDestroy: false,
    preventDestroy: false,
    ignoreChanges: [],
}

export type ProvisionerFailureMode = 'fail' | 'continue'

/**
 * Remote script run right after the node is created (or re-created by a replace).
 */
export interface ProvisionerSpec {
    type: 'remote-exec'
    /** Absolute path of a script file */
    scriptPath?: string
    /** Commands run in sequence when no script file is given */
    inline?: Expression
    /** Connection settings (host, port, user, password, private_key, timeout), may reference `self` */
    connection: Record<string, Expression>
    onFailure: ProvisionerFailureMode
}

export interface NodeDeclaration extends NodeIdentity {
    attributes: Record<string, Expression>
    /** Explicit ordering hints, as node addresses */
    dependsOn: string[]
    lifecycle: LifecyclePolicy
    provisioners: ProvisionerSpec[]
    /** Attributes whose value comes from a sensitive variable or output */
    sensitiveAttributes?: string[]
}

export interface GraphNode extends NodeDeclaration {
    address: string
    sensitiveAttributes: string[]
    /** Declaration order, used as stable tie-break */
    index: number
}

export type AddNodeOptions = Partial<Omit<NodeDeclaration, 'kind' | 'name' | 'attributes'>>

/**
 * Every declared node with its attribute expressions.
 */
export class AttributeGraph {

    private readonly nodes = new Map<string, GraphNode>()

    addNode(kind: string, name: string, attributes: Record<string, Expression>, opts: AddNodeOptions = {}): GraphNode {
        const node: GraphNode = {
            kind,
            name,
            modulePath: opts.modulePath ?? [],
            attributes,
            dependsOn: opts.dependsOn ?? [],
            lifecycle: opts.lifecycle ?? DEFAULT_LIFECYCLE,
            provisioners: opts.provisioners ?? [],
            sensitiveAttributes: opts.sensitiveAttributes ?? [],
            address: '',
            index: this.nodes.size,
        }
        node.address = formatAddress(node)

        if (this.nodes.has(node.address)) {
            throw new DuplicateNodeError(node.address)
        }

        this.nodes.set(node.address, node)
        return node
    }

    static fromDeclarations(declarations: NodeDeclaration[]): AttributeGraph {
        const graph = new AttributeGraph()
        for (const decl of declarations) {
            graph.addNode(decl.kind, decl.name, decl.attributes, decl)
        }
        return graph
    }

    has(address: string): boolean {
        return this.nodes.has(address)
    }

    get(address: string): GraphNode | undefined {
        return this.nodes.get(address)
    }

    /**
     * Nodes in declaration order
     */
    list(): GraphNode[] {
        return Array.from(this.nodes.values())
    }

    get size(): number {
        return this.nodes.size
    }

    /**
     * Check every reference targets a declared node and return, per node, the addresses it depends on
     * (references, provisioner connections and explicit hints, in first-seen order).
     *
     * No value is computed here: values of nodes not yet applied stay symbolic until plan or apply.
     */
    resolveReferences(): Map<string, string[]> {
        const dependencies = new Map<string, string[]>()

        for (const node of this.nodes.values()) {
            const targets = new Set<string>()

            for (const ref of this.attributeReferences(node)) {
                if (ref.root.type === 'self') {
                    throw new UnknownReferenceError(formatReference(ref), node.address)
                }
                targets.add(this.targetOf(ref, node.address))
            }

            for (const ref of this.provisionerReferences(node)) {
                if (ref.root.type !== 'self') {
                    targets.add(this.targetOf(ref, node.address))
                }
            }

            for (const hint of node.dependsOn) {
                if (!this.nodes.has(hint)) {
                    throw new UnknownReferenceError(hint, node.address)
                }
                targets.add(hint)
            }

            dependencies.set(node.address, Array.from(targets))
        }

        return dependencies
    }

    /**
     * Check references of expressions living outside any node (root outputs).
     */
    checkExpression(source: string, expr: Expression): void {
        for (const ref of collectReferences(expr)) {
            this.targetOf(ref, source)
        }
    }

    private attributeReferences(node: GraphNode): Reference[] {
        return Object.values(node.attributes).flatMap(collectReferences)
    }

    private provisionerReferences(node: GraphNode): Reference[] {
        return node.provisioners.flatMap(p => [
            ...Object.values(p.connection).flatMap(collectReferences),
            ...(p.inline ? collectReferences(p.inline) : []),
        ])
    }

    private targetOf(ref: Reference, source: string): string {
        if (ref.root.type !== 'node') {
            throw new UnknownReferenceError(formatReference(ref), source)
        }
        if (!this.nodes.has(ref.root.address)) {
            throw new UnknownReferenceError(ref.root.address, source)
        }
        return ref.root.address
    }
}
