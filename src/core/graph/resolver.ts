import { CyclicDependencyError } from "../errors/errors"
import { AttributeGraph } from "./graph"

export interface ResolvedGraph {
    graph: AttributeGraph
    /** Node addresses, every node after all the nodes it depends on */
    order: string[]
    /** address -> addresses it depends on */
    dependencies: Map<string, string[]>
    /** address -> addresses depending on it */
    dependents: Map<string, string[]>
}

/**
 * Topological order of `items` (given in declaration order) where each item comes after its
 * dependencies. Among ready items the earliest declared goes first, so unchanged input always
 * yields the same order. Dependencies outside `items` are ignored.
 *
 * Throws CyclicDependencyError naming the nodes of one cycle when no order exists.
 */
export function topologicalOrder(items: string[], dependencies: Map<string, string[]>): string[] {
    const position = new Map(items.map((item, i): [string, number] => [item, i]))
    const remaining = new Map<string, number>()
    const dependents = new Map<string, string[]>()

    for (const item of items) {
        const deps = (dependencies.get(item) ?? []).filter(d => position.has(d))
        remaining.set(item, new Set(deps).size)
        for (const dep of new Set(deps)) {
            const list = dependents.get(dep) ?? []
            list.push(item)
            dependents.set(dep, list)
        }
    }

    const ready = items.filter(item => remaining.get(item) === 0)
    const order: string[] = []

    while (ready.length > 0) {
        // earliest declared ready item
        let best = 0
        for (let i = 1; i < ready.length; i++) {
            if ((position.get(ready[i]) ?? 0) < (position.get(ready[best]) ?? 0)) {
                best = i
            }
        }
        const [item] = ready.splice(best, 1)
        order.push(item)

        for (const dependent of dependents.get(item) ?? []) {
            const left = (remaining.get(dependent) ?? 0) - 1
            remaining.set(dependent, left)
            if (left === 0) {
                ready.push(dependent)
            }
        }
    }

    if (order.length < items.length) {
        const placed = new Set(order)
        const leftover = items.filter(item => !placed.has(item))
        throw new CyclicDependencyError(findCycle(leftover, dependencies))
    }

    return order
}

/**
 * Every left-over node still waits on at least one left-over node, so following the first such
 * dependency from any of them must come back to a node already visited.
 */
function findCycle(leftover: string[], dependencies: Map<string, string[]>): string[] {
    const candidates = new Set(leftover)
    const path: string[] = []
    const seenAt = new Map<string, number>()
    let current: string | undefined = leftover[0]

    while (current !== undefined && !seenAt.has(current)) {
        seenAt.set(current, path.length)
        path.push(current)
        current = (dependencies.get(current) ?? []).find(d => candidates.has(d))
    }

    if (current === undefined) {
        return leftover
    }
    return path.slice(seenAt.get(current))
}

/**
 * Builds the dependency graph from attribute references and ordering hints.
 */
export class DependencyResolver {

    resolve(graph: AttributeGraph): ResolvedGraph {
        const dependencies = graph.resolveReferences()
        const order = topologicalOrder(graph.list().map(n => n.address), dependencies)

        const dependents = new Map<string, string[]>()
        for (const address of order) {
            dependents.set(address, [])
        }
        for (const address of order) {
            for (const dep of dependencies.get(address) ?? []) {
                dependents.get(dep)?.push(address)
            }
        }

        return { graph, order, dependencies, dependents }
    }
}
