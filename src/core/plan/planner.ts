import lodash from 'lodash'
import { getLogger } from "../../log/utils"
import { ErrorUtils } from "../../tools/error-utils"
import { PreventDestroyViolation, ProviderOperationError, UnknownReferenceError } from "../errors/errors"
import {
    AttributeMap,
    evaluate,
    evaluateAttributes,
    Expression,
    formatReference,
    isKnown,
    LiteralValue,
    PlannedAttributeMap,
    PlannedValue,
    ReferenceLookup,
    UNKNOWN,
    UnresolvedAttributeError,
    walkPath
} from "../graph/expression"
import { GraphNode } from "../graph/graph"
import { ResolvedGraph, topologicalOrder } from "../graph/resolver"
import { ExpandedOutput } from "../module/expander"
import { ProviderRegistry } from "../provider"
import { StateRecord, StateSnapshot } from "../state/state"
import { Plan, PlannedAction, PlannedChange } from "./plan"

export interface PlannerArgs {
    providers: ProviderRegistry
    /** Re-read every state record through its provider before diffing */
    refresh: boolean
}

export interface PlanRequest {
    resolved: ResolvedGraph
    outputs: Record<string, ExpandedOutput>
    prior: StateSnapshot
}

interface PlannedNode {
    action: PlannedAction
    desired: PlannedAttributeMap
    prior?: StateRecord
}

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Compares desired attributes against prior state and classifies every node as
 * create, update, replace, destroy or no-op.
 */
export class Planner {

    private readonly logger = getLogger(Planner.name)
    private readonly providers: ProviderRegistry
    private readonly refreshEnabled: boolean

    constructor(args: PlannerArgs) {
        this.providers = args.providers
        this.refreshEnabled = args.refresh
    }

    /**
     * Read every record's current attributes from its provider. Records whose resource
     * no longer exists are dropped. Persisted state is left untouched.
     */
    async refresh(prior: StateSnapshot): Promise<StateSnapshot> {
        const records: Record<string, StateRecord> = {}

        for (const record of Object.values(prior.records)) {
            const provider = this.providers.forKind(record.kind)

            let current: AttributeMap | undefined
            try {
                current = await provider.read(record.kind, record.id)
            } catch (e) {
                throw new ProviderOperationError(record.address, 'read', ErrorUtils.extractErrorMessage(e), ErrorUtils.toError(e))
            }

            if (current === undefined) {
                this.logger.info(`${record.address} (${record.id}) no longer exists, dropping it from prior state`)
                continue
            }

            records[record.address] = { ...record, attributes: { ...record.attributes, ...current } }
        }

        return lodash.cloneDeep({ ...prior, records })
    }

    async plan(request: PlanRequest): Promise<Plan> {
        const prior = this.refreshEnabled ? await this.refresh(request.prior) : lodash.cloneDeep(request.prior)
        const { graph, order, dependencies } = request.resolved

        const planned = new Map<string, PlannedNode>()
        const lookup = this.plannedLookup(planned)
        const changes: PlannedChange[] = []

        for (const node of order.flatMap(address => graph.get(address) ?? [])) {
            // fail before any change when a kind has no provider
            this.providers.forKind(node.kind)

            const record: StateRecord | undefined = prior.records[node.address]
            const desired = this.evaluateAll(node.attributes, lookup, node.address)
            const change = this.diffNode(node, desired, record, dependencies.get(node.address) ?? [])

            planned.set(node.address, { action: change.action, desired, prior: record })
            changes.push(change)
        }

        const orphans = Object.keys(prior.records).filter(address => !graph.has(address))
        changes.push(...this.destroyChanges(prior, orphans))

        this.checkPreventDestroy(changes)

        const plannedOutputs: Record<string, PlannedValue> = {}
        for (const output of Object.values(request.outputs)) {
            plannedOutputs[output.name] = this.evaluateOne(output.value, lookup, `output "${output.name}"`)
        }

        this.logPlan(changes)
        return { mode: 'apply', changes, prior, outputs: request.outputs, plannedOutputs }
    }

    /**
     * Plan removal of every record in state.
     */
    async planDestroy(priorState: StateSnapshot): Promise<Plan> {
        const prior = this.refreshEnabled ? await this.refresh(priorState) : lodash.cloneDeep(priorState)
        const changes = this.destroyChanges(prior, Object.keys(prior.records))

        this.checkPreventDestroy(changes)

        this.logPlan(changes)
        return { mode: 'destroy', changes, prior, outputs: {}, plannedOutputs: {} }
    }

    private diffNode(node: GraphNode, desired: PlannedAttributeMap, record: StateRecord | undefined, dependencies: string[]): PlannedChange {
        const base = {
            address: node.address,
            kind: node.kind,
            name: node.name,
            modulePath: node.modulePath,
            desired,
            node,
            prior: record,
            createBeforeDestroy: node.lifecycle.createBeforeDestroy,
            dependencies,
        }

        if (!record) {
            return { ...base, action: 'create', changedAttributes: Object.keys(desired), replaceReasons: [] }
        }

        const ignored = new Set(node.lifecycle.ignoreChanges)
        const changedAttributes: string[] = []

        for (const [key, value] of Object.entries(desired)) {
            if (ignored.has(key)) {
                continue
            }
            const previous: LiteralValue | undefined = hasOwn(record.attributes, key) ? record.attributes[key] : record.inputs[key]
            if (!isKnown(value) || previous === undefined || !lodash.isEqual(value, previous)) {
                changedAttributes.push(key)
            }
        }

        // attributes no longer declared
        for (const key of Object.keys(record.inputs)) {
            if (!hasOwn(desired, key) && !ignored.has(key)) {
                changedAttributes.push(key)
            }
        }

        const replaceReasons = changedAttributes.filter(key => this.providers.requiresReplacement(node.kind, key))
        if (record.tainted) {
            replaceReasons.push('tainted')
        }

        const action: PlannedAction = replaceReasons.length > 0
            ? 'replace'
            : changedAttributes.length > 0 ? 'update' : 'no-op'

        return { ...base, action, changedAttributes, replaceReasons }
    }

    /**
     * Destroys of the given records, each one before the records it depended on.
     */
    private destroyChanges(prior: StateSnapshot, addresses: string[]): PlannedChange[] {
        const dependencies = new Map(addresses.map((address): [string, string[]] => [address, prior.records[address].dependencies]))

        return topologicalOrder(addresses, dependencies).reverse().map((address): PlannedChange => {
            const record = prior.records[address]
            return {
                address,
                kind: record.kind,
                name: record.name,
                modulePath: record.modulePath,
                action: 'destroy',
                prior: record,
                changedAttributes: [],
                replaceReasons: [],
                createBeforeDestroy: false,
                dependencies: record.dependencies,
            }
        })
    }

    private checkPreventDestroy(changes: PlannedChange[]): void {
        const violations = changes
            .filter(c => c.action === 'destroy' || c.action === 'replace')
            .filter(c => c.node ? c.node.lifecycle.preventDestroy : c.prior?.lifecycle.preventDestroy === true)
            .map(c => c.address)

        if (violations.length > 0) {
            this.logger.error(`Plan would destroy protected node(s): ${violations.join(', ')}`)
            throw new PreventDestroyViolation(violations)
        }
    }

    /**
     * Value of another node's attribute as known before apply: declared values of nodes about
     * to be created, prior values of unchanged ones, unknown for anything computed by a provider.
     */
    private plannedLookup(planned: Map<string, PlannedNode>): ReferenceLookup {
        return ref => {
            if (ref.root.type !== 'node') {
                return undefined
            }
            const target = planned.get(ref.root.address)
            if (!target) {
                return undefined
            }

            const [attribute] = ref.path
            const priorAttributes: PlannedAttributeMap = target.prior?.attributes ?? {}

            switch (target.action) {
                case 'create':
                case 'replace':
                    if (attribute === undefined || !hasOwn(target.desired, attribute)) {
                        return UNKNOWN
                    }
                    return walkPath(target.desired, ref.path)
                case 'update':
                    if (attribute === undefined) {
                        return { ...priorAttributes, ...target.desired }
                    }
                    if (hasOwn(target.desired, attribute)) {
                        return walkPath(target.desired, ref.path)
                    }
                    return walkPath(priorAttributes, ref.path) ?? UNKNOWN
                case 'no-op':
                    return walkPath(priorAttributes, ref.path)
                case 'destroy':
                    return undefined
            }
        }
    }

    private evaluateAll(attributes: Record<string, Expression>, lookup: ReferenceLookup, source: string): PlannedAttributeMap {
        try {
            return evaluateAttributes(attributes, lookup)
        } catch (e) {
            throw this.unresolved(e, source)
        }
    }

    private evaluateOne(expr: Expression, lookup: ReferenceLookup, source: string): PlannedValue {
        try {
            return evaluate(expr, lookup)
        } catch (e) {
            throw this.unresolved(e, source)
        }
    }

    private unresolved(e: unknown, source: string): unknown {
        return e instanceof UnresolvedAttributeError ? new UnknownReferenceError(formatReference(e.ref), source) : e
    }

    private logPlan(changes: PlannedChange[]): void {
        for (const change of changes) {
            if (change.action !== 'no-op') {
                this.logger.debug(`${change.address}: ${change.action}`, {
                    changed: change.changedAttributes,
                    replaceReasons: change.replaceReasons,
                })
            }
        }
    }
}
