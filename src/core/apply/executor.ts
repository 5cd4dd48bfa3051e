import * as fs from 'fs/promises'
import lodash from 'lodash'
import { getLogger } from "../../log/utils"
import { ErrorUtils, redactSecrets } from "../../tools/error-utils"
import { ProviderOperationError, ProviderOperationName, UnknownReferenceError } from "../errors/errors"
import {
    AttributeMap,
    evaluate,
    Expression,
    formatReference,
    isKnown,
    LiteralValue,
    PlannedValue,
    ReferenceLookup,
    UnresolvedAttributeError,
    walkPath
} from "../graph/expression"
import { deposedAddress } from "../graph/address"
import { GraphNode, ProvisionerSpec } from "../graph/graph"
import { Plan, PlannedAction, PlannedChange } from "../plan/plan"
import { ProviderRegistry } from "../provider"
import { ProvisionerRunReport, RemoteProvisionerRunner, resolveConnection } from "../provisioner/runner"
import { StateOutput, StateRecord } from "../state/state"
import { StateStore } from "../state/store"

/**
 * - applied: operation done and committed
 * - unchanged: nothing to do
 * - failed: provider call failed, node left as it was in state
 * - blocked: a dependency did not apply
 * - tainted: created but a provisioner failed, will be replaced on next apply
 * - cancelled: not started because apply was aborted
 */
export type NodeStatus = 'applied' | 'unchanged' | 'failed' | 'blocked' | 'tainted' | 'cancelled'

export interface NodeReport {
    address: string
    action: PlannedAction
    status: NodeStatus
    error?: Error
    /** Dependency that did not apply, for blocked nodes */
    blockedBy?: string
    provisioners: ProvisionerRunReport[]
}

export interface ApplyReport {
    /** One entry per planned change, in plan order */
    nodes: NodeReport[]
    /** Root outputs persisted after apply */
    outputs: Record<string, StateOutput>
    cancelled: boolean
}

export type ApplyEvent =
    | { type: 'started', address: string, action: PlannedAction }
    | { type: 'finished', address: string, action: PlannedAction, status: NodeStatus, error?: Error }

export interface ApplyExecutorArgs {
    providers: ProviderRegistry
    store: StateStore
    runner: RemoteProvisionerRunner
    /** Maximum operations in flight */
    parallelism: number
    /** Connection timeout when a provisioner connection does not set one */
    connectTimeoutMs: number
}

export interface ApplyOptions {
    /** Once aborted no new operation starts; running ones finish */
    signal?: AbortSignal
    onEvent?: (event: ApplyEvent) => void
}

export function applySucceeded(report: ApplyReport): boolean {
    return report.nodes.every(n => n.status === 'applied' || n.status === 'unchanged')
}

interface Operation {
    change: PlannedChange
    /** Addresses of other operations which must complete first */
    waitsFor: string[]
}

type OperationOutcome = Omit<NodeReport, 'address' | 'action'>

function hasOwn(obj: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(obj, key)
}

/**
 * Runs a plan against providers.
 *
 * Every operation starts once all the operations it waits for are committed, so it resolves
 * references against real values. Independent operations run concurrently up to `parallelism`,
 * started in plan order. A failure only stops the operations depending on the failed node.
 */
export class ApplyExecutor {

    private readonly logger = getLogger(ApplyExecutor.name)
    private readonly args: ApplyExecutorArgs

    constructor(args: ApplyExecutorArgs) {
        if (args.parallelism < 1) {
            throw new Error(`Parallelism must be at least 1, got ${args.parallelism}`)
        }
        this.args = args
    }

    async apply(plan: Plan, options: ApplyOptions = {}): Promise<ApplyReport> {

        // latest known attributes per address, updated on every commit
        const values = new Map<string, AttributeMap>()
        for (const record of Object.values(plan.prior.records)) {
            values.set(record.address, record.attributes)
        }

        await this.recordUnchanged(plan)
        const outcomes = await this.schedule(this.buildOperations(plan), values, options)

        const nodes = plan.changes.map((change): NodeReport => {
            if (change.action === 'no-op') {
                return { address: change.address, action: change.action, status: 'unchanged', provisioners: [] }
            }
            const outcome: OperationOutcome = outcomes.get(change.address) ?? { status: 'cancelled', provisioners: [] }
            return { address: change.address, action: change.action, ...outcome }
        })

        const outputs: Record<string, StateOutput> = plan.mode === 'destroy' ? {} : this.evaluateOutputs(plan, values)
        await this.args.store.setOutputs(outputs)

        return { nodes, outputs, cancelled: options.signal?.aborted ?? false }
    }

    /**
     * Unchanged nodes whose lifecycle policy or dependencies changed get their record rewritten
     * without any provider call, so later destroy plans see the declared policy.
     */
    private async recordUnchanged(plan: Plan): Promise<void> {
        for (const change of plan.changes) {
            if (change.action !== 'no-op' || !change.node || !change.prior) {
                continue
            }
            const lifecycle = {
                createBeforeDestroy: change.node.lifecycle.createBeforeDestroy,
                preventDestroy: change.node.lifecycle.preventDestroy,
            }
            if (lodash.isEqual(lifecycle, change.prior.lifecycle) && lodash.isEqual(change.dependencies, change.prior.dependencies)) {
                continue
            }
            this.logger.debug(`${change.address}: recording lifecycle and dependencies`, { lifecycle, dependencies: change.dependencies })
            await this.args.store.commit(change.address, { ...change.prior, lifecycle, dependencies: change.dependencies })
        }
    }

    private buildOperations(plan: Plan): Operation[] {
        const changes = plan.changes.filter(c => c.action !== 'no-op')
        const scheduled = new Set(changes.map(c => c.address))

        return changes.map(change => {
            if (change.action === 'destroy') {
                // after every change on a node which depended on this one when last applied
                const waitsFor = changes
                    .filter(other => other.address !== change.address)
                    .filter(other => (other.prior?.dependencies ?? []).includes(change.address))
                    .map(other => other.address)
                return { change, waitsFor }
            }
            return { change, waitsFor: change.dependencies.filter(d => scheduled.has(d)) }
        })
    }

    private async schedule(operations: Operation[], values: Map<string, AttributeMap>, options: ApplyOptions): Promise<Map<string, OperationOutcome>> {
        const outcomes = new Map<string, OperationOutcome>()
        const pending = [...operations]
        const running = new Map<string, Promise<void>>()

        const settle = (op: Operation, outcome: OperationOutcome) => {
            outcomes.set(op.change.address, outcome)
            options.onEvent?.({
                type: 'finished',
                address: op.change.address,
                action: op.change.action,
                status: outcome.status,
                error: outcome.error,
            })
        }

        const start = (op: Operation) => {
            const address = op.change.address
            options.onEvent?.({ type: 'started', address, action: op.change.action })
            const task = this.execute(op.change, values)
                .catch((e): OperationOutcome => ({ status: 'failed', error: ErrorUtils.toError(e), provisioners: [] }))
                .then(outcome => {
                    running.delete(address)
                    settle(op, outcome)
                })
            running.set(address, task)
        }

        const launch = () => {
            let progressed = true
            while (progressed) {
                progressed = false
                for (const op of [...pending]) {
                    const blockedBy = op.waitsFor.find(address => {
                        const outcome = outcomes.get(address)
                        return outcome !== undefined && outcome.status !== 'applied'
                    })

                    if (blockedBy !== undefined) {
                        pending.splice(pending.indexOf(op), 1)
                        this.logger.warn(`${op.change.address}: ${op.change.action} skipped, ${blockedBy} did not apply`)
                        settle(op, { status: 'blocked', blockedBy, provisioners: [] })
                        progressed = true
                        continue
                    }

                    const ready = op.waitsFor.every(address => outcomes.has(address))
                    if (!ready || options.signal?.aborted || running.size >= this.args.parallelism) {
                        continue
                    }

                    pending.splice(pending.indexOf(op), 1)
                    start(op)
                    progressed = true
                }
            }
        }

        launch()
        while (running.size > 0) {
            await Promise.race(running.values())
            launch()
        }

        for (const op of pending) {
            settle(op, { status: 'cancelled', provisioners: [] })
        }
        if (pending.length > 0) {
            this.logger.warn(`Apply aborted, ${pending.length} operation(s) not started`)
        }

        return outcomes
    }

    private async execute(change: PlannedChange, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        this.logger.debug(`${change.address}: ${change.action}`)
        try {
            switch (change.action) {
                case 'create':
                    return await this.create(change, values)
                case 'update':
                    return await this.update(change, values)
                case 'replace':
                    return change.createBeforeDestroy
                        ? await this.replaceCreatingFirst(change, values)
                        : await this.replaceDestroyingFirst(change, values)
                case 'destroy':
                    await this.destroyObject(change.address, this.requirePrior(change), values)
                    return { status: 'applied', provisioners: [] }
                case 'no-op':
                    return { status: 'unchanged', provisioners: [] }
            }
        } catch (e) {
            this.logger.error(`${change.address}: ${change.action} failed: ${ErrorUtils.extractErrorMessage(e)}`)
            return { status: 'failed', error: ErrorUtils.toError(e), provisioners: [] }
        }
    }

    private async create(change: PlannedChange, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        const node = this.requireNode(change)
        const record = await this.createObject(change, node, values)
        return this.provision(node, record, values)
    }

    private async update(change: PlannedChange, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        const node = this.requireNode(change)
        const prior = this.requirePrior(change)
        const inputs = this.desiredAttributes(node, values)

        for (const key of node.lifecycle.ignoreChanges) {
            const previous: LiteralValue | undefined = hasOwn(prior.inputs, key)
                ? prior.inputs[key]
                : hasOwn(prior.attributes, key) ? prior.attributes[key] : undefined
            if (previous !== undefined) {
                inputs[key] = previous
            }
        }

        const provider = this.args.providers.forKind(node.kind)
        this.logger.debug(`Updating ${node.address} (${prior.id})`, { attributes: redactSecrets(inputs, node.sensitiveAttributes) })
        const result = await this.callProvider(node.address, 'update', () => provider.update(node.kind, prior.id, inputs))

        await this.commit({
            ...prior,
            id: result.id,
            inputs,
            attributes: result.attributes,
            dependencies: change.dependencies,
            lifecycle: { createBeforeDestroy: node.lifecycle.createBeforeDestroy, preventDestroy: node.lifecycle.preventDestroy },
            tainted: false,
        }, values)

        return { status: 'applied', provisioners: [] }
    }

    private async replaceDestroyingFirst(change: PlannedChange, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        await this.destroyObject(change.address, this.requirePrior(change), values)
        return this.create(change, values)
    }

    /**
     * The new object replaces the old one in state as soon as it exists; the old object is
     * destroyed once the new one is provisioned. Until then it is kept under its deposed address,
     * where it stays if the destroy fails.
     */
    private async replaceCreatingFirst(change: PlannedChange, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        const node = this.requireNode(change)
        const prior = this.requirePrior(change)

        const record = await this.createObject(change, node, values)
        const outcome = await this.provision(node, record, values)

        const deposed: StateRecord = {
            ...prior,
            address: deposedAddress(change.address, prior.id),
            lifecycle: { ...prior.lifecycle, preventDestroy: false },
            tainted: false,
        }
        await this.args.store.commit(deposed.address, deposed)

        const provider = this.args.providers.forKind(prior.kind)
        try {
            await provider.destroy(prior.kind, prior.id)
        } catch (e) {
            const error = new ProviderOperationError(change.address, 'destroy',
                `replaced object ${prior.id} could not be destroyed: ${ErrorUtils.extractErrorMessage(e)}`, ErrorUtils.toError(e))
            this.logger.error(`${error.message}, kept in state as ${deposed.address}`)
            return { ...outcome, status: 'failed', error }
        }
        await this.args.store.remove(deposed.address)

        return outcome
    }

    private async createObject(change: PlannedChange, node: GraphNode, values: Map<string, AttributeMap>): Promise<StateRecord> {
        const inputs = this.desiredAttributes(node, values)
        const provider = this.args.providers.forKind(node.kind)

        this.logger.debug(`Creating ${node.address}`, { attributes: redactSecrets(inputs, node.sensitiveAttributes) })
        const result = await this.callProvider(node.address, 'create', () => provider.create(node.kind, inputs))

        const record: StateRecord = {
            address: node.address,
            kind: node.kind,
            name: node.name,
            modulePath: node.modulePath,
            id: result.id,
            inputs,
            attributes: result.attributes,
            dependencies: change.dependencies,
            lifecycle: { createBeforeDestroy: node.lifecycle.createBeforeDestroy, preventDestroy: node.lifecycle.preventDestroy },
            tainted: false,
        }
        await this.commit(record, values)
        return record
    }

    private async destroyObject(address: string, record: StateRecord, values: Map<string, AttributeMap>): Promise<void> {
        const provider = this.args.providers.forKind(record.kind)
        this.logger.debug(`Destroying ${address} (${record.id})`)
        await this.callProvider(address, 'destroy', () => provider.destroy(record.kind, record.id))
        await this.args.store.remove(address)
        values.delete(address)
    }

    /**
     * Run the node's provisioners in order. A failing provisioner taints the node
     * unless it is declared with on_failure = continue.
     */
    private async provision(node: GraphNode, record: StateRecord, values: Map<string, AttributeMap>): Promise<OperationOutcome> {
        const reports: ProvisionerRunReport[] = []

        for (const spec of node.provisioners) {
            try {
                reports.push(await this.runProvisioner(node.address, spec, record, values))
            } catch (e) {
                if (spec.onFailure === 'continue') {
                    this.logger.warn(`Provisioner of ${node.address} failed, continuing: ${ErrorUtils.extractErrorMessage(e)}`)
                    continue
                }
                this.logger.error(`Provisioner of ${node.address} failed, marking it tainted: ${ErrorUtils.extractErrorMessage(e)}`)
                await this.commit({ ...record, tainted: true }, values)
                return { status: 'tainted', error: ErrorUtils.toError(e), provisioners: reports }
            }
        }

        return { status: 'applied', provisioners: reports }
    }

    private async runProvisioner(address: string, spec: ProvisionerSpec, record: StateRecord, values: Map<string, AttributeMap>): Promise<ProvisionerRunReport> {
        const lookup = this.committedLookup(values, record.attributes)

        const connection: AttributeMap = {}
        for (const [key, expr] of Object.entries(spec.connection)) {
            connection[key] = this.evaluateKnown(expr, lookup, address)
        }

        const { target, credentials } = resolveConnection(connection, this.args.connectTimeoutMs)
        const script = await this.loadScript(address, spec, lookup)

        return this.args.runner.run({ address, target, credentials, script })
    }

    private async loadScript(address: string, spec: ProvisionerSpec, lookup: ReferenceLookup): Promise<string> {
        if (spec.scriptPath !== undefined) {
            return fs.readFile(spec.scriptPath, 'utf-8')
        }
        if (spec.inline !== undefined) {
            const commands = this.evaluateKnown(spec.inline, lookup, address)
            if (typeof commands === 'string') {
                return commands
            }
            if (Array.isArray(commands) && commands.every((c): c is string => typeof c === 'string')) {
                return commands.join('\n')
            }
            throw new Error(`Inline commands of ${address} provisioner must be a string or a list of strings`)
        }
        throw new Error(`Provisioner of ${address} has neither script nor inline commands`)
    }

    private evaluateOutputs(plan: Plan, values: Map<string, AttributeMap>): Record<string, StateOutput> {
        const lookup = this.committedLookup(values)
        const outputs: Record<string, StateOutput> = {}

        for (const output of Object.values(plan.outputs)) {
            try {
                outputs[output.name] = { value: this.evaluateKnown(output.value, lookup, `output "${output.name}"`), sensitive: output.sensitive }
            } catch (e) {
                this.logger.warn(`Output ${output.name} not saved: ${ErrorUtils.extractErrorMessage(e)}`)
            }
        }

        return outputs
    }

    private desiredAttributes(node: GraphNode, values: Map<string, AttributeMap>): AttributeMap {
        const lookup = this.committedLookup(values)
        const result: AttributeMap = {}
        for (const [key, expr] of Object.entries(node.attributes)) {
            result[key] = this.evaluateKnown(expr, lookup, node.address)
        }
        return result
    }

    private evaluateKnown(expr: Expression, lookup: ReferenceLookup, source: string): LiteralValue {
        let value: PlannedValue
        try {
            value = evaluate(expr, lookup)
        } catch (e) {
            if (e instanceof UnresolvedAttributeError) {
                throw new UnknownReferenceError(formatReference(e.ref), source)
            }
            throw e
        }
        if (!isKnown(value)) {
            throw new Error(`Value of ${source} is still unknown at apply time`)
        }
        return value
    }

    /**
     * Resolves references against committed values only.
     */
    private committedLookup(values: Map<string, AttributeMap>, self?: AttributeMap): ReferenceLookup {
        return ref => {
            switch (ref.root.type) {
                case 'node': {
                    const attributes = values.get(ref.root.address)
                    return attributes === undefined ? undefined : walkPath(attributes, ref.path)
                }
                case 'self':
                    return self === undefined ? undefined : walkPath(self, ref.path)
                default:
                    return undefined
            }
        }
    }

    private async commit(record: StateRecord, values: Map<string, AttributeMap>): Promise<void> {
        await this.args.store.commit(record.address, record)
        values.set(record.address, record.attributes)
    }

    private async callProvider<T>(address: string, operation: ProviderOperationName, call: () => Promise<T>): Promise<T> {
        try {
            return await call()
        } catch (e) {
            throw new ProviderOperationError(address, operation, ErrorUtils.extractErrorMessage(e), ErrorUtils.toError(e))
        }
    }

    private requireNode(change: PlannedChange): GraphNode {
        if (!change.node) {
            throw new Error(`No declaration for ${change.address}, cannot ${change.action} it`)
        }
        return change.node
    }

    private requirePrior(change: PlannedChange): StateRecord {
        if (!change.prior) {
            throw new Error(`No prior state for ${change.address}, cannot ${change.action} it`)
        }
        return change.prior
    }
}
