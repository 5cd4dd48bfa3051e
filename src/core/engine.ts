import { getLogger } from "../log/utils"
import { ApplyExecutor, ApplyOptions, ApplyReport } from "./apply/executor"
import { EngineConfig } from "./config/interface"
import { ModuleSourceLoader } from "./declaration/loader"
import { ModuleDeclaration } from "./declaration/parser"
import { StateRecordNotFoundError, UnknownOutputError } from "./errors/errors"
import { LiteralValue } from "./graph/expression"
import { AttributeGraph } from "./graph/graph"
import { DependencyResolver, ResolvedGraph } from "./graph/resolver"
import { ExpandedOutput, ModuleExpander } from "./module/expander"
import { Plan } from "./plan/plan"
import { Planner } from "./plan/planner"
import { ProviderRegistry } from "./provider"
import { RemoteExecutor } from "./provisioner/remote"
import { ProvisionerState, RemoteProvisionerRunner } from "./provisioner/runner"
import { SshRemoteExecutor } from "./provisioner/ssh"
import { StateOutput, StateRecord, StateSnapshot } from "./state/state"
import { StateStore } from "./state/store"

export interface EngineArgs {
    config: EngineConfig
    providers: ProviderRegistry
    store: StateStore
    loader: ModuleSourceLoader
    /** Defaults to the system ssh client */
    remoteExecutor?: RemoteExecutor
    /** Wait between provisioner connection attempts */
    sleep?: (ms: number) => Promise<void>
    onProvisionerTransition?: (address: string, state: ProvisionerState) => void
}

export interface PreparedConfiguration {
    resolved: ResolvedGraph
    outputs: Record<string, ExpandedOutput>
}

/**
 * Entry point tying declarations, state and providers together: expand, resolve, plan and apply.
 */
export class GraphformEngine {

    private readonly logger = getLogger(GraphformEngine.name)
    private readonly store: StateStore
    private readonly expander: ModuleExpander
    private readonly resolver = new DependencyResolver()
    private readonly planner: Planner
    private readonly executor: ApplyExecutor
    private stateLoaded = false

    constructor(args: EngineArgs) {
        const config = args.config
        this.store = args.store
        this.expander = new ModuleExpander({ loader: args.loader, depthLimit: config.moduleDepthLimit })
        this.planner = new Planner({ providers: args.providers, refresh: config.refresh })
        this.executor = new ApplyExecutor({
            providers: args.providers,
            store: args.store,
            parallelism: config.parallelism,
            connectTimeoutMs: config.provisioner.connectTimeoutMs,
            runner: new RemoteProvisionerRunner({
                executor: args.remoteExecutor ?? new SshRemoteExecutor(),
                maxAttempts: config.provisioner.maxAttempts,
                baseDelayMs: config.provisioner.baseDelayMs,
                maxDelayMs: config.provisioner.maxDelayMs,
                sleep: args.sleep,
                onTransition: args.onProvisionerTransition,
            }),
        })
    }

    /**
     * Expand modules and resolve the dependency graph. No state or provider access.
     */
    async prepare(root: ModuleDeclaration, variables: Record<string, LiteralValue>): Promise<PreparedConfiguration> {
        const expanded = await this.expander.expand(root, variables)

        const graph = AttributeGraph.fromDeclarations(expanded.nodes)
        for (const output of Object.values(expanded.outputs)) {
            graph.checkExpression(`output "${output.name}"`, output.value)
        }

        const resolved = this.resolver.resolve(graph)
        this.logger.debug(`Resolved ${graph.size} node(s)`, { order: resolved.order })

        return { resolved, outputs: expanded.outputs }
    }

    async plan(root: ModuleDeclaration, variables: Record<string, LiteralValue>): Promise<Plan> {
        const configuration = await this.prepare(root, variables)
        const prior = await this.state()
        return this.planner.plan({ ...configuration, prior })
    }

    async planDestroy(): Promise<Plan> {
        return this.planner.planDestroy(await this.state())
    }

    async apply(plan: Plan, options?: ApplyOptions): Promise<ApplyReport> {
        await this.state()
        return this.executor.apply(plan, options)
    }

    async outputs(): Promise<Record<string, StateOutput>> {
        return (await this.state()).outputs
    }

    async output(name: string): Promise<StateOutput> {
        const outputs = await this.outputs()
        const output: StateOutput | undefined = outputs[name]
        if (!output) {
            throw new UnknownOutputError(name, 'root module')
        }
        return output
    }

    async listState(): Promise<StateRecord[]> {
        return Object.values((await this.state()).records)
    }

    async showState(address: string): Promise<StateRecord> {
        const record: StateRecord | undefined = (await this.state()).records[address]
        if (!record) {
            throw new StateRecordNotFoundError(address)
        }
        return record
    }

    /**
     * Force replacement of a node on next apply.
     */
    async taint(address: string): Promise<void> {
        await this.setTainted(address, true)
    }

    async untaint(address: string): Promise<void> {
        await this.setTainted(address, false)
    }

    private async setTainted(address: string, tainted: boolean): Promise<void> {
        const record = await this.showState(address)
        await this.store.commit(address, { ...record, tainted })
        this.logger.info(`${address} ${tainted ? 'tainted' : 'untainted'}`)
    }

    private async state(): Promise<StateSnapshot> {
        if (!this.stateLoaded) {
            await this.store.load()
            this.stateLoaded = true
        }
        return this.store.snapshot()
    }
}
