import * as path from 'path'
import lodash from 'lodash'
import { Command, InvalidArgumentError } from '@commander-js/extra-typings'
import { applySucceeded } from "../core/apply/executor"
import { ConfigLoader } from "../core/config"
import { GRAPHFORM_VERSION } from "../core/const"
import { LocalModuleLoader } from "../core/declaration/loader"
import { GraphformEngine } from "../core/engine"
import { LiteralValue } from "../core/graph/expression"
import { hasChanges, Plan } from "../core/plan/plan"
import { ProviderRegistry } from "../core/provider"
import { RemoteExecutor } from "../core/provisioner/remote"
import { LocalStateStore } from "../core/state/store"
import { setLogLevel } from "../log/utils"
import { builtinProviders } from "../providers"
import { formatOutputs, formatPlan, formatRecord, formatReport, SENSITIVE_PLACEHOLDER } from "./format"
import { Confirmer, promptConfirmation } from "./prompter"
import { loadVariableFile, parseVariableAssignments } from "./variables"

export interface ProgramArgs {
    /** Where command output goes, console by default */
    print?: (line: string) => void
    confirm?: Confirmer
    remoteExecutor?: RemoteExecutor
    env?: NodeJS.ProcessEnv
}

interface CommandContext {
    dir: string
    engine: GraphformEngine
    loader: LocalModuleLoader
    variables: () => Promise<Record<string, LiteralValue>>
}

const NO_VARIABLES: string[] = []

export function parsePositiveInt(value: string): number {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.')
    }
    return parsed
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value]
}

export function buildProgram(args: ProgramArgs = {}) {
    const print = args.print ?? ((line: string) => console.info(line))
    const confirm = args.confirm ?? promptConfirmation

    const program = new Command('graphform')
        .description('Plan and apply declarative infrastructure')
        .version(GRAPHFORM_VERSION)
        .option('-d, --dir <dir>', 'Directory of the root module', '.')
        .option('--var <name=value>', 'Set a root module variable, may be repeated', collect, NO_VARIABLES)
        .option('--var-file <file>', 'JSON file of root module variables')
        .option('--state <file>', 'State file, relative to the root module directory')
        .option('--parallelism <n>', 'Maximum number of operations run at once', parsePositiveInt)
        .option('--no-refresh', 'Do not read recorded resources from their provider before planning')
        .option('--verbose', 'Enable debug logs')

    const context = (): CommandContext => {
        const opts = program.opts()
        if (opts.verbose) {
            setLogLevel('debug')
        }

        const dir = path.resolve(opts.dir)
        const config = new ConfigLoader(args.env).load({
            stateFile: opts.state,
            parallelism: opts.parallelism,
            refresh: opts.refresh ? undefined : false,
        })

        const loader = new LocalModuleLoader()
        const engine = new GraphformEngine({
            config,
            providers: new ProviderRegistry(builtinProviders(dir)),
            store: new LocalStateStore(path.resolve(dir, config.stateFile)),
            loader,
            remoteExecutor: args.remoteExecutor,
        })

        const variables = async (): Promise<Record<string, LiteralValue>> => ({
            ...(opts.varFile ? await loadVariableFile(path.resolve(opts.varFile)) : {}),
            ...parseVariableAssignments(opts.var),
        })

        return { dir, engine, loader, variables }
    }

    const printAll = (lines: string[]) => {
        for (const line of lines) {
            print(line)
        }
    }

    const execute = async (engine: GraphformEngine, plan: Plan, autoApprove: boolean) => {
        printAll(formatPlan(plan))

        if (hasChanges(plan) && !autoApprove) {
            const question = plan.mode === 'destroy' ? 'Destroy all recorded resources?' : 'Apply these changes?'
            if (!await confirm(question)) {
                print('Cancelled.')
                return
            }
        }

        const controller = new AbortController()
        const onInterrupt = () => {
            print('Interrupted, waiting for running operations to finish...')
            controller.abort()
        }
        process.once('SIGINT', onInterrupt)

        try {
            const report = await engine.apply(plan, {
                signal: controller.signal,
                onEvent: event => {
                    if (event.type === 'started') {
                        print(`${event.address}: ${event.action}...`)
                    }
                },
            })

            printAll(['', ...formatReport(report)])
            if (Object.keys(report.outputs).length > 0) {
                printAll(['', 'Outputs:', ...formatOutputs(report.outputs)])
            }

            if (!applySucceeded(report)) {
                throw new Error(report.cancelled ? 'Apply interrupted' : 'Apply finished with errors')
            }
        } finally {
            process.removeListener('SIGINT', onInterrupt)
        }
    }

    program.command('plan')
        .description('Show the changes needed to reach the declared configuration')
        .action(async () => {
            const { dir, engine, loader, variables } = context()
            const plan = await engine.plan(await loader.loadDirectory(dir), await variables())
            printAll(formatPlan(plan))
        })

    program.command('apply')
        .description('Create, update or replace resources to match the declared configuration')
        .option('--auto-approve', 'Do not prompt for approval')
        .action(async (opts) => {
            const { dir, engine, loader, variables } = context()
            const plan = await engine.plan(await loader.loadDirectory(dir), await variables())
            await execute(engine, plan, opts.autoApprove === true)
        })

    program.command('destroy')
        .description('Destroy every recorded resource')
        .option('--auto-approve', 'Do not prompt for approval')
        .action(async (opts) => {
            const { engine } = context()
            await execute(engine, await engine.planDestroy(), opts.autoApprove === true)
        })

    program.command('output')
        .description('Show root module outputs recorded by the last apply')
        .argument('[name]', 'Single output to show, sensitive values included')
        .option('--json', 'Print JSON')
        .action(async (name, opts) => {
            const { engine } = context()

            if (name !== undefined) {
                const output = await engine.output(name)
                print(typeof output.value === 'string' && !opts.json ? output.value : JSON.stringify(output.value))
                return
            }

            const outputs = await engine.outputs()
            if (opts.json) {
                print(JSON.stringify(lodash.mapValues(outputs, o => o.sensitive ? { ...o, value: SENSITIVE_PLACEHOLDER } : o), undefined, 2))
            } else {
                printAll(formatOutputs(outputs))
            }
        })

    const state = program.command('state')
        .description('Inspect recorded state')

    state.command('list')
        .description('List recorded resources')
        .action(async () => {
            const { engine } = context()
            for (const record of await engine.listState()) {
                print(`${record.address}${record.tainted ? ' (tainted)' : ''}`)
            }
        })

    state.command('show')
        .description('Show attributes of a recorded resource')
        .argument('<address>', 'Resource address, e.g. module.web.null_resource.setup')
        .action(async (address) => {
            const { engine } = context()
            printAll(formatRecord(await engine.showState(address)))
        })

    program.command('taint')
        .description('Mark a resource for replacement on next apply')
        .argument('<address>', 'Resource address')
        .action(async (address) => {
            const { engine } = context()
            await engine.taint(address)
            print(`${address} will be replaced on next apply`)
        })

    program.command('untaint')
        .description('Clear the replacement mark of a resource')
        .argument('<address>', 'Resource address')
        .action(async (address) => {
            const { engine } = context()
            await engine.untaint(address)
            print(`${address} is no longer marked for replacement`)
        })

    return program
}
