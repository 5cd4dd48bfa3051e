import * as fs from 'fs/promises'
import * as path from 'path'
import { randomUUID } from 'crypto'
import lodash from 'lodash'
import { getLogger } from "../../log/utils"
import { ErrorUtils } from "../../tools/error-utils"
import { CorruptStateError } from "../errors/errors"
import { emptyState, StateFileSchema, StateOutput, StateRecord, StateSnapshot } from "./state"

/**
 * Durable record of the last known attributes of every applied node.
 *
 * The store is the only mutable resource shared by concurrently applied nodes: writes are
 * serialized and each one replaces the whole persisted snapshot at once.
 */
export interface StateStore {

    /**
     * Read persisted state. Must be called before any other operation.
     */
    load(): Promise<StateSnapshot>

    /**
     * Copy of the latest committed snapshot
     */
    snapshot(): StateSnapshot

    commit(address: string, record: StateRecord): Promise<void>

    remove(address: string): Promise<void>

    setOutputs(outputs: Record<string, StateOutput>): Promise<void>
}

type StateMutation = (state: StateSnapshot) => void

/**
 * Shared write serialization of StateStore implementations. Subclasses only persist.
 */
export abstract class AbstractStateStore implements StateStore {

    protected current: StateSnapshot = emptyState(randomUUID())
    private writeChain: Promise<void> = Promise.resolve()

    abstract load(): Promise<StateSnapshot>

    /**
     * Persist `next` as a whole. `current` only changes once this resolved.
     */
    protected abstract persist(next: StateSnapshot): Promise<void>

    snapshot(): StateSnapshot {
        return lodash.cloneDeep(this.current)
    }

    commit(address: string, record: StateRecord): Promise<void> {
        return this.enqueue(state => {
            state.records[address] = lodash.cloneDeep(record)
        })
    }

    remove(address: string): Promise<void> {
        return this.enqueue(state => {
            delete state.records[address]
        })
    }

    setOutputs(outputs: Record<string, StateOutput>): Promise<void> {
        return this.enqueue(state => {
            state.outputs = lodash.cloneDeep(outputs)
        })
    }

    private enqueue(mutation: StateMutation): Promise<void> {
        const write = this.writeChain.then(async () => {
            const next = lodash.cloneDeep(this.current)
            mutation(next)
            next.serial = this.current.serial + 1
            await this.persist(next)
            this.current = next
        })
        // the caller gets the failure through `write`; the chain itself must keep going
        this.writeChain = write.catch(() => undefined)
        return write
    }
}

/**
 * State persisted as a JSON file. Each write goes to a temporary file in the same directory
 * which then atomically replaces the state file, so readers never see a partial file.
 */
export class LocalStateStore extends AbstractStateStore {

    private readonly logger = getLogger(LocalStateStore.name)
    private tmpCounter = 0

    constructor(readonly filePath: string) {
        super()
    }

    async load(): Promise<StateSnapshot> {
        let content: string
        try {
            content = await fs.readFile(this.filePath, 'utf-8')
        } catch (e) {
            if (ErrorUtils.errorCode(e) === 'ENOENT') {
                this.logger.debug(`No state file at ${this.filePath}, starting from empty state`)
                this.current = emptyState(randomUUID())
                return this.snapshot()
            }
            throw new CorruptStateError(this.filePath, ErrorUtils.extractErrorMessage(e), ErrorUtils.toError(e))
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (e) {
            throw new CorruptStateError(this.filePath, `invalid JSON: ${ErrorUtils.extractErrorMessage(e)}`, ErrorUtils.toError(e))
        }

        const result = StateFileSchema.safeParse(raw)
        if (!result.success) {
            const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
            throw new CorruptStateError(this.filePath, details, result.error)
        }

        this.current = result.data
        this.logger.debug(`Loaded state ${this.filePath} serial ${result.data.serial} with ${Object.keys(result.data.records).length} record(s)`)
        return this.snapshot()
    }

    protected async persist(next: StateSnapshot): Promise<void> {
        const dir = path.dirname(this.filePath)
        const tmpFile = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.${this.tmpCounter++}.tmp`)

        await fs.mkdir(dir, { recursive: true })
        try {
            await fs.writeFile(tmpFile, JSON.stringify(next, undefined, 2) + '\n', 'utf-8')
            await fs.rename(tmpFile, this.filePath)
        } catch (e) {
            await fs.rm(tmpFile, { force: true })
            throw e
        }

        this.logger.trace(`Wrote state serial ${next.serial} to ${this.filePath}`)
    }
}
