import { z } from "zod"
import { LiteralValueSchema } from "../declaration/schema"
import { STATE_FILE_FORMAT_VERSION } from "../const"

export const StateRecordSchema = z.object({
    address: z.string().describe("Node address, e.g. module.network.azurerm_subnet.main"),
    kind: z.string(),
    name: z.string(),
    modulePath: z.array(z.string()),
    id: z.string().describe("Provider-assigned identifier"),
    inputs: z.record(LiteralValueSchema).describe("Attributes sent to the provider on last create or update"),
    attributes: z.record(LiteralValueSchema).describe("Attributes observed from the provider after last successful operation"),
    dependencies: z.array(z.string()).describe("Addresses this node depended on when last applied, used to order destroys"),
    lifecycle: z.object({
        createBeforeDestroy: z.boolean(),
        preventDestroy: z.boolean(),
    }),
    tainted: z.boolean().describe("Forces replacement on next apply, set when a provisioner failed"),
}).strict()

export const StateOutputSchema = z.object({
    value: LiteralValueSchema,
    sensitive: z.boolean(),
}).strict()

export const StateFileSchema = z.object({
    version: z.literal(STATE_FILE_FORMAT_VERSION),
    serial: z.number().int().min(0).describe("Incremented on every write"),
    lineage: z.string().describe("Random identifier set when the state is first created"),
    records: z.record(StateRecordSchema),
    outputs: z.record(StateOutputSchema),
}).strict()

export type StateRecord = z.infer<typeof StateRecordSchema>
export type StateOutput = z.infer<typeof StateOutputSchema>
export type StateSnapshot = z.infer<typeof StateFileSchema>

export function emptyState(lineage: string): StateSnapshot {
    return {
        version: STATE_FILE_FORMAT_VERSION,
        serial: 0,
        lineage,
        records: {},
        outputs: {},
    }
}
