import { z } from "zod"
import { LiteralValue } from "../graph/expression"

export const LiteralValueSchema: z.ZodType<LiteralValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(LiteralValueSchema),
    z.record(LiteralValueSchema),
]))

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/

const NameSchema = z.string().regex(NAME_PATTERN, "Must start with a letter or underscore and contain only letters, digits, '_' and '-'")

export const VariableSchema = z.object({
    default: LiteralValueSchema.optional().describe("Value used when the caller does not set the variable. No default means required."),
    description: z.string().optional(),
    sensitive: z.boolean().default(false),
}).strict()

export const LifecycleSchema = z.object({
    create_before_destroy: z.boolean().default(false),
    prevent_destroy: z.boolean().default(false),
    ignore_changes: z.array(z.string()).default([]),
}).strict()

export const ConnectionSchema = z.object({
    type: z.literal("ssh").default("ssh"),
    host: LiteralValueSchema,
    port: LiteralValueSchema.optional(),
    user: LiteralValueSchema,
    password: LiteralValueSchema.optional(),
    private_key: LiteralValueSchema.optional(),
    timeout: LiteralValueSchema.optional().describe("Connection timeout in seconds"),
}).strict()

export const ProvisionerSchema = z.object({
    type: z.literal("remote-exec"),
    script: z.string().optional().describe("Script path, relative to the module directory"),
    inline: LiteralValueSchema.optional().describe("List of commands run in sequence"),
    connection: ConnectionSchema,
    on_failure: z.enum(["fail", "continue"]).default("fail"),
}).strict().refine(
    p => (p.script === undefined) !== (p.inline === undefined),
    { message: "Exactly one of script or inline must be set" }
)

export const ResourceSchema = z.object({
    kind: NameSchema.describe("Resource kind, prefixed by its provider name, e.g. azurerm_virtual_network"),
    name: NameSchema,
    attributes: z.record(LiteralValueSchema).default({}),
    depends_on: z.array(z.string()).default([]),
    lifecycle: LifecycleSchema.optional(),
    provisioners: z.array(ProvisionerSchema).default([]),
}).strict()

export const ModuleCallSchema = z.object({
    name: NameSchema,
    source: z.string().min(1).describe("Relative path of the module directory"),
    inputs: z.record(LiteralValueSchema).default({}),
    depends_on: z.array(z.string()).default([]),
}).strict()

export const OutputSchema = z.object({
    value: LiteralValueSchema,
    description: z.string().optional(),
    sensitive: z.boolean().default(false),
}).strict()

export const ModuleFileSchema = z.object({
    variables: z.record(VariableSchema).default({}),
    resources: z.array(ResourceSchema).default([]),
    modules: z.array(ModuleCallSchema).default([]),
    outputs: z.record(OutputSchema).default({}),
}).strict()

export type RawModuleFile = z.input<typeof ModuleFileSchema>
export type ModuleFile = z.infer<typeof ModuleFileSchema>
export type RawResource = z.infer<typeof ResourceSchema>
export type RawProvisioner = z.infer<typeof ProvisionerSchema>
