import { randomUUID } from 'crypto'
import { z } from "zod"
import { AttributeMap } from "../../core/graph/expression"
import { LiteralValueSchema } from "../../core/declaration/schema"
import { ProviderResult, ResourceProvider } from "../../core/provider"

export const NULL_PROVIDER_NAME = "null"
export const NULL_RESOURCE_KIND = "null_resource"

export const NullResourceAttributesSchema = z.object({
    triggers: z.record(LiteralValueSchema).optional().describe("Any change re-creates the resource"),
}).strict()

/**
 * Resources existing only in state, typically used to hang provisioners on.
 */
export class NullProvider implements ResourceProvider {

    readonly name = NULL_PROVIDER_NAME

    async create(kind: string, attributes: AttributeMap): Promise<ProviderResult> {
        this.parse(kind, attributes)
        const id = randomUUID()
        return { id, attributes: { ...attributes, id } }
    }

    async read(kind: string, id: string): Promise<AttributeMap | undefined> {
        this.checkKind(kind)
        return { id }
    }

    async update(kind: string, id: string, attributes: AttributeMap): Promise<ProviderResult> {
        this.parse(kind, attributes)
        return { id, attributes: { ...attributes, id } }
    }

    async destroy(kind: string): Promise<void> {
        this.checkKind(kind)
    }

    requiresReplacement(kind: string, attribute: string): boolean {
        return attribute === 'triggers'
    }

    private parse(kind: string, attributes: AttributeMap): void {
        this.checkKind(kind)
        const result = NullResourceAttributesSchema.safeParse(attributes)
        if (!result.success) {
            throw new Error(`Invalid ${kind} attributes: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
        }
    }

    private checkKind(kind: string): void {
        if (kind !== NULL_RESOURCE_KIND) {
            throw new Error(`Resource kind ${kind} is not supported by provider ${this.name}`)
        }
    }
}
