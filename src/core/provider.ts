import { ProviderNotFoundError } from "./errors/errors"
import { AttributeMap } from "./graph/expression"

export interface ProviderResult {
    /** Provider-assigned identifier used for later read, update and destroy calls */
    id: string
    /** Attributes observed after the operation, inputs and computed values alike */
    attributes: AttributeMap
}

/**
 * Implementation of a family of resource kinds (e.g. every `azurerm_*` kind).
 * The engine treats resource kinds as opaque: it only knows their attributes.
 */
export interface ResourceProvider {
    /** Kind prefix handled by this provider, e.g. `azurerm` for `azurerm_virtual_network` */
    readonly name: string

    create(kind: string, attributes: AttributeMap): Promise<ProviderResult>

    /**
     * @returns current attributes, or undefined if the resource no longer exists
     */
    read(kind: string, id: string): Promise<AttributeMap | undefined>

    update(kind: string, id: string, attributes: AttributeMap): Promise<ProviderResult>

    destroy(kind: string, id: string): Promise<void>

    /**
     * Whether a change of `attribute` can only be applied by destroying and re-creating the resource.
     * Defaults to false (update in place) when not implemented.
     */
    requiresReplacement?(kind: string, attribute: string): boolean
}

/**
 * Provider name of a resource kind: everything before the first underscore.
 */
export function providerNameOf(kind: string): string {
    const idx = kind.indexOf('_')
    return idx > 0 ? kind.slice(0, idx) : kind
}

export class ProviderRegistry {

    private readonly providers = new Map<string, ResourceProvider>()

    constructor(providers: ResourceProvider[] = []) {
        for (const provider of providers) {
            this.register(provider)
        }
    }

    register(provider: ResourceProvider): this {
        this.providers.set(provider.name, provider)
        return this
    }

    has(kind: string): boolean {
        return this.providers.has(providerNameOf(kind))
    }

    forKind(kind: string): ResourceProvider {
        const provider = this.providers.get(providerNameOf(kind))
        if (!provider) {
            throw new ProviderNotFoundError(kind)
        }
        return provider
    }

    requiresReplacement(kind: string, attribute: string): boolean {
        return this.forKind(kind).requiresReplacement?.(kind, attribute) ?? false
    }

    names(): string[] {
        return Array.from(this.providers.keys())
    }
}
