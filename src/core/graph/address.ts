/**
 * Node identity and address formatting.
 *
 * An address is the identity rendered as text: `module.network.module.subnets.azurerm_subnet.main`
 * for a node declared two modules deep, `azurerm_resource_group.main` at root level.
 */

export interface NodeIdentity {
    kind: string
    name: string
    /** Module instance names from the root down, empty for root-level nodes */
    modulePath: string[]
}

export function formatModulePath(modulePath: string[]): string {
    return modulePath.map(m => `module.${m}`).join('.')
}

export function formatAddress(identity: NodeIdentity): string {
    const prefix = formatModulePath(identity.modulePath)
    const local = `${identity.kind}.${identity.name}`
    return prefix ? `${prefix}.${local}` : local
}

/**
 * State address of an object replaced with create_before_destroy that could not be destroyed.
 * It matches no declared node, so the next plan destroys it as an orphan.
 */
export function deposedAddress(address: string, id: string): string {
    return `${address} (deposed ${id})`
}

/**
 * Human-readable label of a module instance, used in error messages
 */
export function moduleLabel(modulePath: string[]): string {
    return modulePath.length === 0 ? 'root module' : formatModulePath(modulePath)
}

/**
 * Parse an address back into its identity. Throws on malformed addresses.
 */
export function parseAddress(address: string): NodeIdentity {
    const segments = address.split('.')
    const modulePath: string[] = []
    let i = 0
    while (segments[i] === 'module' && segments.length - i > 2) {
        modulePath.push(segments[i + 1])
        i += 2
    }
    const rest = segments.slice(i)
    if (rest.length !== 2 || rest.some(s => s.length === 0)) {
        throw new Error(`Invalid node address: ${address}`)
    }
    return { kind: rest[0], name: rest[1], modulePath }
}
