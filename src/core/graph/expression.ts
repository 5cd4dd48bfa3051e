/**
 * Attribute value model.
 *
 * Declared attribute values are parsed once into an `Expression` tree: literals, references to other
 * nodes' attributes and string templates mixing both. References are resolved in a dedicated pass
 * (plan or apply), never lazily by providers.
 */

/** JSON-compatible value, as stored in state and sent to providers */
export type LiteralValue = string | number | boolean | null | LiteralValue[] | { [key: string]: LiteralValue }

export type AttributeMap = Record<string, LiteralValue>

/**
 * Where a reference points to. `resource`, `var` and `module` roots only exist inside a module body
 * before expansion; after expansion every reference is rooted on a fully-qualified `node` address
 * (or `self` inside provisioner connections).
 */
export type ReferenceRoot =
    | { type: 'resource', kind: string, name: string }
    | { type: 'var', name: string }
    | { type: 'module', name: string, output: string }
    | { type: 'self' }
    | { type: 'node', address: string }

export interface Reference {
    root: ReferenceRoot
    /** Attribute path below the root, e.g. ['ip_configuration', '0', 'private_ip'] */
    path: string[]
}

export type Expression =
    | { type: 'literal', value: LiteralValue }
    | { type: 'reference', ref: Reference }
    | { type: 'template', parts: Array<string | Expression> }
    | { type: 'list', items: Expression[] }
    | { type: 'map', entries: Record<string, Expression> }

/**
 * Placeholder for a value only known once a dependency has been applied.
 */
export class UnknownValue {
    toString(): string {
        return '(known after apply)'
    }

    toJSON(): string {
        return this.toString()
    }
}

export const UNKNOWN = new UnknownValue()

/** Value as seen at plan time, possibly containing unknown parts */
export type PlannedValue = string | number | boolean | null | UnknownValue | PlannedValue[] | { [key: string]: PlannedValue }

export type PlannedAttributeMap = Record<string, PlannedValue>

export class ExpressionSyntaxError extends Error {
    constructor(readonly expression: string, reason: string) {
        super(`Invalid expression "\${${expression}}": ${reason}`)
        this.name = 'ExpressionSyntaxError'
    }
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/
const PATH_SEGMENT = /^[A-Za-z0-9_-]+$/

/**
 * Parse the inside of a `${...}` interpolation into a reference.
 *
 * Supported forms: `var.NAME`, `module.NAME.OUTPUT`, `self.ATTR`, `KIND.NAME` followed by an optional
 * attribute path. `a[0]` is accepted as an alias of `a.0`.
 */
export function parseReference(text: string): Reference {
    const normalized = text.trim().replace(/\[(\d+)\]/g, '.$1')
    const segments = normalized.split('.')

    if (segments.some(s => s.length === 0)) {
        throw new ExpressionSyntaxError(text, 'empty segment')
    }

    const [head, ...rest] = segments

    if (!IDENTIFIER.test(head)) {
        throw new ExpressionSyntaxError(text, `"${head}" is not a valid identifier`)
    }

    const invalid = rest.find(s => !PATH_SEGMENT.test(s))
    if (invalid !== undefined) {
        throw new ExpressionSyntaxError(text, `"${invalid}" is not a valid attribute name`)
    }

    switch (head) {
        case 'var':
            if (rest.length < 1) {
                throw new ExpressionSyntaxError(text, 'expected var.NAME')
            }
            return { root: { type: 'var', name: rest[0] }, path: rest.slice(1) }
        case 'module':
            if (rest.length < 2) {
                throw new ExpressionSyntaxError(text, 'expected module.NAME.OUTPUT')
            }
            return { root: { type: 'module', name: rest[0], output: rest[1] }, path: rest.slice(2) }
        case 'self':
            if (rest.length < 1) {
                throw new ExpressionSyntaxError(text, 'expected self.ATTRIBUTE')
            }
            return { root: { type: 'self' }, path: rest }
        default:
            if (rest.length < 1) {
                throw new ExpressionSyntaxError(text, 'expected KIND.NAME')
            }
            return { root: { type: 'resource', kind: head, name: rest[0] }, path: rest.slice(1) }
    }
}

/**
 * Parse a string which may contain `${...}` interpolations. `$${` is an escaped literal `${`.
 */
export function parseString(raw: string): Expression {
    const parts: Array<string | Expression> = []
    let buffer = ''
    let i = 0

    while (i < raw.length) {
        if (raw.startsWith('$${', i)) {
            buffer += '${'
            i += 3
            continue
        }
        if (raw.startsWith('${', i)) {
            const end = raw.indexOf('}', i + 2)
            if (end < 0) {
                throw new ExpressionSyntaxError(raw.slice(i + 2), 'missing closing brace')
            }
            if (buffer.length > 0) {
                parts.push(buffer)
                buffer = ''
            }
            parts.push({ type: 'reference', ref: parseReference(raw.slice(i + 2, end)) })
            i = end + 1
            continue
        }
        buffer += raw[i]
        i++
    }

    if (buffer.length > 0) {
        parts.push(buffer)
    }

    if (parts.length === 0) {
        return { type: 'literal', value: '' }
    }
    if (parts.length === 1) {
        const only = parts[0]
        // A lone interpolation keeps the referenced value's type
        return typeof only === 'string' ? { type: 'literal', value: only } : only
    }
    return { type: 'template', parts }
}

/**
 * Parse a raw declared value (JSON) into an expression. Lists and maps without any reference
 * collapse back into a single literal.
 */
export function parseValue(raw: LiteralValue): Expression {
    if (typeof raw === 'string') {
        return parseString(raw)
    }
    if (Array.isArray(raw)) {
        const items = raw.map(parseValue)
        if (items.every(isLiteralExpression)) {
            return { type: 'literal', value: items.map(i => i.value) }
        }
        return { type: 'list', items }
    }
    if (raw !== null && typeof raw === 'object') {
        const entries: Record<string, Expression> = {}
        let allLiteral = true
        for (const [key, value] of Object.entries(raw)) {
            entries[key] = parseValue(value)
            allLiteral = allLiteral && isLiteralExpression(entries[key])
        }
        if (allLiteral) {
            const value: Record<string, LiteralValue> = {}
            for (const [key, entry] of Object.entries(entries)) {
                if (isLiteralExpression(entry)) {
                    value[key] = entry.value
                }
            }
            return { type: 'literal', value }
        }
        return { type: 'map', entries }
    }
    return { type: 'literal', value: raw }
}

export function parseAttributes(raw: Record<string, LiteralValue>): Record<string, Expression> {
    const result: Record<string, Expression> = {}
    for (const [key, value] of Object.entries(raw)) {
        result[key] = parseValue(value)
    }
    return result
}

export function isLiteralExpression(expr: Expression): expr is { type: 'literal', value: LiteralValue } {
    return expr.type === 'literal'
}

/**
 * All references contained in an expression, in reading order.
 */
export function collectReferences(expr: Expression): Reference[] {
    switch (expr.type) {
        case 'literal':
            return []
        case 'reference':
            return [expr.ref]
        case 'template':
            return expr.parts.flatMap(p => typeof p === 'string' ? [] : collectReferences(p))
        case 'list':
            return expr.items.flatMap(collectReferences)
        case 'map':
            return Object.values(expr.entries).flatMap(collectReferences)
    }
}

/**
 * Rebuild an expression with every reference replaced by the expression returned from `replace`.
 */
export function mapReferences(expr: Expression, replace: (ref: Reference) => Expression): Expression {
    switch (expr.type) {
        case 'literal':
            return expr
        case 'reference':
            return replace(expr.ref)
        case 'template':
            return {
                type: 'template',
                parts: expr.parts.map(p => typeof p === 'string' ? p : mapReferences(p, replace))
            }
        case 'list':
            return { type: 'list', items: expr.items.map(i => mapReferences(i, replace)) }
        case 'map': {
            const entries: Record<string, Expression> = {}
            for (const [key, entry] of Object.entries(expr.entries)) {
                entries[key] = mapReferences(entry, replace)
            }
            return { type: 'map', entries }
        }
    }
}

/**
 * Select an attribute path inside an expression without evaluating it.
 * Returns undefined when the path statically does not exist.
 */
export function selectPath(expr: Expression, path: string[]): Expression | undefined {
    if (path.length === 0) {
        return expr
    }
    const [head, ...rest] = path
    switch (expr.type) {
        case 'reference':
            return { type: 'reference', ref: { root: expr.ref.root, path: [...expr.ref.path, ...path] } }
        case 'literal': {
            const selected = walkPath(expr.value, path)
            return selected === undefined || selected instanceof UnknownValue
                ? undefined
                : { type: 'literal', value: toLiteral(selected) }
        }
        case 'list': {
            const item = expr.items[Number(head)]
            return item === undefined ? undefined : selectPath(item, rest)
        }
        case 'map': {
            if (!Object.prototype.hasOwnProperty.call(expr.entries, head)) {
                return undefined
            }
            return selectPath(expr.entries[head], rest)
        }
        case 'template':
            return undefined
    }
}

/**
 * Walk an attribute path inside a value. Walking into an unknown value yields unknown.
 */
export function walkPath(value: PlannedValue, path: string[]): PlannedValue | undefined {
    let current: PlannedValue | undefined = value
    for (const segment of path) {
        if (current instanceof UnknownValue) {
            return current
        }
        if (Array.isArray(current)) {
            current = current[Number(segment)]
        } else if (current !== null && typeof current === 'object'
            && Object.prototype.hasOwnProperty.call(current, segment)) {
            current = current[segment]
        } else {
            return undefined
        }
        if (current === undefined) {
            return undefined
        }
    }
    return current
}

export function isKnown(value: PlannedValue): value is LiteralValue {
    if (value instanceof UnknownValue) {
        return false
    }
    if (Array.isArray(value)) {
        return value.every(isKnown)
    }
    if (value !== null && typeof value === 'object') {
        return Object.values(value).every(isKnown)
    }
    return true
}

function toLiteral(value: PlannedValue): LiteralValue {
    if (!isKnown(value)) {
        throw new Error('Value is not fully known')
    }
    return value
}

function stringify(value: PlannedValue): string {
    if (value === null) {
        return ''
    }
    if (typeof value === 'string') {
        return value
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value)
    }
    return JSON.stringify(value)
}

/**
 * Looks up the current value of a reference. Returns undefined when the referenced attribute
 * does not exist.
 */
export type ReferenceLookup = (ref: Reference) => PlannedValue | undefined

export class UnresolvedAttributeError extends Error {
    constructor(readonly ref: Reference) {
        super(`Reference ${formatReference(ref)} does not resolve to any attribute`)
        this.name = 'UnresolvedAttributeError'
    }
}

/**
 * Evaluate an expression. Any template containing an unknown part becomes unknown as a whole.
 */
export function evaluate(expr: Expression, lookup: ReferenceLookup): PlannedValue {
    switch (expr.type) {
        case 'literal':
            return expr.value
        case 'reference': {
            const value = lookup(expr.ref)
            if (value === undefined) {
                throw new UnresolvedAttributeError(expr.ref)
            }
            return value
        }
        case 'template': {
            let result = ''
            for (const part of expr.parts) {
                if (typeof part === 'string') {
                    result += part
                    continue
                }
                const value = evaluate(part, lookup)
                if (!isKnown(value)) {
                    return UNKNOWN
                }
                result += stringify(value)
            }
            return result
        }
        case 'list':
            return expr.items.map(i => evaluate(i, lookup))
        case 'map': {
            const result: Record<string, PlannedValue> = {}
            for (const [key, entry] of Object.entries(expr.entries)) {
                result[key] = evaluate(entry, lookup)
            }
            return result
        }
    }
}

export function evaluateAttributes(attributes: Record<string, Expression>, lookup: ReferenceLookup): PlannedAttributeMap {
    const result: PlannedAttributeMap = {}
    for (const [key, expr] of Object.entries(attributes)) {
        result[key] = evaluate(expr, lookup)
    }
    return result
}

export function formatReference(ref: Reference): string {
    const root = ref.root
    let head: string
    switch (root.type) {
        case 'resource':
            head = `${root.kind}.${root.name}`
            break
        case 'var':
            head = `var.${root.name}`
            break
        case 'module':
            head = `module.${root.name}.${root.output}`
            break
        case 'self':
            head = 'self'
            break
        case 'node':
            head = root.address
            break
    }
    return [head, ...ref.path].join('.')
}
