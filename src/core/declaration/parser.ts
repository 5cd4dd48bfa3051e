import * as path from 'path'
import { ZodError } from "zod"
import { DeclarationError } from "../errors/errors"
import { Expression, ExpressionSyntaxError, LiteralValue, parseAttributes, parseValue } from "../graph/expression"
import { LifecyclePolicy, ProvisionerSpec } from "../graph/graph"
import { ModuleFileSchema, RawProvisioner, RawResource } from "./schema"

export interface VariableDeclaration {
    name: string
    default?: LiteralValue
    hasDefault: boolean
    sensitive: boolean
}

export interface ResourceDeclaration {
    kind: string
    name: string
    attributes: Record<string, Expression>
    /** Raw hints in the module's own namespace: `KIND.NAME` or `module.NAME` */
    dependsOn: string[]
    lifecycle: LifecyclePolicy
    provisioners: ProvisionerSpec[]
}

export interface ModuleCallDeclaration {
    name: string
    source: string
    inputs: Record<string, Expression>
    dependsOn: string[]
}

export interface OutputDeclaration {
    name: string
    value: Expression
    sensitive: boolean
}

/**
 * A module body, with every attribute value parsed into expressions.
 */
export interface ModuleDeclaration {
    /** Where the module was loaded from, for messages */
    source: string
    /** Directory holding the module, base of relative script and module paths */
    dir?: string
    variables: Record<string, VariableDeclaration>
    resources: ResourceDeclaration[]
    modules: ModuleCallDeclaration[]
    outputs: Record<string, OutputDeclaration>
}

function formatZodError(error: ZodError): string {
    return error.issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ')
}

function parseProvisioner(raw: RawProvisioner, dir: string | undefined): ProvisionerSpec {
    const connection: Record<string, Expression> = {}
    for (const [key, value] of Object.entries(raw.connection)) {
        if (value !== undefined) {
            connection[key] = parseValue(value)
        }
    }

    return {
        type: raw.type,
        scriptPath: raw.script === undefined ? undefined : path.resolve(dir ?? process.cwd(), raw.script),
        inline: raw.inline === undefined ? undefined : parseValue(raw.inline),
        connection,
        onFailure: raw.on_failure,
    }
}

function parseResource(raw: RawResource, dir: string | undefined): ResourceDeclaration {
    return {
        kind: raw.kind,
        name: raw.name,
        attributes: parseAttributes(raw.attributes),
        dependsOn: raw.depends_on,
        lifecycle: {
            createBeforeDestroy: raw.lifecycle?.create_before_destroy ?? false,
            preventDestroy: raw.lifecycle?.prevent_destroy ?? false,
            ignoreChanges: raw.lifecycle?.ignore_changes ?? [],
        },
        provisioners: raw.provisioners.map(p => parseProvisioner(p, dir)),
    }
}

/**
 * Validate a raw module body (parsed JSON) and turn its values into expressions.
 *
 * @param source - label used in error messages, usually the module file path
 * @param dir - module directory, base for relative paths
 */
export function parseModuleDeclaration(raw: unknown, source: string, dir?: string): ModuleDeclaration {
    const result = ModuleFileSchema.safeParse(raw)
    if (!result.success) {
        throw new DeclarationError(source, formatZodError(result.error), result.error)
    }
    const file = result.data

    try {
        const variables: Record<string, VariableDeclaration> = {}
        for (const [name, variable] of Object.entries(file.variables)) {
            variables[name] = {
                name,
                default: variable.default,
                hasDefault: variable.default !== undefined,
                sensitive: variable.sensitive,
            }
        }

        const outputs: Record<string, OutputDeclaration> = {}
        for (const [name, output] of Object.entries(file.outputs)) {
            outputs[name] = { name, value: parseValue(output.value), sensitive: output.sensitive }
        }

        return {
            source,
            dir,
            variables,
            resources: file.resources.map(r => parseResource(r, dir)),
            modules: file.modules.map(m => ({
                name: m.name,
                source: m.source,
                inputs: parseAttributes(m.inputs),
                dependsOn: m.depends_on,
            })),
            outputs,
        }
    } catch (e) {
        if (e instanceof ExpressionSyntaxError) {
            throw new DeclarationError(source, e.message, e)
        }
        throw e
    }
}
