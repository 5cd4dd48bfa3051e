import * as fs from 'fs/promises'
import { z } from "zod"
import { LiteralValueSchema } from "../core/declaration/schema"
import { ConfigurationError } from "../core/errors/errors"
import { LiteralValue } from "../core/graph/expression"
import { ErrorUtils } from "../tools/error-utils"

const VariableFileSchema = z.record(LiteralValueSchema)

/**
 * Parse `name=value` assignments. Values that read as JSON (numbers, booleans, lists, maps)
 * keep their type, anything else is a string.
 */
export function parseVariableAssignments(assignments: string[]): Record<string, LiteralValue> {
    const variables: Record<string, LiteralValue> = {}
    for (const assignment of assignments) {
        const idx = assignment.indexOf('=')
        if (idx <= 0) {
            throw new ConfigurationError(`Invalid variable assignment "${assignment}", expected name=value`)
        }
        variables[assignment.slice(0, idx)] = parseVariableValue(assignment.slice(idx + 1))
    }
    return variables
}

function parseVariableValue(raw: string): LiteralValue {
    let parsed: unknown
    try {
        parsed = JSON.parse(raw)
    } catch {
        // not JSON: plain string
        return raw
    }
    const result = LiteralValueSchema.safeParse(parsed)
    return result.success ? result.data : raw
}

/**
 * Read a JSON object of variable values.
 */
export async function loadVariableFile(file: string): Promise<Record<string, LiteralValue>> {
    let raw: unknown
    try {
        raw = JSON.parse(await fs.readFile(file, 'utf-8'))
    } catch (e) {
        throw new ConfigurationError(`Cannot read variable file ${file}: ${ErrorUtils.extractErrorMessage(e)}`, ErrorUtils.toError(e))
    }

    const result = VariableFileSchema.safeParse(raw)
    if (!result.success) {
        throw new ConfigurationError(`Variable file ${file} must hold a JSON object`, result.error)
    }
    return result.data
}
