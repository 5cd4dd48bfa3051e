import { ApplyReport, NodeStatus } from "../core/apply/executor"
import { PlannedValue, UnknownValue } from "../core/graph/expression"
import { Plan, PlannedChange, summarizePlan } from "../core/plan/plan"
import { StateOutput, StateRecord } from "../core/state/state"

export const SENSITIVE_PLACEHOLDER = "(sensitive)"

export function formatValue(value: PlannedValue): string {
    if (value instanceof UnknownValue) {
        return value.toString()
    }
    return JSON.stringify(value)
}

function changeSymbol(change: PlannedChange): string {
    switch (change.action) {
        case 'create': return '  +'
        case 'update': return '  ~'
        case 'replace': return change.createBeforeDestroy ? '+/-' : '-/+'
        case 'destroy': return '  -'
        case 'no-op': return '   '
    }
}

function changeDetails(change: PlannedChange): string {
    switch (change.action) {
        case 'update':
            return ` (${change.changedAttributes.join(', ')})`
        case 'replace':
            return ` (forced by ${change.replaceReasons.join(', ')})`
        default:
            return ''
    }
}

/**
 * Human readable plan: one line per change, planned outputs and a summary line.
 */
export function formatPlan(plan: Plan): string[] {
    const lines = plan.changes
        .filter(c => c.action !== 'no-op')
        .map(c => `${changeSymbol(c)} ${c.action} ${c.address}${changeDetails(c)}`)

    const outputs = Object.values(plan.outputs)
    if (outputs.length > 0) {
        lines.push('', 'Outputs:')
        for (const output of outputs) {
            const value = output.sensitive ? SENSITIVE_PLACEHOLDER : formatValue(plan.plannedOutputs[output.name] ?? null)
            lines.push(`  ${output.name} = ${value}`)
        }
    }

    const summary = summarizePlan(plan)
    if (summary.create + summary.update + summary.replace + summary.destroy === 0) {
        lines.push('', 'No changes.')
    } else {
        lines.push('', `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.replace} to replace, ${summary.destroy} to destroy.`)
    }
    return lines
}

export function formatReport(report: ApplyReport): string[] {
    const lines: string[] = []
    const counts: Record<NodeStatus, number> = { applied: 0, unchanged: 0, failed: 0, blocked: 0, tainted: 0, cancelled: 0 }

    for (const node of report.nodes) {
        counts[node.status]++
        if (node.status === 'unchanged') {
            continue
        }
        let line = `${node.address}: ${node.action} ${node.status}`
        if (node.blockedBy) {
            line += ` (waiting on ${node.blockedBy})`
        }
        if (node.error) {
            line += `: ${node.error.message}`
        }
        lines.push(line)
    }

    lines.push('', `Apply finished: ${counts.applied} applied, ${counts.failed} failed, ${counts.blocked} blocked, ${counts.tainted} tainted, ${counts.cancelled} cancelled.`)
    return lines
}

/**
 * Output listing with sensitive values masked.
 */
export function formatOutputs(outputs: Record<string, StateOutput>): string[] {
    return Object.entries(outputs).map(([name, output]) =>
        `${name} = ${output.sensitive ? SENSITIVE_PLACEHOLDER : formatValue(output.value)}`)
}

export function formatRecord(record: StateRecord): string[] {
    const lines = [
        `# ${record.address}${record.tainted ? ' (tainted)' : ''}`,
        `id = ${JSON.stringify(record.id)}`,
    ]
    for (const key of Object.keys(record.attributes).sort()) {
        lines.push(`${key} = ${formatValue(record.attributes[key])}`)
    }
    if (record.dependencies.length > 0) {
        lines.push(`depends on: ${record.dependencies.join(', ')}`)
    }
    return lines
}
