import { ExpandedOutput } from "../module/expander"
import { PlannedAttributeMap, PlannedValue } from "../graph/expression"
import { GraphNode } from "../graph/graph"
import { StateRecord, StateSnapshot } from "../state/state"

export type PlanMode = 'apply' | 'destroy'

export type PlannedAction = 'create' | 'update' | 'replace' | 'destroy' | 'no-op'

/** Provider-level operation an action breaks down into */
export type StepOperation = 'create' | 'update' | 'destroy'

export interface PlannedChange {
    address: string
    kind: string
    name: string
    modulePath: string[]
    action: PlannedAction

    /** Desired attributes as known at plan time. Absent for destroys */
    desired?: PlannedAttributeMap

    /** Declared node, evaluated again at apply time once its dependencies are committed. Absent for destroys */
    node?: GraphNode

    /** Refreshed state record. Absent for creates */
    prior?: StateRecord

    /** Attributes whose value differs from the prior state */
    changedAttributes: string[]

    /** Why a replace is needed: replace-forcing attributes, or `tainted` */
    replaceReasons: string[]

    createBeforeDestroy: boolean

    /**
     * Addresses this change must wait for: declared dependencies for desired nodes,
     * dependencies recorded in state for destroys.
     */
    dependencies: string[]
}

export interface PlanStep {
    address: string
    operation: StepOperation
    /** Half of a replace */
    replace: boolean
}

export interface Plan {
    mode: PlanMode

    /** Changes in apply order: desired nodes in dependency order, then destroys in reverse dependency order */
    changes: PlannedChange[]

    /** Prior state the plan was computed against (refreshed when enabled) */
    prior: StateSnapshot

    /** Root outputs to evaluate after apply */
    outputs: Record<string, ExpandedOutput>

    /** Root output values as known at plan time */
    plannedOutputs: Record<string, PlannedValue>
}

export interface PlanSummary {
    create: number
    update: number
    replace: number
    destroy: number
    unchanged: number
}

/**
 * Flatten changes into provider operations. A replace gives its create before its destroy
 * when create_before_destroy is set, after it otherwise.
 */
export function planSteps(plan: Plan): PlanStep[] {
    return plan.changes.flatMap((change): PlanStep[] => {
        const address = change.address
        switch (change.action) {
            case 'create':
            case 'update':
            case 'destroy':
                return [{ address, operation: change.action, replace: false }]
            case 'replace':
                return change.createBeforeDestroy
                    ? [{ address, operation: 'create', replace: true }, { address, operation: 'destroy', replace: true }]
                    : [{ address, operation: 'destroy', replace: true }, { address, operation: 'create', replace: true }]
            case 'no-op':
                return []
        }
    })
}

export function summarizePlan(plan: Plan): PlanSummary {
    const summary: PlanSummary = { create: 0, update: 0, replace: 0, destroy: 0, unchanged: 0 }
    for (const change of plan.changes) {
        switch (change.action) {
            case 'create': summary.create++; break
            case 'update': summary.update++; break
            case 'replace': summary.replace++; break
            case 'destroy': summary.destroy++; break
            case 'no-op': summary.unchanged++; break
        }
    }
    return summary
}

export function hasChanges(plan: Plan): boolean {
    return plan.changes.some(c => c.action !== 'no-op')
}
