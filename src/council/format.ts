import type { Action, ExecutionTrace, Plan, StepResult } from '../core/types.js'

function actionTitle(action: Action): string {
    return action.label ? `${action.type} - ${action.label}` : action.type
}

export function formatPlan(plan: Plan): string {
    if (plan.blocked) {
        const lines = [`BLOCKED: ${plan.blockingReason ?? 'no reason given'}`]
        if (plan.unblockRequirements.length > 0) {
            lines.push('Unblock requirements:', ...plan.unblockRequirements.map((r) => `- ${r}`))
        }
        return lines.join('\n')
    }

    if (plan.actions.length === 0) return 'Execution Plan:\n(no actions)'
    return ['Execution Plan:', ...plan.actions.map((a, i) => `${i + 1}. ${actionTitle(a)}`)].join('\n')
}

/** Turns an opaque tool payload into display lines. */
export function describeOutput(output: unknown): string[] {
    if (output === undefined || output === null) return []
    if (typeof output === 'string') return output.trim() ? output.trim().split('\n') : []
    if (typeof output === 'object' && 'stdout' in output && 'stderr' in output) {
        const { stdout, stderr } = output
        const lines: string[] = []
        if (typeof stdout === 'string' && stdout.trim()) lines.push(...stdout.trim().split('\n'))
        if (typeof stderr === 'string' && stderr.trim()) lines.push(...stderr.trim().split('\n'))
        return lines
    }
    return [JSON.stringify(output)]
}

function formatStep(step: StepResult, index: number): string[] {
    const title = `${index + 1}. [${step.action.type}]${step.action.label ? ` ${step.action.label}` : ''}`
    switch (step.status) {
        case 'ok':
            return [`${title} => ok`, ...describeOutput(step.output).map((line) => `   ${line}`)]
        case 'failed':
            return [`${title} => failed (${step.error?.kind ?? 'unknown'}): ${step.error?.message ?? ''}`]
        case 'skipped':
            return [`${title} => skipped`]
    }
}

export function formatTrace(trace: ExecutionTrace): string {
    return ['Execution Trace:', ...trace.flatMap(formatStep)].join('\n')
}

export interface TraceSummary {
    ok: number
    failed: number
    skipped: number
}

export function summarizeTrace(trace: ExecutionTrace): TraceSummary {
    const summary: TraceSummary = { ok: 0, failed: 0, skipped: 0 }
    for (const step of trace) summary[step.status]++
    return summary
}
