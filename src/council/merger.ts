import type { Action, AdvisorId, Plan, Proposal } from '../core/types.js'

export interface MergeOptions {
    /** Defaults to the number of proposals, which is one per roster member. */
    rosterSize?: number
}

export function quorumFor(rosterSize: number): number {
    return Math.max(1, Math.ceil(rosterSize / 2))
}

/** Identity used for deduplication: type plus params, key order ignored. */
export function actionKey(action: Pick<Action, 'type' | 'params'>): string {
    const entries = Object.keys(action.params)
        .sort()
        .map((key) => [key, action.params[key]])
    return JSON.stringify([action.type, entries])
}

function unique(items: readonly string[]): string[] {
    return [...new Set(items)]
}

function blockedPlan(reason: string, unblockRequirements: string[], approvals: AdvisorId[]): Plan {
    const plan: Plan = {
        blocked: true,
        blockingReason: reason,
        unblockRequirements: Object.freeze(unblockRequirements),
        actions: [],
        approvals: Object.freeze(approvals),
    }
    return Object.freeze(plan)
}

/**
 * Reduces proposals to one plan. Veto beats quorum, quorum beats
 * aggregation. Proposals must already be in roster order.
 */
export function merge(proposals: readonly Proposal[], options: MergeOptions = {}): Plan {
    const approving = proposals.filter((p) => p.vote === 'approve')
    const approvals = approving.map((p) => p.advisorId)

    const vetoes = proposals.filter((p) => p.vote === 'veto')
    if (vetoes.length > 0) {
        const cited = vetoes.map((p) => (p.rationale ? `${p.advisorId}: ${p.rationale}` : p.advisorId)).join('; ')
        return blockedPlan(
            `Vetoed by ${cited}`,
            unique(vetoes.flatMap((p) => p.unblockRequirements)),
            approvals
        )
    }

    const rosterSize = options.rosterSize ?? proposals.length
    const quorum = quorumFor(rosterSize)
    if (approving.length < quorum) {
        return blockedPlan(
            `insufficient approval: ${approving.length} of ${rosterSize} advisors approved, ${quorum} required`,
            [],
            approvals
        )
    }

    const seen = new Set<string>()
    const actions: Action[] = []
    for (const proposal of approving) {
        for (const action of proposal.actions) {
            const key = actionKey(action)
            if (seen.has(key)) continue
            seen.add(key)
            actions.push(action)
        }
    }

    const plan: Plan = {
        blocked: false,
        blockingReason: null,
        unblockRequirements: [],
        actions: Object.freeze(actions),
        approvals: Object.freeze(approvals),
    }
    return Object.freeze(plan)
}
