import type { ActionParams, AdvisorId, Task, Vote } from '../core/types.js'

export interface ActionDraft {
    type: string
    params: ActionParams
    label?: string
}

/** What an advisor hands back before the coordinator validates and stamps it. */
export interface ProposalDraft {
    vote: Vote
    rationale: string
    actions: ActionDraft[]
    risks?: string[]
    unblockRequirements?: string[]
}

/**
 * One fixed roster member. `propose` must be pure: same task and memory
 * summary, same draft. No tool calls and no memory writes.
 */
export interface Advisor {
    readonly id: AdvisorId
    propose(task: Task, memorySummary: string): ProposalDraft | Promise<ProposalDraft>
}

export type Roster = readonly Advisor[]
