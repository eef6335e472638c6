import { z } from 'zod'
import type { Advisor, Roster } from '../advisors/types.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Action, AdvisorId, Proposal, Task } from '../core/types.js'
import { formatZodIssues } from '../core/validation.js'
import type { Logger } from '../logger/index.js'

const ParamValueSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()])

const ActionDraftSchema = z.object({
    type: z.string().min(1),
    params: z.record(ParamValueSchema),
    label: z.string().optional(),
})

export const ProposalDraftSchema = z
    .object({
        vote: z.enum(['approve', 'reject', 'abstain', 'veto']),
        rationale: z.string().default(''),
        actions: z.array(ActionDraftSchema).default([]),
        risks: z.array(z.string()).default([]),
        unblockRequirements: z.array(z.string()).default([]),
    })
    .refine((draft) => draft.vote !== 'veto' || draft.actions.length === 0, {
        message: 'a veto must not carry actions',
        path: ['actions'],
    })

type ValidDraft = z.infer<typeof ProposalDraftSchema>

export interface DeliberationOptions {
    logger?: Logger
    eventBus?: TypedEventEmitter
}

export function faultProposal(advisorId: AdvisorId, reason: string): Proposal {
    const proposal: Proposal = {
        advisorId,
        vote: 'abstain',
        rationale: `Advisor fault: ${reason}`,
        actions: [],
        risks: [],
        unblockRequirements: [],
        fault: reason,
    }
    return Object.freeze(proposal)
}

function stamp(advisorId: AdvisorId, draft: ValidDraft): Proposal {
    const actions = draft.actions.map((a) => {
        const action: Action = {
            type: a.type,
            params: Object.freeze({ ...a.params }),
            originAdvisor: advisorId,
            ...(a.label !== undefined ? { label: a.label } : {}),
        }
        return Object.freeze(action)
    })
    const proposal: Proposal = {
        advisorId,
        vote: draft.vote,
        rationale: draft.rationale,
        actions: Object.freeze(actions),
        risks: Object.freeze([...draft.risks]),
        unblockRequirements: Object.freeze([...draft.unblockRequirements]),
    }
    return Object.freeze(proposal)
}

async function consult(advisor: Advisor, task: Task, memorySummary: string, opts: DeliberationOptions): Promise<Proposal> {
    let raw: unknown
    try {
        raw = await advisor.propose(task, memorySummary)
    } catch (error) {
        return recordFault(advisor.id, `advisor threw: ${errorMessage(error)}`, opts)
    }

    const parsed = ProposalDraftSchema.safeParse(raw)
    if (!parsed.success) {
        return recordFault(advisor.id, `malformed proposal (${formatZodIssues(parsed.error)})`, opts)
    }

    const proposal = stamp(advisor.id, parsed.data)
    opts.eventBus?.emit('advisor:proposal', {
        advisorId: advisor.id,
        vote: proposal.vote,
        actions: proposal.actions.length,
    })
    return proposal
}

function recordFault(advisorId: AdvisorId, reason: string, opts: DeliberationOptions): Proposal {
    opts.logger?.warn({ advisorId, reason }, 'advisor:fault')
    opts.eventBus?.emit('advisor:fault', { advisorId, reason })
    return faultProposal(advisorId, reason)
}

/**
 * Consults every advisor concurrently. The result is always in roster order
 * with exactly one proposal per member; a failing advisor becomes an empty
 * abstain and never aborts the round.
 */
export async function deliberate(
    task: Task,
    memorySummary: string,
    roster: Roster,
    opts: DeliberationOptions = {}
): Promise<Proposal[]> {
    return Promise.all(roster.map((advisor) => consult(advisor, task, memorySummary, opts)))
}
