import { describe, expect, it } from 'vitest'
import type { Action, AdvisorId, Proposal, Vote } from '../../../src/core/types.js'
import { actionKey, merge, quorumFor } from '../../../src/council/merger.js'

function action(type: string, params: Action['params'], originAdvisor: AdvisorId = 'Logic'): Action {
    return { type, params, originAdvisor }
}

function proposal(advisorId: AdvisorId, vote: Vote, actions: Action[] = [], extra: Partial<Proposal> = {}): Proposal {
    return { advisorId, vote, rationale: `${advisorId} says ${vote}`, actions, risks: [], unblockRequirements: [], ...extra }
}

const A = action('command', { command: 'git status --short' })
const B = action('command', { command: 'git ls-files' })

describe('quorumFor', () => {
    it('is the ceiling of half the roster, at least one', () => {
        expect([0, 1, 2, 3, 4, 5].map(quorumFor)).toEqual([1, 1, 1, 2, 2, 3])
    })
})

describe('merge', () => {
    it('blocks on any veto regardless of approvals', () => {
        const plan = merge([
            proposal('Logic', 'approve', [A]),
            proposal('Pragmatic', 'approve', [B]),
            proposal('Safeguard', 'veto', [], { rationale: 'dangerous', unblockRequirements: ['Get approval.'] }),
            proposal('Efficiency', 'approve'),
            proposal('HumanImpact', 'approve'),
        ])

        expect(plan).toEqual({
            blocked: true,
            blockingReason: 'Vetoed by Safeguard: dangerous',
            unblockRequirements: ['Get approval.'],
            actions: [],
            approvals: ['Logic', 'Pragmatic', 'Efficiency', 'HumanImpact'],
        })
    })

    it('cites every vetoing advisor and unions their requirements', () => {
        const plan = merge([
            proposal('Logic', 'veto', [], { rationale: 'a', unblockRequirements: ['x', 'y'] }),
            proposal('Safeguard', 'veto', [], { rationale: 'b', unblockRequirements: ['y', 'z'] }),
        ])
        expect(plan.blockingReason).toBe('Vetoed by Logic: a; Safeguard: b')
        expect(plan.unblockRequirements).toEqual(['x', 'y', 'z'])
    })

    it('blocks one approval short of quorum', () => {
        const plan = merge([
            proposal('Logic', 'approve', [A]),
            proposal('Pragmatic', 'approve', [B]),
            proposal('Safeguard', 'abstain'),
            proposal('Efficiency', 'reject', [A]),
            proposal('HumanImpact', 'abstain'),
        ])
        expect(plan.blocked).toBe(true)
        expect(plan.blockingReason).toBe('insufficient approval: 2 of 5 advisors approved, 3 required')
        expect(plan.actions).toEqual([])
    })

    it('passes at exactly quorum and ignores non-approving actions', () => {
        const C = action('run_tests', {}, 'Efficiency')
        const plan = merge([
            proposal('Logic', 'approve', [A]),
            proposal('Pragmatic', 'approve', [B]),
            proposal('Safeguard', 'approve'),
            proposal('Efficiency', 'reject', [C]),
            proposal('HumanImpact', 'abstain', [C]),
        ])
        expect(plan.blocked).toBe(false)
        expect(plan.blockingReason).toBeNull()
        expect(plan.actions).toEqual([A, B])
    })

    it('keeps the first occurrence of a duplicate in roster order', () => {
        const laterA = action('command', { command: 'git status --short' }, 'Pragmatic')
        const plan = merge([proposal('Logic', 'approve', [A, B]), proposal('Pragmatic', 'approve', [laterA])])
        expect(plan.actions).toEqual([A, B])
        expect(plan.actions[0]?.originAdvisor).toBe('Logic')
    })

    it('uses an explicit roster size for quorum', () => {
        const plan = merge([proposal('Logic', 'approve', [A])], { rosterSize: 5 })
        expect(plan.blockingReason).toBe('insufficient approval: 1 of 5 advisors approved, 3 required')
    })

    it('is deterministic and frozen', () => {
        const proposals = [proposal('Logic', 'approve', [A, B]), proposal('Pragmatic', 'approve', [B])]
        expect(JSON.stringify(merge(proposals))).toBe(JSON.stringify(merge(proposals)))
        expect(Object.isFrozen(merge(proposals))).toBe(true)
    })
})

describe('actionKey', () => {
    it('ignores param key order and label', () => {
        const one = actionKey({ type: 'x', params: { a: 1, b: 'two' } })
        const two = actionKey({ type: 'x', params: { b: 'two', a: 1 } })
        expect(one).toBe(two)
        expect(actionKey({ type: 'y', params: { a: 1, b: 'two' } })).not.toBe(one)
    })
})
