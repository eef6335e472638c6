import { describe, expect, it } from 'vitest'
import { createRoster } from '../../../src/advisors/roster.js'
import { UNBLOCK_REQUIREMENTS, safeguardAdvisor } from '../../../src/advisors/safeguard.js'
import { logicAdvisor } from '../../../src/advisors/logic.js'
import { pragmaticAdvisor } from '../../../src/advisors/pragmatic.js'
import { abstainer } from '../../helpers/fakes.js'

describe('createRoster', () => {
    it('keeps the fixed order', () => {
        expect(createRoster().map((a) => a.id)).toEqual(['Logic', 'Pragmatic', 'Safeguard', 'Efficiency', 'HumanImpact'])
    })

    it('swaps a member in its own slot', () => {
        const replacement = abstainer('Efficiency')
        expect(createRoster({ Efficiency: replacement })[3]).toBe(replacement)
    })

    it('refuses a member in the wrong slot', () => {
        expect(() => createRoster({ Logic: abstainer('Safeguard') })).toThrow(
            "Advisor for roster slot 'Logic' reports id 'Safeguard'"
        )
    })
})

describe('reference advisors', () => {
    it('Safeguard vetoes dangerous instructions', async () => {
        const draft = await safeguardAdvisor.propose({ text: 'please DROP DATABASE users', mode: 'exec' }, '')
        expect(draft).toEqual({
            vote: 'veto',
            rationale: "Blocked due to dangerous instruction pattern: 'drop database'.",
            actions: [],
            unblockRequirements: UNBLOCK_REQUIREMENTS,
        })
    })

    it('Safeguard approves ordinary tasks without actions', async () => {
        const draft = await safeguardAdvisor.propose({ text: 'tidy the readme', mode: 'exec' }, '')
        expect(draft).toMatchObject({ vote: 'approve', actions: [] })
    })

    it('Logic adds a test run when verification is requested', async () => {
        const draft = await logicAdvisor.propose({ text: 'Verify the build', mode: 'plan' }, '')
        expect(draft.actions.map((a) => a.type)).toEqual(['command', 'command', 'run_tests'])
    })

    it('Pragmatic scaffolds when Next.js is mentioned', async () => {
        const draft = await pragmaticAdvisor.propose({ text: 'start a Next.js site', mode: 'plan' }, '')
        expect(draft.actions[0]).toEqual({
            type: 'scaffold_nextjs',
            label: 'Scaffold Next.js app',
            params: { app_name: 'council-app' },
        })
    })
})
