import { ADVISOR_IDS, type AdvisorId } from '../core/types.js'
import { efficiencyAdvisor } from './efficiency.js'
import { humanImpactAdvisor } from './human-impact.js'
import { logicAdvisor } from './logic.js'
import { pragmaticAdvisor } from './pragmatic.js'
import { safeguardAdvisor } from './safeguard.js'
import type { Advisor, Roster } from './types.js'

const DEFAULT_ADVISORS: Record<AdvisorId, Advisor> = {
    Logic: logicAdvisor,
    Pragmatic: pragmaticAdvisor,
    Safeguard: safeguardAdvisor,
    Efficiency: efficiencyAdvisor,
    HumanImpact: humanImpactAdvisor,
}

/**
 * The reference roster, in tie-breaking order. Individual members can be
 * swapped (tests do this), but the ids and their order never change.
 */
export function createRoster(overrides: Partial<Record<AdvisorId, Advisor>> = {}): Roster {
    return Object.freeze(
        ADVISOR_IDS.map((id) => {
            const advisor = overrides[id] ?? DEFAULT_ADVISORS[id]
            if (advisor.id !== id) {
                throw new Error(`Advisor for roster slot '${id}' reports id '${advisor.id}'`)
            }
            return advisor
        })
    )
}
