import type { Advisor } from './types.js'

export const humanImpactAdvisor: Advisor = {
    id: 'HumanImpact',
    propose() {
        return {
            vote: 'approve',
            rationale: 'Keep outputs understandable and include operational next steps.',
            actions: [
                {
                    type: 'command',
                    label: 'Emit operator notice',
                    params: { command: "echo 'HumanImpact: include runbook updates in summary'" },
                },
            ],
        }
    },
}
