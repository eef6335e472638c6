import type { Advisor } from './types.js'

export const efficiencyAdvisor: Advisor = {
    id: 'Efficiency',
    propose() {
        return {
            vote: 'approve',
            rationale: 'Batch related checks and avoid redundant commands.',
            actions: [{ type: 'command', label: 'Quick health check', params: { command: 'git diff --stat' } }],
        }
    },
}
