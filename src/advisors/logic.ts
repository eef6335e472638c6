import type { ActionDraft, Advisor } from './types.js'

export const logicAdvisor: Advisor = {
    id: 'Logic',
    propose(task) {
        const actions: ActionDraft[] = [
            { type: 'command', label: 'Inspect repository', params: { command: 'git status --short' } },
            { type: 'command', label: 'Locate relevant files', params: { command: 'git ls-files' } },
        ]
        const lowered = task.text.toLowerCase()
        if (lowered.includes('test') || lowered.includes('verify')) {
            actions.push({ type: 'run_tests', label: 'Run project tests', params: {} })
        }
        return {
            vote: 'approve',
            rationale: 'Break the request down into deterministic inspect, build and verify steps.',
            actions,
        }
    },
}
