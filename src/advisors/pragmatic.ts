import type { ActionDraft, Advisor } from './types.js'

export const DEFAULT_APP_NAME = 'council-app'

export const pragmaticAdvisor: Advisor = {
    id: 'Pragmatic',
    propose(task) {
        const actions: ActionDraft[] = []
        if (task.text.toLowerCase().includes('next')) {
            actions.push({
                type: 'scaffold_nextjs',
                label: 'Scaffold Next.js app',
                params: { app_name: DEFAULT_APP_NAME },
            })
        }
        actions.push({
            type: 'command',
            label: 'Show concise summary',
            params: { command: "echo 'Pragmatic pass complete'" },
        })
        return {
            vote: 'approve',
            rationale: 'Prefer the smallest set of changes that satisfies the task.',
            actions,
        }
    },
}
