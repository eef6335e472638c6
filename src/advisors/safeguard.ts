import type { Advisor } from './types.js'

export const BLOCK_PATTERNS = ['rm -rf /', 'delete production', 'drop database', 'exfiltrate', 'malware'] as const

export const UNBLOCK_REQUIREMENTS = [
    'Clarify safe environment and target scope.',
    'Provide explicit approval for destructive operations.',
    'Provide rollback/backup strategy.',
]

export const safeguardAdvisor: Advisor = {
    id: 'Safeguard',
    propose(task) {
        const lowered = task.text.toLowerCase()
        const pattern = BLOCK_PATTERNS.find((p) => lowered.includes(p))
        if (pattern) {
            return {
                vote: 'veto',
                rationale: `Blocked due to dangerous instruction pattern: '${pattern}'.`,
                actions: [],
                unblockRequirements: [...UNBLOCK_REQUIREMENTS],
            }
        }
        return {
            vote: 'approve',
            rationale: 'No critical safety violations detected.',
            actions: [],
            risks: ['Always validate command scope before execution.'],
        }
    },
}
