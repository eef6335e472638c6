import { z } from 'zod'
import type { SessionOutcome } from '../council/session.js'

export const DEFAULT_WORKSPACE = 'default'

/** `workspace` labels the request in the inbox; sessions always run in the project directory. */
export const GatewayRequestSchema = z.object({
    workspace: z.string().min(1).default(DEFAULT_WORKSPACE),
    text: z.string().trim().min(1),
    mode: z.enum(['plan', 'exec']),
})

export type GatewayRequest = z.infer<typeof GatewayRequestSchema>

export type GatewayStatus = 'running' | 'done' | 'blocked' | 'failed'

export interface GatewayResponse {
    status: GatewayStatus
    /** Null only when the request was rejected before it reached the inbox. */
    inbox_id: string | null
    mode: string
    text?: string
    error?: string
}

export function outcomeResponse(inboxId: string, outcome: SessionOutcome): GatewayResponse {
    const base = { inbox_id: inboxId, mode: outcome.task.mode, text: outcome.text }
    switch (outcome.status) {
        case 'planned':
        case 'completed':
            return { status: 'done', ...base }
        case 'blocked':
            return { status: 'blocked', ...base }
        case 'failed':
        case 'error':
            return { status: 'failed', ...base, error: outcome.error ?? `session ended with status ${outcome.status}` }
    }
}
