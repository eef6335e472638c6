import type { Container } from '../core/container.js'
import type { SessionOutcome } from '../council/session.js'

export interface InvokeRequest {
    taskText: string
    repoPath?: string
    planOnly: boolean
}

export interface InvokeIO {
    out(text: string): void
}

export const EXIT_OK = 0
export const EXIT_PLAN_FAILED = 1
export const EXIT_INTERNAL = 2

/** Blocked and planned runs are valid outcomes; only faults and lost audits are internal errors. */
export function exitCodeFor(outcome: Pick<SessionOutcome, 'status' | 'audited'>): number {
    if (outcome.status === 'error' || !outcome.audited) return EXIT_INTERNAL
    if (outcome.status === 'failed') return EXIT_PLAN_FAILED
    return EXIT_OK
}

export async function invoke(
    request: InvokeRequest,
    container: Pick<Container, 'createSession'>,
    io: InvokeIO
): Promise<{ exitCode: number; outcome: SessionOutcome }> {
    const outcome = await container.createSession().run({
        text: request.taskText,
        repoPath: request.repoPath,
        mode: request.planOnly ? 'plan' : 'exec',
    })
    io.out(outcome.text)
    return { exitCode: exitCodeFor(outcome), outcome }
}
