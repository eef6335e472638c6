import type { TypedEventEmitter } from '../core/events.js'
import type { SessionState } from '../core/types.js'

const STATE_LABELS: Partial<Record<SessionState, string>> = {
    PREFLIGHT: 'Running preflight...',
    MEMORY_LOADED: 'Consulting advisors...',
    DELIBERATED: 'Merging proposals...',
    MERGED: 'Plan ready',
    LOGGED: 'Writing audit record...',
}

interface Spinner {
    message(msg: string): void
}

export interface ProgressTracker {
    dispose(): void
}

export function createProgressTracker(eventBus: TypedEventEmitter, spinner: Spinner): ProgressTracker {
    const onState = (data: { state: SessionState }) => {
        const label = STATE_LABELS[data.state]
        if (label) spinner.message(label)
    }

    const onStepStart = (data: { index: number; type: string; label?: string }) => {
        spinner.message(`Step ${data.index + 1}: ${data.label ?? data.type}...`)
    }

    const onStepComplete = (data: { index: number; type: string; status: string; duration: number }) => {
        const secs = (data.duration / 1000).toFixed(1)
        spinner.message(`Step ${data.index + 1} ${data.status} (${secs}s)`)
    }

    eventBus.on('session:state', onState)
    eventBus.on('step:start', onStepStart)
    eventBus.on('step:complete', onStepComplete)

    return {
        dispose() {
            eventBus.off('session:state', onState)
            eventBus.off('step:start', onStepStart)
            eventBus.off('step:complete', onStepComplete)
        },
    }
}
