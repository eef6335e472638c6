import type { AdvisorId, SessionState, SessionStatus, StepStatus, Vote } from './types.js'

export type EventMap = {
    'session:state': { sessionId: string; state: SessionState }
    'advisor:proposal': { advisorId: AdvisorId; vote: Vote; actions: number }
    'advisor:fault': { advisorId: AdvisorId; reason: string }
    'step:start': { index: number; type: string; label?: string }
    'step:complete': { index: number; type: string; status: StepStatus; duration: number }
    'session:end': { sessionId: string; status: SessionStatus; audited: boolean }
}

type EventHandler<T> = (data: T) => void

type HandlerSets = { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> }

export class TypedEventEmitter {
    private handlers: HandlerSets = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const handlers: { [P in K]?: Set<EventHandler<EventMap[P]>> } = this.handlers
        const existing = handlers[event]
        const set = existing ?? new Set<EventHandler<EventMap[K]>>()
        set.add(handler)
        handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: HandlerSets[K] = this.handlers[event]
        set?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set: HandlerSets[K] = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // listeners are observers; they never break a session
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
