export const MEMORY_EVENT_TYPES = ['fact', 'preference', 'event', 'insight', 'task', 'relationship'] as const

export type MemoryEventType = (typeof MEMORY_EVENT_TYPES)[number]

export interface MemoryEntry {
    id: string
    timestamp: string
    type: MemoryEventType
    content: string
    importance: number
    source: string
}

/**
 * Long-lived store the council reads context from before deliberating and
 * writes one audit event to at the end of every session.
 */
export interface MemoryStore {
    /** Compact JSON summary of recent relevant entries. */
    readSummary(): Promise<string>
    writeEvent(content: string, type: MemoryEventType, importance: number): Promise<void>
}
