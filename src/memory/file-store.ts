import { randomUUID } from 'node:crypto'
import path from 'node:path'
import { z } from 'zod'
import { CollaboratorUnavailableError, PermanentError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { MEMORY_EVENT_TYPES, type MemoryEntry, type MemoryEventType, type MemoryStore } from './types.js'

export const EVENTS_FILE = 'events.jsonl'

const SUMMARY_CONTENT_LIMIT = 200

const MemoryEntrySchema = z.object({
    id: z.string(),
    timestamp: z.string(),
    type: z.enum(MEMORY_EVENT_TYPES),
    content: z.string(),
    importance: z.number().int().min(1).max(10),
    source: z.string(),
})

export interface FileMemoryOptions {
    dir: string
    summaryLimit: number
    minImportance: number
}

function truncate(text: string, limit: number): string {
    return text.length > limit ? `${text.slice(0, limit - 3)}...` : text
}

/**
 * Append-only JSONL memory under `<dir>/events.jsonl`. Writes are queued so
 * concurrent sessions never interleave lines.
 */
export class FileMemoryStore implements MemoryStore {
    private readonly filePath: string
    private queue: Promise<void> = Promise.resolve()

    constructor(
        private fs: FileSystem,
        private options: FileMemoryOptions,
        private logger?: Logger
    ) {
        this.filePath = path.join(options.dir, EVENTS_FILE)
    }

    async readEntries(): Promise<MemoryEntry[]> {
        let text: string
        try {
            if (!(await this.fs.exists(this.filePath))) return []
            text = await this.fs.readText(this.filePath)
        } catch (error) {
            throw new CollaboratorUnavailableError('memory', `Cannot read memory: ${errorMessage(error)}`, {
                cause: error,
            })
        }

        const entries: MemoryEntry[] = []
        for (const [index, line] of text.split('\n').entries()) {
            if (!line.trim()) continue
            let raw: unknown
            try {
                raw = JSON.parse(line)
            } catch {
                this.logger?.debug({ line: index + 1 }, 'memory:skip-unparseable')
                continue
            }
            const parsed = MemoryEntrySchema.safeParse(raw)
            if (parsed.success) entries.push(parsed.data)
            else this.logger?.debug({ line: index + 1 }, 'memory:skip-invalid')
        }
        return entries
    }

    async readSummary(): Promise<string> {
        const entries = await this.readEntries()
        const recent = entries
            .filter((e) => e.importance >= this.options.minImportance)
            .slice(-this.options.summaryLimit)
            .map((e) => ({
                timestamp: e.timestamp,
                type: e.type,
                importance: e.importance,
                content: truncate(e.content, SUMMARY_CONTENT_LIMIT),
            }))

        return JSON.stringify({ entries_loaded: entries.length, recent })
    }

    writeEvent(content: string, type: MemoryEventType, importance: number): Promise<void> {
        if (!content.trim()) {
            return Promise.reject(new PermanentError('Memory event content must not be empty'))
        }
        if (!Number.isInteger(importance) || importance < 1 || importance > 10) {
            return Promise.reject(new PermanentError(`Memory importance must be an integer 1-10, got ${importance}`))
        }

        const entry: MemoryEntry = {
            id: randomUUID(),
            timestamp: new Date().toISOString(),
            type,
            content,
            importance,
            source: 'council',
        }

        const write = this.queue.then(() => this.append(entry))
        // the caller sees the failure through `write`; the queue only orders writers
        this.queue = write.catch(() => undefined)
        return write
    }

    private async append(entry: MemoryEntry): Promise<void> {
        try {
            await this.fs.mkdir(this.options.dir)
            await this.fs.appendText(this.filePath, `${JSON.stringify(entry)}\n`)
        } catch (error) {
            throw new CollaboratorUnavailableError('memory', `Cannot write memory: ${errorMessage(error)}`, {
                cause: error,
            })
        }
        this.logger?.debug({ id: entry.id, type: entry.type }, 'memory:write')
    }
}
