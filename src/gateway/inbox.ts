import { randomUUID } from 'node:crypto'
import Database from 'better-sqlite3'
import { z } from 'zod'
import type { GatewayStatus } from './protocol.js'

export type InboxStatus = 'pending' | GatewayStatus

const InboxRowSchema = z.object({
    id: z.string(),
    created_at: z.string(),
    workspace: z.string(),
    channel: z.string(),
    mode: z.string(),
    status: z.string(),
    user_text: z.string(),
    response_text: z.string().nullable(),
    error_text: z.string().nullable(),
})

export type InboxMessage = z.infer<typeof InboxRowSchema>

export interface NewInboxMessage {
    workspace: string
    channel: string
    mode: string
    userText: string
}

/** Durable record of every gateway request and how it ended. */
export class InboxStore {
    private db: Database.Database

    constructor(dbPath: string) {
        this.db = new Database(dbPath)
        this.db.pragma('journal_mode = WAL')
        this.db.pragma('busy_timeout = 5000')
        this.migrate()
    }

    private migrate(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS inbox_messages (
                id            TEXT PRIMARY KEY,
                created_at    TEXT NOT NULL,
                workspace     TEXT NOT NULL,
                channel       TEXT NOT NULL,
                mode          TEXT NOT NULL,
                status        TEXT NOT NULL,
                user_text     TEXT NOT NULL,
                response_text TEXT,
                error_text    TEXT
            );
            CREATE INDEX IF NOT EXISTS idx_inbox_created ON inbox_messages(created_at);
        `)
    }

    insertPending(message: NewInboxMessage): string {
        const id = randomUUID()
        this.db
            .prepare(
                `INSERT INTO inbox_messages (id, created_at, workspace, channel, mode, status, user_text)
                 VALUES (?, ?, ?, ?, ?, 'pending', ?)`
            )
            .run(id, new Date().toISOString(), message.workspace, message.channel, message.mode, message.userText)
        return id
    }

    setStatus(id: string, status: InboxStatus, result: { responseText?: string; errorText?: string } = {}): void {
        this.db
            .prepare('UPDATE inbox_messages SET status = ?, response_text = ?, error_text = ? WHERE id = ?')
            .run(status, result.responseText ?? null, result.errorText ?? null, id)
    }

    get(id: string): InboxMessage | null {
        const row: unknown = this.db.prepare('SELECT * FROM inbox_messages WHERE id = ?').get(id)
        if (row === undefined) return null
        return InboxRowSchema.parse(row)
    }

    close(): void {
        this.db.close()
    }
}
