import { errorMessage } from '../core/errors.js'
import type { Container } from '../core/container.js'
import { formatZodIssues } from '../core/validation.js'
import type { InboxStore } from './inbox.js'
import { GatewayRequestSchema, type GatewayResponse, outcomeResponse } from './protocol.js'

export const GATEWAY_CHANNEL = 'ws'

type Send = (response: GatewayResponse) => void

/** The `mode` a rejected request asked for, when it named one. */
export function requestedMode(raw: unknown): string {
    if (typeof raw === 'object' && raw !== null && 'mode' in raw && typeof raw.mode === 'string') return raw.mode
    return 'unknown'
}

/**
 * Maps each request to its own session run. Sends one `running` ack once the
 * request is in the inbox, then exactly one terminal response.
 */
export class GatewayRouter {
    constructor(
        private container: Pick<Container, 'createSession' | 'logger'>,
        private inbox: InboxStore
    ) {}

    async handle(raw: unknown, send: Send): Promise<void> {
        const parsed = GatewayRequestSchema.safeParse(raw)
        if (!parsed.success) {
            send({
                status: 'failed',
                inbox_id: null,
                mode: requestedMode(raw),
                error: `Invalid request: ${formatZodIssues(parsed.error)}`,
            })
            return
        }

        const request = parsed.data
        const { logger } = this.container
        let inboxId: string
        try {
            inboxId = this.inbox.insertPending({
                workspace: request.workspace,
                channel: GATEWAY_CHANNEL,
                mode: request.mode,
                userText: request.text,
            })
            this.inbox.setStatus(inboxId, 'running')
        } catch (error) {
            logger.error({ err: error }, 'gateway:inbox-error')
            send({
                status: 'failed',
                inbox_id: null,
                mode: request.mode,
                error: `Inbox unavailable: ${errorMessage(error)}`,
            })
            return
        }
        send({ status: 'running', inbox_id: inboxId, mode: request.mode })

        let response: GatewayResponse
        try {
            const outcome = await this.container.createSession().run({ text: request.text, mode: request.mode })
            response = outcomeResponse(inboxId, outcome)
        } catch (error) {
            logger.error({ err: error, inboxId }, 'gateway:session-error')
            response = { status: 'failed', inbox_id: inboxId, mode: request.mode, error: errorMessage(error) }
        }

        try {
            this.inbox.setStatus(inboxId, response.status, { responseText: response.text, errorText: response.error })
        } catch (error) {
            logger.error({ err: error, inboxId, status: response.status }, 'gateway:inbox-error')
        }
        send(response)
    }
}
