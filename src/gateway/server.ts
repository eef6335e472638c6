import websocket from '@fastify/websocket'
import Fastify, { type FastifyInstance } from 'fastify'
import { errorMessage } from '../core/errors.js'
import { type Result, err, ok } from '../core/result.js'
import type { Logger } from '../logger/index.js'
import type { InboxStore } from './inbox.js'
import type { GatewayResponse } from './protocol.js'
import type { GatewayRouter } from './router.js'

export interface GatewayServerDeps {
    router: GatewayRouter
    inbox: InboxStore
    logger: Logger
}

function parseMessage(raw: Buffer): Result<unknown> {
    try {
        return ok(JSON.parse(raw.toString('utf8')))
    } catch (error) {
        return err(`Invalid JSON: ${errorMessage(error)}`)
    }
}

export async function createGatewayServer(deps: GatewayServerDeps): Promise<FastifyInstance> {
    const { router, inbox, logger } = deps
    const server = Fastify({ logger: false })

    await server.register(websocket)

    server.get('/health', async () => ({ ok: true }))

    server.get<{ Params: { id: string } }>('/api/inbox/:id', async (request, reply) => {
        const message = inbox.get(request.params.id)
        if (!message) return reply.status(404).send({ error: 'Inbox message not found' })
        return message
    })

    server.get('/ws', { websocket: true }, (socket) => {
        const send = (response: GatewayResponse) => {
            if (socket.readyState === socket.OPEN) socket.send(JSON.stringify(response))
        }

        socket.on('message', (raw: Buffer) => {
            const parsed = parseMessage(raw)
            if (!parsed.ok) {
                send({ status: 'failed', inbox_id: null, mode: 'unknown', error: parsed.error })
                return
            }
            router.handle(parsed.value, send).catch((error: unknown) => {
                logger.error({ err: error }, 'gateway:handle-error')
            })
        })

        socket.on('error', (error: Error) => {
            logger.warn({ err: error }, 'gateway:socket-error')
        })
    })

    server.addHook('onClose', async () => {
        inbox.close()
    })

    return server
}
