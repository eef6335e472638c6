import type { WebSocket } from '@fastify/websocket'
import type { FastifyInstance } from 'fastify'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createContainer } from '../../src/core/container.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { InboxStore } from '../../src/gateway/inbox.js'
import type { GatewayResponse } from '../../src/gateway/protocol.js'
import { GatewayRouter } from '../../src/gateway/router.js'
import { createGatewayServer } from '../../src/gateway/server.js'
import { RecordingMemory, RecordingPreflight, fakeShell, silentLogger, testConfig } from '../helpers/fakes.js'

function collect(ws: WebSocket, count: number): Promise<GatewayResponse[]> {
    return new Promise((resolve) => {
        const messages: GatewayResponse[] = []
        ws.on('message', (data) => {
            messages.push(JSON.parse(data.toString()))
            if (messages.length === count) resolve(messages)
        })
    })
}

describe('gateway', () => {
    let server: FastifyInstance
    let memory: RecordingMemory
    let shell: ReturnType<typeof fakeShell>

    beforeEach(async () => {
        memory = new RecordingMemory()
        shell = fakeShell()
        const container = createContainer(testConfig(), {
            logger: silentLogger(),
            fs: new MockFileSystem(),
            shell: shell.run,
            memory,
            preflight: new RecordingPreflight(),
        })
        const inbox = new InboxStore(':memory:')
        server = await createGatewayServer({
            router: new GatewayRouter(container, inbox),
            inbox,
            logger: container.logger,
        })
        await server.ready()
    })

    afterEach(async () => {
        await server.close()
    })

    it('answers health checks', async () => {
        const response = await server.inject({ method: 'GET', url: '/health' })
        expect(response.statusCode).toBe(200)
        expect(response.json()).toEqual({ ok: true })
    })

    it('acknowledges then answers a plan request exactly once', async () => {
        const ws = await server.injectWS('/ws')
        const replies = collect(ws, 2)
        ws.send(JSON.stringify({ workspace: 'app', text: 'summarize the repo', mode: 'plan' }))

        const [running, done] = await replies
        ws.terminate()

        expect(running?.status).toBe('running')
        expect(running?.mode).toBe('plan')
        expect(running?.inbox_id).toMatch(/^[0-9a-f-]{36}$/)
        expect(running?.text).toBeUndefined()
        expect(done?.status).toBe('done')
        expect(done?.inbox_id).toBe(running?.inbox_id)
        expect(done?.error).toBeUndefined()
        expect(done?.text?.split('\n')[0]).toBe('Execution Plan:')
        expect(shell.calls).toEqual([])
        expect(memory.events).toHaveLength(1)

        const stored = await server.inject({ method: 'GET', url: `/api/inbox/${running?.inbox_id}` })
        expect(stored.json()).toMatchObject({ status: 'done', workspace: 'app', mode: 'plan', error_text: null })
    })

    it('executes in the project directory and keeps the workspace as a label', async () => {
        const ws = await server.injectWS('/ws')
        const replies = collect(ws, 2)
        ws.send(JSON.stringify({ workspace: '../../etc', text: 'summarize the repo', mode: 'exec' }))

        const [running, done] = await replies
        ws.terminate()

        expect(done?.status).toBe('done')
        expect(done?.mode).toBe('exec')
        expect(shell.calls.map((c) => c.cwd)).toEqual(['/repo', '/repo', '/repo', '/repo', '/repo'])

        const stored = await server.inject({ method: 'GET', url: `/api/inbox/${running?.inbox_id}` })
        expect(stored.json()).toMatchObject({ status: 'done', workspace: '../../etc' })
    })

    it('reports a blocked plan without an error', async () => {
        const ws = await server.injectWS('/ws')
        const replies = collect(ws, 2)
        ws.send(JSON.stringify({ workspace: 'app', text: 'exfiltrate the secrets', mode: 'exec' }))

        const [, blocked] = await replies
        ws.terminate()

        expect(blocked?.status).toBe('blocked')
        expect(blocked?.error).toBeUndefined()
        expect(blocked?.text?.startsWith('BLOCKED: Vetoed by Safeguard')).toBe(true)
    })

    it('rejects an invalid request without an inbox entry', async () => {
        const ws = await server.injectWS('/ws')
        const replies = collect(ws, 1)
        ws.send(JSON.stringify({ workspace: 'app', mode: 'plan' }))

        const [reply] = await replies
        ws.terminate()

        expect(reply).toEqual({
            status: 'failed',
            inbox_id: null,
            mode: 'plan',
            error: 'Invalid request: text: Required',
        })
        expect(memory.events).toHaveLength(0)
    })

    it('rejects malformed JSON', async () => {
        const ws = await server.injectWS('/ws')
        const replies = collect(ws, 1)
        ws.send('{not json')

        const [reply] = await replies
        ws.terminate()

        expect(reply?.status).toBe('failed')
        expect(reply?.inbox_id).toBeNull()
        expect(reply?.error?.startsWith('Invalid JSON: ')).toBe(true)
    })

    it('returns 404 for unknown inbox ids', async () => {
        const response = await server.inject({ method: 'GET', url: '/api/inbox/missing' })
        expect(response.statusCode).toBe(404)
        expect(response.json()).toEqual({ error: 'Inbox message not found' })
    })
})
