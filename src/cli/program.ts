import path from 'node:path'
import * as clack from '@clack/prompts'
import { Command } from 'commander'
import { loadConfig } from '../config/loader.js'
import type { Config } from '../config/schema.js'
import { createContainer } from '../core/container.js'
import { ConfigError, errorMessage } from '../core/errors.js'
import { NodeFileSystem } from '../core/fs.js'
import { InboxStore } from '../gateway/inbox.js'
import { GatewayRouter } from '../gateway/router.js'
import { createGatewayServer } from '../gateway/server.js'
import { createToolRegistry } from '../tools/setup.js'
import { EXIT_INTERNAL, invoke } from './invoke.js'
import { createProgressTracker } from './progress.js'
import { VERSION, banner, colors, formatError, formatStatus } from './ui.js'

interface RunOptions {
    planOnly?: boolean
    repo?: string
    debug?: boolean
}

interface GatewayOptions {
    host?: string
    port?: string
    repo?: string
    debug?: boolean
}

function reportFailure(error: unknown): number {
    const message = error instanceof ConfigError ? `Configuration: ${error.message}` : errorMessage(error)
    console.error(formatError(message))
    return EXIT_INTERNAL
}

async function runTask(words: string[], options: RunOptions): Promise<number> {
    const fs = new NodeFileSystem()
    const repoPath = path.resolve(options.repo ?? process.cwd())
    const config = await loadConfig({
        fs,
        projectDir: repoPath,
        cliFlags: { logLevel: options.debug ? 'debug' : undefined },
    })
    const container = createContainer(config)

    const interactive = Boolean(process.stdout.isTTY) && !options.debug
    const spinner = interactive ? clack.spinner() : null
    const tracker = spinner ? createProgressTracker(container.eventBus, spinner) : null
    spinner?.start('Starting session...')

    try {
        const output: string[] = []
        const { exitCode, outcome } = await invoke(
            { taskText: words.join(' '), repoPath, planOnly: Boolean(options.planOnly) },
            container,
            { out: (text) => output.push(text) }
        )
        spinner?.stop(formatStatus(outcome.status))
        for (const text of output) console.log(text)
        if (!outcome.audited) console.error(formatError('audit record could not be written to memory'))
        return exitCode
    } finally {
        tracker?.dispose()
        container.shutdown()
    }
}

async function startGateway(options: GatewayOptions): Promise<void> {
    const fs = new NodeFileSystem()
    const gateway: NonNullable<Config['gateway']> = {}
    if (options.host) gateway.host = options.host
    if (options.port) gateway.port = Number(options.port)

    const config = await loadConfig({
        fs,
        projectDir: options.repo,
        cliFlags: { logLevel: options.debug ? 'debug' : undefined, gateway },
    })
    const container = createContainer(config)

    await fs.mkdir(path.dirname(config.gateway.inboxPath))
    const inbox = new InboxStore(config.gateway.inboxPath)
    const router = new GatewayRouter(container, inbox)
    const server = await createGatewayServer({ router, inbox, logger: container.logger })

    const shutdown = () => {
        server
            .close()
            .then(() => container.shutdown())
            .catch((error: unknown) => container.logger.error({ err: error }, 'gateway:close-error'))
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)

    await server.listen({ host: config.gateway.host, port: config.gateway.port })
    console.error(`${banner()} ${colors.dim(`gateway listening on ${config.gateway.host}:${config.gateway.port}`)}`)
}

export function createProgram(): Command {
    const program = new Command()

    program.name('council').description('Advisor council: deliberate, merge and execute plans').version(VERSION)

    program
        .command('run <task...>', { isDefault: true })
        .description('Deliberate on a task and execute the merged plan')
        .option('--plan-only', 'Print the merged plan without executing it')
        .option('-r, --repo <path>', 'Repository to work in (defaults to the current directory)')
        .option('--debug', 'Enable debug logging')
        .action(async (words: string[], options: RunOptions) => {
            try {
                process.exitCode = await runTask(words, options)
            } catch (error) {
                process.exitCode = reportFailure(error)
            }
        })

    program
        .command('gateway')
        .description('Serve the realtime websocket entry point')
        .option('--host <host>', 'Interface to bind')
        .option('-p, --port <port>', 'Port to listen on')
        .option('-r, --repo <path>', 'Base directory workspaces resolve against')
        .option('--debug', 'Enable debug logging')
        .action(async (options: GatewayOptions) => {
            try {
                await startGateway(options)
            } catch (error) {
                process.exitCode = reportFailure(error)
            }
        })

    program
        .command('tools')
        .description('List registered action types and their parameter schemas')
        .action(() => {
            console.log(JSON.stringify(createToolRegistry().getDefinitions(), null, 2))
        })

    return program
}
