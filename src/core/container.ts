import { createRoster } from '../advisors/roster.js'
import type { Roster } from '../advisors/types.js'
import type { ResolvedConfig } from '../config/schema.js'
import { SessionController } from '../council/session.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { FileMemoryStore } from '../memory/file-store.js'
import type { MemoryStore } from '../memory/types.js'
import { type Preflight, PreflightRunner } from '../preflight/runner.js'
import type { ToolRegistry } from '../tools/registry.js'
import { createToolRegistry } from '../tools/setup.js'
import { runShell } from '../tools/shell/runner.js'
import type { ShellRunner } from '../tools/types.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    roster: Roster
    toolRegistry: ToolRegistry
    memory: MemoryStore
    preflight: Preflight
    /** Every task gets a fresh controller; nothing mutable is shared between them. */
    createSession(): SessionController
    shutdown(): void
}

/** Replaceable collaborators, used by tests and embedders. */
export interface ContainerOverrides {
    logger?: Logger
    fs?: FileSystem
    shell?: ShellRunner
    roster?: Roster
    memory?: MemoryStore
    preflight?: Preflight
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const shell = overrides.shell ?? runShell
    const roster = overrides.roster ?? createRoster()
    const toolRegistry = createToolRegistry(shell)
    const memory = overrides.memory ?? new FileMemoryStore(fs, config.memory, logger)
    const preflight = overrides.preflight ?? new PreflightRunner(config.preflight, fs, logger, shell)

    return {
        config,
        logger,
        eventBus,
        fs,
        roster,
        toolRegistry,
        memory,
        preflight,

        createSession() {
            return new SessionController({
                roster,
                registry: toolRegistry,
                memory,
                preflight,
                fs,
                logger,
                eventBus,
                projectDir: config.projectDir,
                toolTimeoutMs: config.toolTimeoutMs,
                auditImportance: config.memory.importance,
                auditRetry: config.audit,
            })
        },

        shutdown() {
            eventBus.removeAll()
        },
    }
}
