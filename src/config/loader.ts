import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { formatZodIssues } from '../core/validation.js'
import {
    CONFIG_DIR,
    DEFAULT_CONFIG,
    GLOBAL_CONFIG_FILE,
    LOCAL_CONFIG_FILE,
    defaultInboxPath,
    defaultMemoryDir,
} from './defaults.js'
import { type Config, ConfigSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON<unknown>(filePath)
    } catch (error) {
        throw new ConfigError(`Config file is not valid JSON: ${errorMessage(error)}`, filePath, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`Invalid config in ${filePath}: ${formatZodIssues(parsed.error)}`, filePath)
    }
    return parsed.data
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const raw: Record<string, unknown> = {}
    if (env.COUNCIL_LOG_LEVEL) raw.logLevel = env.COUNCIL_LOG_LEVEL
    if (env.COUNCIL_TOOL_TIMEOUT_MS) raw.toolTimeoutMs = Number(env.COUNCIL_TOOL_TIMEOUT_MS)
    if (env.COUNCIL_GATEWAY_PORT) raw.gateway = { port: Number(env.COUNCIL_GATEWAY_PORT) }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`Invalid COUNCIL_* environment: ${formatZodIssues(parsed.error)}`, 'environment')
    }
    return parsed.data
}

function flagConfig(flags: Config): Config {
    const parsed = ConfigSchema.safeParse(flags)
    if (!parsed.success) {
        throw new ConfigError(`Invalid command-line option: ${formatZodIssues(parsed.error)}`, 'command line')
    }
    return parsed.data
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.toolTimeoutMs !== undefined) merged.toolTimeoutMs = cfg.toolTimeoutMs
        if (cfg.preflight) merged.preflight = { ...merged.preflight, ...cfg.preflight }
        if (cfg.memory) merged.memory = { ...merged.memory, ...cfg.memory }
        if (cfg.audit) merged.audit = { ...merged.audit, ...cfg.audit }
        if (cfg.gateway) merged.gateway = { ...merged.gateway, ...cfg.gateway }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, env = process.env } = options
    const projectDir = path.resolve(options.projectDir ?? process.cwd())

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), flagConfig(cliFlags))

    return {
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        toolTimeoutMs: merged.toolTimeoutMs ?? DEFAULT_CONFIG.toolTimeoutMs,
        preflight: { ...DEFAULT_CONFIG.preflight, ...merged.preflight },
        memory: {
            ...DEFAULT_CONFIG.memory,
            ...merged.memory,
            dir: merged.memory?.dir ? path.resolve(projectDir, merged.memory.dir) : defaultMemoryDir(projectDir),
        },
        audit: { ...DEFAULT_CONFIG.audit, ...merged.audit },
        gateway: {
            ...DEFAULT_CONFIG.gateway,
            ...merged.gateway,
            inboxPath: merged.gateway?.inboxPath
                ? path.resolve(projectDir, merged.gateway.inboxPath)
                : defaultInboxPath(projectDir),
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
