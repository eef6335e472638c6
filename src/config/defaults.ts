import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const LOCAL_CONFIG_DIR = '.council'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`
export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/council`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`

type Defaults = Omit<ResolvedConfig, 'projectDir' | 'configDir' | 'memory' | 'gateway'> & {
    memory: Omit<ResolvedConfig['memory'], 'dir'>
    gateway: Omit<ResolvedConfig['gateway'], 'inboxPath'>
}

export const DEFAULT_CONFIG: Defaults = {
    logLevel: 'warn',
    toolTimeoutMs: 5 * 60 * 1000,
    preflight: { enabled: true, timeout: 120_000 },
    memory: { summaryLimit: 10, minImportance: 5, importance: 6 },
    audit: { maxRetries: 3, baseDelay: 200, maxDelay: 5000 },
    gateway: { host: '127.0.0.1', port: 8787 },
}

export function defaultMemoryDir(projectDir: string): string {
    return path.join(projectDir, LOCAL_CONFIG_DIR, 'memory')
}

export function defaultInboxPath(projectDir: string): string {
    return path.join(projectDir, LOCAL_CONFIG_DIR, 'data', 'inbox.db')
}
