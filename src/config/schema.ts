import { z } from 'zod'

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Largest delay a Node timer honours; longer ones fire at once. */
export const MAX_TIMEOUT_MS = 2_147_483_647

export const ConfigSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).optional(),
    toolTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
    preflight: z
        .object({
            enabled: z.boolean().optional(),
            command: z.string().min(1).optional(),
            timeout: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
        })
        .strict()
        .optional(),
    memory: z
        .object({
            dir: z.string().min(1).optional(),
            summaryLimit: z.number().int().positive().optional(),
            minImportance: z.number().int().min(1).max(10).optional(),
            importance: z.number().int().min(1).max(10).optional(),
        })
        .strict()
        .optional(),
    audit: z
        .object({
            maxRetries: z.number().int().min(0).optional(),
            baseDelay: z.number().int().min(0).optional(),
            maxDelay: z.number().int().min(0).optional(),
        })
        .strict()
        .optional(),
    gateway: z
        .object({
            host: z.string().min(1).optional(),
            port: z.number().int().min(0).max(65535).optional(),
            inboxPath: z.string().min(1).optional(),
        })
        .strict()
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    logLevel: LogLevel
    toolTimeoutMs: number
    preflight: { enabled: boolean; command?: string; timeout: number }
    memory: { dir: string; summaryLimit: number; minImportance: number; importance: number }
    audit: { maxRetries: number; baseDelay: number; maxDelay: number }
    gateway: { host: string; port: number; inboxPath: string }
    projectDir: string
    configDir: string
}
