import type { ZodSchema } from 'zod'
import type { FileSystem } from '../core/fs.js'

export interface ToolContext {
    fs: FileSystem
    cwd: string
    /** Aborted when the executor gives up on the call (timeout). */
    signal: AbortSignal
}

/**
 * Handler for one action type. `name` is the action `type` it serves.
 * Resolving means success; throwing means the step failed.
 */
export interface Tool<TInput = unknown, TOutput = unknown> {
    name: string
    description: string
    parameters: ZodSchema<TInput>
    execute(input: TInput, ctx: ToolContext): Promise<TOutput>
}

export type AnyTool = Tool<unknown, unknown>

export interface CommandOutput {
    command: string
    exitCode: number
    stdout: string
    stderr: string
    /** Set when the process never exited on its own, e.g. it could not spawn or was cancelled. */
    reason?: string
}

export type ShellRunner = (command: string, opts: { cwd: string; signal?: AbortSignal }) => Promise<CommandOutput>
