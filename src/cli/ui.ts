import pc from 'picocolors'
import type { SessionStatus } from '../core/types.js'

export const VERSION = '0.1.0'

export const colors = {
    brand: (text: string) => pc.magenta(pc.bold(text)),
    success: (text: string) => pc.green(text),
    error: (text: string) => pc.red(text),
    warn: (text: string) => pc.yellow(text),
    dim: (text: string) => pc.dim(text),
}

export function banner(): string {
    return `${colors.brand('Council')} ${colors.dim(`v${VERSION}`)}`
}

export function formatError(message: string): string {
    return `${colors.error('Error:')} ${message}`
}

const STATUS_COLORS: Record<SessionStatus, (text: string) => string> = {
    planned: colors.success,
    completed: colors.success,
    blocked: colors.warn,
    failed: colors.error,
    error: colors.error,
}

export function formatStatus(status: SessionStatus): string {
    return STATUS_COLORS[status](`status: ${status}`)
}
