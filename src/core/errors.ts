export type ErrorKind = 'transient' | 'permanent'

export class CouncilError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'CouncilError'
        this.kind = kind
    }
}

export class TransientError extends CouncilError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'transient', options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends CouncilError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export class ConfigError extends PermanentError {
    constructor(
        message: string,
        readonly filePath: string,
        options?: ErrorOptions
    ) {
        super(message, options)
        this.name = 'ConfigError'
    }
}

/** Memory or preflight could not be reached. Retrying may help. */
export class CollaboratorUnavailableError extends TransientError {
    constructor(
        readonly collaborator: 'memory' | 'preflight',
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options)
        this.name = 'CollaboratorUnavailableError'
    }
}

/** Raised when something tries to execute a plan the merger blocked. */
export class PlanBlockedError extends PermanentError {
    constructor(reason: string | null) {
        super(`Refusing to execute a blocked plan: ${reason ?? 'no reason given'}`)
        this.name = 'PlanBlockedError'
    }
}

export class ToolTimeoutError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Tool timed out after ${timeoutMs}ms`)
        this.name = 'ToolTimeoutError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof CouncilError) return error.kind
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const { code } = error
        if (code === 'EBUSY' || code === 'EAGAIN' || code === 'EMFILE') return 'transient'
    }
    return 'permanent'
}
