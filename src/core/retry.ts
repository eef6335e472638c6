import { classifyError } from './errors.js'

export interface RetryOptions {
    maxRetries: number
    baseDelay: number
    maxDelay: number
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
    maxRetries: 3,
    baseDelay: 200,
    maxDelay: 5000,
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms))
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    opts: RetryOptions = DEFAULT_RETRY_OPTIONS,
    onRetry?: (error: unknown, attempt: number) => void
): Promise<T> {
    for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
        try {
            return await fn(attempt)
        } catch (error) {
            if (classifyError(error) === 'permanent' || attempt === opts.maxRetries) {
                throw error
            }
            onRetry?.(error, attempt + 1)
            const delay = Math.min(opts.baseDelay * 2 ** attempt, opts.maxDelay)
            const jitter = delay * 0.1 * Math.random()
            await sleep(delay + jitter)
        }
    }
    throw new Error('Unreachable')
}
