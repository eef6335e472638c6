import { describe, expect, it, vi } from 'vitest'
import { PermanentError, TransientError } from '../../../src/core/errors.js'
import { withRetry } from '../../../src/core/retry.js'

const fast = { maxRetries: 2, baseDelay: 1, maxDelay: 2 }

describe('withRetry', () => {
    it('returns the first success', async () => {
        const fn = vi.fn(async () => 'ok')
        await expect(withRetry(fn, fast)).resolves.toBe('ok')
        expect(fn).toHaveBeenCalledTimes(1)
    })

    it('retries transient errors until success', async () => {
        const onRetry = vi.fn()
        const fn = vi.fn(async (attempt: number) => {
            if (attempt < 2) throw new TransientError('flaky')
            return attempt
        })

        await expect(withRetry(fn, fast, onRetry)).resolves.toBe(2)
        expect(fn).toHaveBeenCalledTimes(3)
        expect(onRetry.mock.calls.map((c) => c[1])).toEqual([1, 2])
    })

    it('gives up after maxRetries', async () => {
        const fn = vi.fn(async () => {
            throw new TransientError('still down')
        })
        await expect(withRetry(fn, fast)).rejects.toThrow('still down')
        expect(fn).toHaveBeenCalledTimes(3)
    })

    it('does not retry permanent errors', async () => {
        const fn = vi.fn(async () => {
            throw new PermanentError('bad input')
        })
        await expect(withRetry(fn, fast)).rejects.toThrow('bad input')
        expect(fn).toHaveBeenCalledTimes(1)
    })
})
