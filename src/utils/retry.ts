/**
 * Retry Utility
 *
 * Runs an async operation up to `maxAttempts` times with exponential backoff
 * between attempts: baseDelayMs * factor^attempt, capped at maxDelayMs.
 * No wait follows the final attempt; its error is rethrown to the caller.
 *
 * Used by the generation client (1s, 2s, 4s … between model calls) and the
 * webhook notifier (fixed 1s between deliveries, factor 1).
 *
 * Usage:
 *   const text = await withRetry(
 *     () => backend.generate(request),
 *     'groq',
 *     { maxAttempts: 3, baseDelayMs: 1000, factor: 2 }
 *   )
 */

import { errorMessage } from './safe-log.js'

export interface RetryOptions {
    maxAttempts?: number
    baseDelayMs?: number
    factor?: number
    maxDelayMs?: number
}

const DEFAULTS: Required<RetryOptions> = {
    maxAttempts: 3,
    baseDelayMs: 1000,
    factor: 2,
    maxDelayMs: 30_000,
}

export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

export function backoffDelayMs(attempt: number, opts: RetryOptions = {}): number {
    const { baseDelayMs, factor, maxDelayMs } = { ...DEFAULTS, ...opts }
    return Math.min(baseDelayMs * Math.pow(factor, attempt), maxDelayMs)
}

/**
 * @param fn    Receives the zero-based attempt number
 * @param label Short label for log lines (e.g. 'groq', 'n8n-webhook')
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    label: string,
    opts: RetryOptions = {},
): Promise<T> {
    const maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULTS.maxAttempts)
    let lastErr: unknown

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
            return await fn(attempt)
        } catch (err) {
            lastErr = err

            if (attempt === maxAttempts - 1) break

            const waitMs = backoffDelayMs(attempt, opts)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${maxAttempts} failed` +
                ` (${errorMessage(err)}), retrying in ${waitMs}ms`
            )
            await delay(waitMs)
        }
    }

    throw lastErr
}
