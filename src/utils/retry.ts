/**
 * HTTP Retry Utility
 *
 * Wraps upstream calls with exponential backoff.
 * Retries on transient failures: rate limits (429), server errors
 * (500/502/503/504), and network-level errors (ECONNRESET, ETIMEDOUT,
 * fetch failed, aborted timeouts).
 *
 * Defaults:
 *   retries: 1  (2 total attempts)
 *   baseDelayMs: 500
 *   maxDelayMs: 5000
 *
 * Usage:
 *   const body = await withRetry(
 *     () => getJson(url),
 *     'openweather-current'
 *   )
 */

export const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504])

export interface RetryOptions {
    retries?: number
    baseDelayMs?: number
    maxDelayMs?: number
}

/** Non-2xx response surfaced as an error so the retry policy can inspect it */
export class HttpStatusError extends Error {
    constructor(readonly status: number, readonly label: string) {
        super(`${label} responded with HTTP ${status}`)
        this.name = 'HttpStatusError'
    }
}

function statusOf(err: unknown): number | null {
    if (err instanceof HttpStatusError) return err.status
    if (err && typeof err === 'object' && 'status' in err && typeof err.status === 'number') {
        return err.status
    }
    return null
}

export function isRetryable(err: unknown): boolean {
    const status = statusOf(err)
    if (status !== null) return RETRYABLE_STATUS.has(status)

    if (err instanceof Error) {
        if (err.name === 'TimeoutError' || err.name === 'AbortError') return true
        const msg = err.message
        return (
            msg.includes('ECONNRESET') ||
            msg.includes('ETIMEDOUT') ||
            msg.includes('ENOTFOUND') ||
            msg.includes('fetch failed') ||
            msg.includes('socket hang up')
        )
    }
    return false
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retry an async call with exponential backoff.
 *
 * @param fn    Zero-argument async function wrapping the upstream call
 * @param label Short label for log lines (e.g. 'openweather-forecast')
 */
export async function withRetry<T>(fn: () => Promise<T>, label: string, options: RetryOptions = {}): Promise<T> {
    const retries = options.retries ?? 1
    const baseDelayMs = options.baseDelayMs ?? 500
    const maxDelayMs = options.maxDelayMs ?? 5000
    let lastErr: unknown

    for (let attempt = 0; attempt <= retries; attempt++) {
        try {
            return await fn()
        } catch (err) {
            lastErr = err

            if (attempt === retries || !isRetryable(err)) {
                throw err
            }

            const waitMs = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${retries + 1} failed` +
                ` (status: ${statusOf(err) ?? '?'}), retrying in ${waitMs}ms`
            )
            await delay(waitMs)
        }
    }

    throw lastErr
}
