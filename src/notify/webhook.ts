/**
 * Webhook notifier — posts pipeline events to an n8n workflow.
 *
 * Outbound only: the caller learns success or failure as a boolean and
 * nothing else. Every event shares one envelope:
 *
 *   { timestamp, user_id, event_type, data }
 *
 * Success is HTTP 200/201/202. Anything else, a timeout or a network error
 * is retried after a fixed delay, up to maxAttempts in total.
 */

import { withRetry } from '../utils/retry.js'
import { errorMessage, safeError } from '../utils/safe-log.js'

export type WebhookEventType =
    | 'emotion_detected'
    | 'conversation_completed'
    | 'user_analytics'
    | 'connection_test'

export type WebhookData = Record<string, unknown>

export interface WebhookPayload {
    timestamp: string
    user_id: string
    event_type: WebhookEventType
    data: WebhookData
}

/** What the pipeline needs from a notifier; WebhookNotifier is the real one. */
export interface NotificationSink {
    sendEmotionData(userId: string, data: WebhookData): Promise<boolean>
}

export interface ConnectionTestResult {
    connected: boolean
    statusCode?: number
    responseTimeMs?: number
    error?: string
}

export interface WebhookNotifierOptions {
    timeoutMs?: number
    maxAttempts?: number
    retryDelayMs?: number
    fetchImpl?: typeof fetch
}

const SUCCESS_STATUSES = new Set([200, 201, 202])
const USER_AGENT = 'EmpathyCompanion/1.0'

export class WebhookStatusError extends Error {
    constructor(readonly status: number) {
        super(`Webhook responded ${status}`)
        this.name = 'WebhookStatusError'
    }
}

function isTimeout(err: unknown): boolean {
    return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

export class WebhookNotifier implements NotificationSink {
    private readonly timeoutMs: number
    private readonly maxAttempts: number
    private readonly retryDelayMs: number
    private readonly fetchImpl: typeof fetch

    constructor(private readonly url: string | undefined, opts: WebhookNotifierOptions = {}) {
        this.timeoutMs = opts.timeoutMs ?? 5000
        this.maxAttempts = opts.maxAttempts ?? 2
        this.retryDelayMs = opts.retryDelayMs ?? 1000
        this.fetchImpl = opts.fetchImpl ?? fetch

        if (url) {
            console.log('[Webhook] n8n webhook URL configured')
        } else {
            console.warn('[Webhook] No n8n webhook URL found — notifications disabled')
        }
    }

    get configured(): boolean {
        return Boolean(this.url)
    }

    async notify(eventType: WebhookEventType, userId: string, data: WebhookData): Promise<boolean> {
        const url = this.url
        if (!url) return false

        const payload: WebhookPayload = {
            timestamp: new Date().toISOString(),
            user_id: userId,
            event_type: eventType,
            data,
        }

        try {
            await withRetry(
                async () => {
                    const statusCode = await this.post(url, payload)
                    if (!SUCCESS_STATUSES.has(statusCode)) {
                        throw new WebhookStatusError(statusCode)
                    }
                },
                'n8n-webhook',
                { maxAttempts: this.maxAttempts, baseDelayMs: this.retryDelayMs, factor: 1 },
            )
            return true
        } catch (err) {
            console.error(`[Webhook] ${eventType} failed after ${this.maxAttempts} attempt(s):`, safeError(err))
            return false
        }
    }

    sendEmotionData(userId: string, data: WebhookData): Promise<boolean> {
        return this.notify('emotion_detected', userId, data)
    }

    sendConversationSummary(userId: string, data: WebhookData): Promise<boolean> {
        return this.notify('conversation_completed', userId, data)
    }

    sendUserAnalytics(userId: string, data: WebhookData): Promise<boolean> {
        return this.notify('user_analytics', userId, data)
    }

    /** Single unretried probe. */
    async testConnection(): Promise<ConnectionTestResult> {
        const url = this.url
        if (!url) {
            return { connected: false, error: 'No webhook URL configured' }
        }

        const startedAt = Date.now()
        try {
            const statusCode = await this.post(url, {
                timestamp: new Date().toISOString(),
                user_id: 'test_user',
                event_type: 'connection_test',
                data: { message: 'Empathy companion connection test' },
            })
            return {
                connected: SUCCESS_STATUSES.has(statusCode),
                statusCode,
                responseTimeMs: Date.now() - startedAt,
            }
        } catch (err) {
            return { connected: false, error: isTimeout(err) ? 'Connection timeout' : errorMessage(err) }
        }
    }

    /** POST the payload and release the connection; only the status matters. */
    private async post(url: string, payload: WebhookPayload): Promise<number> {
        const resp = await this.fetchImpl(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', 'User-Agent': USER_AGENT },
            body: JSON.stringify(payload),
            signal: AbortSignal.timeout(this.timeoutMs),
        })
        await resp.body?.cancel()
        return resp.status
    }
}
