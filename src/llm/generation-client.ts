/**
 * Generation Client — remote text generation with pacing, retry and fallback
 *
 * Per call:
 *   unconfigured → keyword fallback, no network
 *   rate gate    → wait until minIntervalMs has passed since the last dispatch
 *   attempts     → up to maxRetries model calls; empty text or an error is
 *                  retried after backoffBase^attempt seconds (1s, 2s, …)
 *   exhausted    → keyword fallback
 *
 * The gate is shared by every caller of one instance. Slots are reserved
 * synchronously, so overlapping callers queue instead of racing.
 */

import { withRetry, delay } from '../utils/retry.js'
import { errorMessage, safeError } from '../utils/safe-log.js'
import { DEFAULT_FALLBACK_KEYWORDS, fallbackResponse, type FallbackKeywords } from './fallback.js'
import type { GenerationBackend } from './providers.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface GenerateOptions {
    /** Total attempts, not extra retries */
    maxRetries?: number
    temperature?: number
}

export type FallbackReason = 'unconfigured' | 'exhausted'

export interface GenerationResult {
    text: string
    source: 'llm' | 'fallback'
    reason?: FallbackReason
    provider: string
}

/** What the synthesizer depends on; GenerationClient is the real one. */
export interface TextGenerator {
    generate(prompt: string, opts?: GenerateOptions): Promise<GenerationResult>
}

export interface GenerationClientOptions {
    minIntervalMs?: number
    maxRetries?: number
    backoffBase?: number
    backoffUnitMs?: number
    maxOutputTokens?: number
    topP?: number
    temperature?: number
    fallbackKeywords?: FallbackKeywords
}

export interface HealthStatus {
    available: boolean
    reason: string
}

export class EmptyGenerationError extends Error {
    constructor(provider: string) {
        super(`Empty response from ${provider}`)
        this.name = 'EmptyGenerationError'
    }
}

// ─── Client ─────────────────────────────────────────────────────────────────

export class GenerationClient implements TextGenerator {
    private readonly minIntervalMs: number
    private readonly maxRetries: number
    private readonly backoffBase: number
    private readonly backoffUnitMs: number
    private readonly maxOutputTokens: number
    private readonly topP: number
    private readonly temperature: number
    private readonly fallbackKeywords: FallbackKeywords
    private lastDispatchAt = Number.NEGATIVE_INFINITY

    constructor(
        private readonly backend: GenerationBackend | null,
        opts: GenerationClientOptions = {},
    ) {
        this.minIntervalMs = opts.minIntervalMs ?? 1000
        this.maxRetries = opts.maxRetries ?? 3
        this.backoffBase = opts.backoffBase ?? 2
        this.backoffUnitMs = opts.backoffUnitMs ?? 1000
        this.maxOutputTokens = opts.maxOutputTokens ?? 500
        this.topP = opts.topP ?? 0.9
        this.temperature = opts.temperature ?? 0.7
        this.fallbackKeywords = opts.fallbackKeywords ?? DEFAULT_FALLBACK_KEYWORDS
    }

    get configured(): boolean {
        return this.backend !== null
    }

    async generate(prompt: string, opts: GenerateOptions = {}): Promise<GenerationResult> {
        const backend = this.backend
        if (!backend) {
            return this.fallback(prompt, 'unconfigured')
        }

        await this.waitForSlot()

        const request = {
            prompt,
            temperature: opts.temperature ?? this.temperature,
            maxOutputTokens: this.maxOutputTokens,
            topP: this.topP,
        }

        try {
            const text = await withRetry(
                async () => {
                    const raw = await backend.generate(request)
                    const trimmed = raw.trim()
                    if (!trimmed) throw new EmptyGenerationError(backend.name)
                    return trimmed
                },
                backend.name,
                {
                    maxAttempts: opts.maxRetries ?? this.maxRetries,
                    baseDelayMs: this.backoffUnitMs,
                    factor: this.backoffBase,
                },
            )
            return { text, source: 'llm', provider: backend.name }
        } catch (err) {
            console.error(`[LLM] ${backend.name} exhausted, using fallback:`, safeError(err))
            return this.fallback(prompt, 'exhausted')
        }
    }

    /**
     * Probe the backend with a trivial prompt and a single attempt. Fallback
     * text never counts as available.
     */
    async checkHealth(): Promise<HealthStatus> {
        if (!this.backend) {
            return { available: false, reason: 'Client not initialized' }
        }
        try {
            const result = await this.generate('Hello', { maxRetries: 1 })
            const available = result.source === 'llm' && result.text.length > 0
            return { available, reason: available ? 'API working' : 'API not responding properly' }
        } catch (err) {
            return { available: false, reason: `API test failed: ${errorMessage(err)}` }
        }
    }

    private async waitForSlot(): Promise<void> {
        const now = Date.now()
        const slot = Math.max(now, this.lastDispatchAt + this.minIntervalMs)
        this.lastDispatchAt = slot
        if (slot > now) {
            await delay(slot - now)
        }
    }

    private fallback(prompt: string, reason: FallbackReason): GenerationResult {
        return {
            text: fallbackResponse(prompt, this.fallbackKeywords),
            source: 'fallback',
            reason,
            provider: 'local-fallback',
        }
    }
}
