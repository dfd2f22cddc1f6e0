/**
 * Generation backends — one remote text-generation call each.
 *
 *   groq   → chat completions via groq-sdk (llama-3.3-70b-versatile)
 *   gemini → generateContent REST endpoint (gemini-1.5-flash)
 *
 * Contract: resolve with the raw text (possibly "" when the model answered
 * with nothing), throw on transport/HTTP failure. Retry, pacing and fallback
 * live in GenerationClient, never here.
 */

import Groq from 'groq-sdk'
import { z } from 'zod'
import type { GenerationProviderKind } from '../config.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface GenerationRequest {
    prompt: string
    temperature: number
    maxOutputTokens: number
    topP: number
}

export interface GenerationBackend {
    name: string
    generate: (request: GenerationRequest) => Promise<string>
}

export class ProviderHttpError extends Error {
    constructor(message: string, readonly status: number) {
        super(message)
        this.name = 'ProviderHttpError'
    }
}

export const DEFAULT_MODELS: Record<GenerationProviderKind, string> = {
    groq: 'llama-3.3-70b-versatile',
    gemini: 'gemini-1.5-flash',
}

// ─── Groq ───────────────────────────────────────────────────────────────────

export function makeGroqBackend(apiKey: string, model = DEFAULT_MODELS.groq): GenerationBackend {
    const client = new Groq({ apiKey })
    return {
        name: `groq:${model}`,
        generate: async request => {
            const completion = await client.chat.completions.create({
                model,
                messages: [{ role: 'user', content: request.prompt }],
                max_tokens: request.maxOutputTokens,
                temperature: request.temperature,
                top_p: request.topP,
            })
            return completion.choices[0]?.message?.content ?? ''
        },
    }
}

// ─── Gemini ─────────────────────────────────────────────────────────────────

const GeminiResponseSchema = z.object({
    candidates: z.array(z.object({
        content: z.object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }).optional(),
    })).default([]),
})

export function makeGeminiBackend(
    apiKey: string,
    model = DEFAULT_MODELS.gemini,
    fetchImpl: typeof fetch = fetch,
): GenerationBackend {
    const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent`
    return {
        name: `gemini:${model}`,
        generate: async request => {
            const resp = await fetchImpl(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json', 'x-goog-api-key': apiKey },
                body: JSON.stringify({
                    contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
                    generationConfig: {
                        temperature: request.temperature,
                        maxOutputTokens: request.maxOutputTokens,
                        topP: request.topP,
                    },
                }),
            })

            if (!resp.ok) {
                const err = await resp.text().catch(() => '')
                throw new ProviderHttpError(`Gemini ${resp.status}: ${err.slice(0, 200)}`, resp.status)
            }

            const parsed = GeminiResponseSchema.safeParse(await resp.json())
            if (!parsed.success) return ''
            const parts = parsed.data.candidates[0]?.content?.parts ?? []
            return parts.map(part => part.text ?? '').join('')
        },
    }
}

// ─── Factory ────────────────────────────────────────────────────────────────

export function createGenerationBackend(config: {
    provider?: GenerationProviderKind
    apiKey?: string
    model?: string
}): GenerationBackend | null {
    if (!config.provider || !config.apiKey) {
        console.warn('[LLM] No generation API key configured — replies will use local fallbacks')
        return null
    }
    const backend = config.provider === 'groq'
        ? makeGroqBackend(config.apiKey, config.model)
        : makeGeminiBackend(config.apiKey, config.model)
    console.log(`[LLM] Using ${backend.name}`)
    return backend
}
