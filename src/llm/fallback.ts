/**
 * Keyword fallback — the reply used when no generation backend is
 * configured or every attempt failed. Matches the prompt (case-insensitive,
 * substring) against each category in FALLBACK_ORDER; first hit wins.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

export const FALLBACK_ORDER = ['sadness', 'anger', 'fear', 'joy', 'fatigue'] as const
export type FallbackCategory = (typeof FALLBACK_ORDER)[number]
export type FallbackKeywords = Record<FallbackCategory, string[]>

export const DEFAULT_FALLBACK_KEYWORDS: FallbackKeywords = {
    sadness: ['sad', 'depressed', 'down', 'upset'],
    anger: ['angry', 'frustrated', 'mad', 'annoyed'],
    fear: ['anxious', 'worried', 'nervous', 'stressed'],
    joy: ['happy', 'excited', 'joyful', 'great', 'wonderful'],
    fatigue: ['tired', 'exhausted', 'drained', 'overwhelmed'],
}

export const FALLBACK_MESSAGES: Record<FallbackCategory, string> = {
    sadness: "I understand you're going through a tough time. It's okay to feel sad sometimes - these feelings are valid and temporary. Would you like to talk more about what's bothering you? 💙",
    anger: "It sounds like you're feeling frustrated right now. That's completely understandable. Take a deep breath with me. Sometimes talking through what's making us angry can help. I'm here to listen. 🫂",
    fear: "I can sense you're feeling anxious. Anxiety can be overwhelming, but you're not alone in this. Try taking some slow, deep breaths. What's one thing that usually helps you feel calmer? 🌸",
    joy: "I'm so glad to hear you're feeling positive! It's wonderful when we experience joy. What's been the highlight of your day? I'd love to celebrate this moment with you! ✨",
    fatigue: "You sound really tired right now. It's important to acknowledge when we need rest. Have you been taking care of yourself lately? Sometimes we need to slow down and recharge. 🌙",
}

export const GENERIC_FALLBACK = "Thank you for sharing with me. I'm here to listen and support you through whatever you're experiencing. Your feelings matter, and you're not alone. How can I help you today? 🤗"

export function matchFallbackCategory(
    prompt: string,
    keywords: FallbackKeywords = DEFAULT_FALLBACK_KEYWORDS,
): FallbackCategory | null {
    const text = prompt.toLowerCase()
    for (const category of FALLBACK_ORDER) {
        if (keywords[category].some(word => text.includes(word.toLowerCase()))) {
            return category
        }
    }
    return null
}

export function fallbackResponse(prompt: string, keywords: FallbackKeywords = DEFAULT_FALLBACK_KEYWORDS): string {
    const category = matchFallbackCategory(prompt, keywords)
    return category ? FALLBACK_MESSAGES[category] : GENERIC_FALLBACK
}

const KeywordFileSchema = z.object({
    sadness: z.array(z.string().min(1)),
    anger: z.array(z.string().min(1)),
    fear: z.array(z.string().min(1)),
    joy: z.array(z.string().min(1)),
    fatigue: z.array(z.string().min(1)),
}).partial().strict()

/**
 * Keyword tables from a JSON file; categories the file omits keep their
 * defaults. Throws on unreadable or malformed files so startup fails loudly.
 */
export function loadFallbackKeywords(path: string): FallbackKeywords {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
    const parsed = KeywordFileSchema.safeParse(raw)
    if (!parsed.success) {
        throw new Error(`Invalid fallback keyword file ${path}: ${parsed.error.issues[0]?.message ?? 'unknown error'}`)
    }
    return { ...DEFAULT_FALLBACK_KEYWORDS, ...parsed.data }
}
