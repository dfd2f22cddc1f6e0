/**
 * Emotion Pipeline Types
 *
 * Shared shapes for the understanding half of a turn:
 *   classifier → EmotionResult
 *   fuser      → SentimentScore ×2 → FusedLabel
 *   synthesizer → SynthesisResult
 */

// ═══════════════════════════════════════════════════════════════════════════
// 1. CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

/** One (label, score) pair as returned by a text-classification model. */
export interface ClassificationScore {
    label: string
    score: number
}

/**
 * Any text-classification model. Resolves to every label the model scored,
 * in whatever order the model returned them.
 */
export type TextClassifier = (text: string) => Promise<ClassificationScore[]>

export interface EmotionResult {
    label: string
    /** 0–1, rounded to 3 decimals */
    confidence: number
    /** Sorted descending by score */
    allScores: ClassificationScore[]
    /**
     * True when no model answer backs this result (input too short,
     * classifier not configured, or the call failed).
     */
    degraded: boolean
}

// ═══════════════════════════════════════════════════════════════════════════
// 2. SENTIMENT FUSION
// ═══════════════════════════════════════════════════════════════════════════

export interface SentimentScore {
    label: string
    confidence: number
}

/**
 * Polarity plus optional fine-grained emotion. Rendered for storage and
 * display as "<polarity>-<emotion>" (see fused-label.ts).
 */
export interface FusedLabel {
    polarity: string
    emotion: string | null
}

export interface FusionResult {
    /** Rendered fused label, never empty */
    label: string
    fused: FusedLabel
    base: SentimentScore
    nuanced: SentimentScore
    degraded: boolean
}

/** Template buckets the synthesizer selects from. */
export const PRIMARY_EMOTIONS = ['sadness', 'anger', 'fear', 'joy', 'neutral'] as const
export type PrimaryEmotion = (typeof PRIMARY_EMOTIONS)[number]

// ═══════════════════════════════════════════════════════════════════════════
// 3. RESPONSE SYNTHESIS
// ═══════════════════════════════════════════════════════════════════════════

/** One earlier exchange, oldest first when passed as history. */
export interface ConversationTurn {
    user: string
    ai: string
}

export type GenerationMethod = 'llm' | 'template' | 'fallback_template'

export interface SynthesisResult {
    response: string
    emotionDetected: string
    primaryEmotion: PrimaryEmotion
    generationMethod: GenerationMethod
    confidence: number
}
