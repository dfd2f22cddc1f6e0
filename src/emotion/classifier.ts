/**
 * Emotion Classifier
 *
 * Maps raw text to a discrete emotion label + confidence. Best-effort:
 * trivial input, a missing model, or any model failure all produce the
 * default neutral result instead of an error.
 */

import type { ClassificationScore, EmotionResult, TextClassifier } from '../types/emotion.js'
import { roundTo } from '../utils/round.js'
import { safeError } from '../utils/safe-log.js'

export interface EmotionClassifierOptions {
    /** Trimmed input shorter than this skips the model */
    minLength?: number
    /** Longer input is truncated before classification */
    maxLength?: number
}

export const DEFAULT_MIN_LENGTH = 5
export const DEFAULT_MAX_LENGTH = 512

export function defaultEmotion(): EmotionResult {
    return {
        label: 'neutral',
        confidence: 0.5,
        allScores: [{ label: 'neutral', score: 0.5 }],
        degraded: true,
    }
}

export class EmotionClassifier {
    private readonly minLength: number
    private readonly maxLength: number

    constructor(
        private readonly model: TextClassifier | null,
        opts: EmotionClassifierOptions = {},
    ) {
        this.minLength = opts.minLength ?? DEFAULT_MIN_LENGTH
        this.maxLength = opts.maxLength ?? DEFAULT_MAX_LENGTH
    }

    get configured(): boolean {
        return this.model !== null
    }

    async classify(text: string): Promise<EmotionResult> {
        if (!text || text.trim().length < this.minLength) {
            return defaultEmotion()
        }
        if (!this.model) {
            return defaultEmotion()
        }

        const input = text.length > this.maxLength ? text.slice(0, this.maxLength) : text

        try {
            const scores = normalizeScores(await this.model(input))
            if (scores.length === 0) {
                console.warn('[Emotion] Classifier returned no scores, using neutral default')
                return defaultEmotion()
            }

            return {
                label: scores[0].label,
                confidence: scores[0].score,
                allScores: scores,
                degraded: false,
            }
        } catch (err) {
            console.error('[Emotion] Emotion detection failed:', safeError(err))
            return defaultEmotion()
        }
    }
}

function normalizeScores(raw: ClassificationScore[]): ClassificationScore[] {
    return raw
        .filter(item => typeof item.label === 'string' && item.label.length > 0 && Number.isFinite(item.score))
        .map(item => ({ label: item.label.toLowerCase(), score: roundTo(item.score, 3) }))
        .sort((a, b) => b.score - a.score)
}
