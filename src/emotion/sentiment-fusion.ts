/**
 * Sentiment Fuser
 *
 * Two independent polarity scorers ("base" and "nuanced") are each reduced
 * to {label, confidence}, combined into one polarity, then joined with the
 * classifier's emotion label:
 *
 *   "I lost my job"  →  base negative 0.97, nuanced negative 0.81
 *                    →  "negative" + "sadness"  →  "negative-sadness"
 *
 * Combination priority: confident base (> 0.8) → confident nuanced (> 0.8)
 * → agreement → higher confidence (ties go to base).
 */

import type { FusedLabel, FusionResult, SentimentScore, TextClassifier } from '../types/emotion.js'
import { roundTo } from '../utils/round.js'
import { safeError } from '../utils/safe-log.js'
import { formatFusedLabel } from './fused-label.js'

export const CONFIDENT_THRESHOLD = 0.8
const MIN_TEXT_LENGTH = 3
const MAX_TEXT_LENGTH = 512

/** Legacy label ids emitted by the Cardiff twitter-roberta checkpoints */
const NUANCED_LABELS = new Map<string, string>([
    ['LABEL_0', 'negative'],
    ['LABEL_1', 'neutral'],
    ['LABEL_2', 'positive'],
])

export interface SentimentScorers {
    base: TextClassifier | null
    nuanced: TextClassifier | null
}

export interface SentimentAnalysis {
    base: SentimentScore
    nuanced: SentimentScore
    combined: string
    /** Neither scorer produced a real answer */
    degraded: boolean
}

function neutralScore(): SentimentScore {
    return { label: 'neutral', confidence: 0.5 }
}

export function combineSentiments(base: SentimentScore, nuanced: SentimentScore): string {
    if (base.confidence > CONFIDENT_THRESHOLD) return base.label
    if (nuanced.confidence > CONFIDENT_THRESHOLD) return nuanced.label
    if (base.label === nuanced.label) return base.label
    return base.confidence >= nuanced.confidence ? base.label : nuanced.label
}

export class SentimentFuser {
    constructor(private readonly scorers: SentimentScorers) {}

    async analyze(text: string): Promise<SentimentAnalysis> {
        if (!text || text.trim().length < MIN_TEXT_LENGTH) {
            return { base: neutralScore(), nuanced: neutralScore(), combined: 'neutral', degraded: true }
        }

        const input = text.length > MAX_TEXT_LENGTH ? text.slice(0, MAX_TEXT_LENGTH) : text
        const [base, nuanced] = await Promise.all([
            this.score(this.scorers.base, input, 'base'),
            this.score(this.scorers.nuanced, input, 'nuanced'),
        ])

        return {
            base: base.score,
            nuanced: nuanced.score,
            combined: combineSentiments(base.score, nuanced.score),
            degraded: !base.ok && !nuanced.ok,
        }
    }

    /**
     * Fused label for `text`. Never throws and never returns an empty label;
     * without an emotion label the bare polarity is returned.
     */
    async fuse(text: string, emotionLabel?: string | null): Promise<FusionResult> {
        const emotion = emotionLabel ? emotionLabel : null
        try {
            const analysis = await this.analyze(text)
            const fused: FusedLabel = { polarity: analysis.combined, emotion }
            return {
                label: formatFusedLabel(fused),
                fused,
                base: analysis.base,
                nuanced: analysis.nuanced,
                degraded: analysis.degraded,
            }
        } catch (err) {
            console.error('[Sentiment] Sentiment fusion failed:', safeError(err))
            const fused: FusedLabel = { polarity: 'neutral', emotion }
            return {
                label: formatFusedLabel(fused),
                fused,
                base: neutralScore(),
                nuanced: neutralScore(),
                degraded: true,
            }
        }
    }

    private async score(
        scorer: TextClassifier | null,
        text: string,
        which: 'base' | 'nuanced',
    ): Promise<{ score: SentimentScore; ok: boolean }> {
        if (!scorer) return { score: neutralScore(), ok: false }

        try {
            const results = await scorer(text)
            const top = results
                .filter(item => Number.isFinite(item.score))
                .reduce<SentimentScore | null>((best, item) => {
                    if (best && best.confidence >= item.score) return best
                    return { label: item.label, confidence: item.score }
                }, null)
            if (!top) return { score: neutralScore(), ok: false }

            return {
                score: {
                    label: NUANCED_LABELS.get(top.label) ?? top.label.toLowerCase(),
                    confidence: roundTo(top.confidence, 3),
                },
                ok: true,
            }
        } catch (err) {
            console.warn(`[Sentiment] ${which} scorer failed:`, safeError(err))
            return { score: neutralScore(), ok: false }
        }
    }
}
