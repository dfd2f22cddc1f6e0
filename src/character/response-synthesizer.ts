/**
 * Response Synthesizer — fused label + history → one empathetic reply.
 *
 *   label → primary emotion → prompt → generator → filterOutput → confidence
 *
 * Method reported with each reply:
 *   llm               model text that passed the filter (possibly truncated)
 *   template          keyword fallback from an unconfigured generator, or a
 *                     canned template swapped in by the filter
 *   fallback_template generation exhausted its attempts, or anything threw;
 *                     confidence is pinned to 0.5
 */

import { formatFusedLabel, parseFusedLabel, primaryEmotionOf } from '../emotion/fused-label.js'
import type { TextGenerator } from '../llm/generation-client.js'
import { buildEmpathyPrompt } from '../llm/prompts/empathyPrompts.js'
import type {
    ConversationTurn,
    FusedLabel,
    GenerationMethod,
    PrimaryEmotion,
    SynthesisResult,
} from '../types/emotion.js'
import { roundTo } from '../utils/round.js'
import { safeError } from '../utils/safe-log.js'
import { filterOutput } from './output-filter.js'
import { CONFIDENCE_KEYWORDS, pickTemplate } from './templates.js'

export const GENERATION_TEMPERATURE = 0.7
export const FALLBACK_CONFIDENCE = 0.5

export interface ResponseSynthesizerOptions {
    /** Template selection source; [0, 1) like Math.random */
    random?: () => number
}

export function responseConfidence(response: string, primary: PrimaryEmotion): number {
    let confidence = 0.7
    if (response.length > 50) confidence += 0.1

    const lower = response.toLowerCase()
    if (CONFIDENCE_KEYWORDS[primary].some(keyword => lower.includes(keyword))) {
        confidence += 0.1
    }
    return roundTo(Math.min(confidence, 1.0), 2)
}

export class ResponseSynthesizer {
    private readonly random: () => number

    constructor(
        private readonly generator: TextGenerator,
        opts: ResponseSynthesizerOptions = {},
    ) {
        this.random = opts.random ?? Math.random
    }

    async synthesize(
        userText: string,
        fusedLabel: FusedLabel | string,
        history: ConversationTurn[] = [],
    ): Promise<SynthesisResult> {
        const fused = typeof fusedLabel === 'string' ? parseFusedLabel(fusedLabel) : fusedLabel
        const rendered = formatFusedLabel(fused)
        const primary = primaryEmotionOf(fused)

        try {
            const prompt = buildEmpathyPrompt(userText, rendered, primary, history)
            const result = await this.generator.generate(prompt, { temperature: GENERATION_TEMPERATURE })

            if (result.source === 'fallback' && result.reason === 'exhausted') {
                return this.fallbackResult(rendered, primary)
            }

            const output = filterOutput(result.text, primary, this.random)
            const method: GenerationMethod =
                result.source === 'fallback' || output.replaced ? 'template' : 'llm'

            return {
                response: output.filtered,
                emotionDetected: rendered,
                primaryEmotion: primary,
                generationMethod: method,
                confidence: responseConfidence(output.filtered, primary),
            }
        } catch (err) {
            console.error('[Synthesizer] Response generation failed:', safeError(err))
            return this.fallbackResult(rendered, primary)
        }
    }

    private fallbackResult(rendered: string, primary: PrimaryEmotion): SynthesisResult {
        return {
            response: pickTemplate(primary, this.random),
            emotionDetected: rendered,
            primaryEmotion: primary,
            generationMethod: 'fallback_template',
            confidence: FALLBACK_CONFIDENCE,
        }
    }
}
