/**
 * Hugging Face inference adapter.
 *
 * Wraps the hosted text-classification task as a TextClassifier so the
 * emotion classifier and both sentiment scorers share one client and stay
 * testable with plain async functions.
 */

import { InferenceClient } from '@huggingface/inference'
import type { ClassificationScore, TextClassifier } from '../types/emotion.js'

/** Returns null when no token is configured; callers then run degraded. */
export function createInferenceClient(apiKey: string | undefined): InferenceClient | null {
    if (!apiKey) {
        console.warn('[Emotion] HF_API_KEY not set — classifiers disabled, using neutral defaults')
        return null
    }
    return new InferenceClient(apiKey)
}

/**
 * @param topK Ask for this many labels (emotion models score 7 classes;
 *             sentiment scorers only need the top one)
 */
export function createHfClassifier(client: InferenceClient, model: string, topK?: number): TextClassifier {
    return async (text: string): Promise<ClassificationScore[]> => {
        const output = await client.textClassification({
            model,
            inputs: text,
            ...(topK ? { parameters: { top_k: topK } } : {}),
        })
        return output.map(item => ({ label: item.label, score: item.score }))
    }
}
