/**
 * Empathy Pipeline — one user turn, end to end.
 *
 *   classify → fuse → session history → synthesize → append → notify
 *
 * Every stage already degrades on its own; the outer catch is the last line
 * that guarantees the caller a reply. Persistence and notification results
 * never change the reply.
 */

import type { EmotionClassifier } from '../emotion/classifier.js'
import type { SentimentFuser } from '../emotion/sentiment-fusion.js'
import type { ResponseSynthesizer } from '../character/response-synthesizer.js'
import { RESPONSE_TEMPLATES } from '../character/templates.js'
import type { MemoryStore } from '../memory/store.js'
import type { NotificationSink } from '../notify/webhook.js'
import type { GenerationMethod, PrimaryEmotion, SynthesisResult } from '../types/emotion.js'
import { safeError } from '../utils/safe-log.js'

export interface TurnResult {
    response: string
    /** Rendered fused label */
    emotionDetected: string
    /** Reply confidence from the synthesizer */
    confidence: number
    /** Classifier confidence, as persisted with the record */
    emotionConfidence: number
    primaryEmotion: PrimaryEmotion
    generationMethod: GenerationMethod
    persisted: boolean
}

export interface PipelineDeps {
    classifier: Pick<EmotionClassifier, 'classify'>
    fuser: Pick<SentimentFuser, 'fuse'>
    synthesizer: Pick<ResponseSynthesizer, 'synthesize'>
    memory: Pick<MemoryStore, 'append' | 'history'>
    notifier: NotificationSink
}

/** Reply used when the turn failed before the synthesizer produced one. */
export const PIPELINE_FALLBACK_REPLY = RESPONSE_TEMPLATES.neutral[0]

export class EmpathyPipeline {
    constructor(private readonly deps: PipelineDeps) {}

    async processTurn(userText: string, sessionId: string, userId: string): Promise<TurnResult> {
        const { classifier, fuser, synthesizer, memory } = this.deps
        let reply: SynthesisResult | null = null
        let emotionConfidence = 0.5

        try {
            const emotion = await classifier.classify(userText)
            emotionConfidence = emotion.confidence

            const fusion = await fuser.fuse(userText, emotion.label)
            const history = await memory.history(userId, sessionId)
            reply = await synthesizer.synthesize(userText, fusion.fused, history)

            const persisted = await memory.append({
                userId,
                emotionLabel: fusion.label,
                confidence: emotion.confidence,
                messageText: userText,
                responseText: reply.response,
                sessionId,
            })

            this.notifyDetected(userId, {
                emotion: fusion.label,
                confidence: emotion.confidence,
                primary_emotion: reply.primaryEmotion,
                generation_method: reply.generationMethod,
                message: userText,
                session_id: sessionId,
            })

            return { ...toTurn(reply, emotionConfidence), persisted }
        } catch (err) {
            console.error('[Pipeline] Turn failed:', safeError(err))
            const fallback: SynthesisResult = reply ?? {
                response: PIPELINE_FALLBACK_REPLY,
                emotionDetected: 'neutral',
                primaryEmotion: 'neutral',
                generationMethod: 'fallback_template',
                confidence: 0.5,
            }
            return { ...toTurn(fallback, emotionConfidence), persisted: false }
        }
    }

    private notifyDetected(userId: string, data: Record<string, unknown>): void {
        this.deps.notifier
            .sendEmotionData(userId, data)
            .catch(err => console.error('[Pipeline] Notification failed:', safeError(err)))
    }
}

function toTurn(reply: SynthesisResult, emotionConfidence: number): Omit<TurnResult, 'persisted'> {
    return {
        response: reply.response,
        emotionDetected: reply.emotionDetected,
        confidence: reply.confidence,
        emotionConfidence,
        primaryEmotion: reply.primaryEmotion,
        generationMethod: reply.generationMethod,
    }
}
