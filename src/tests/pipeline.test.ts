/**
 * End-to-end turns through the real classifier, fuser, generation client,
 * synthesizer and SQLite store. Only the remote models are faked.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { EmotionClassifier } from '../emotion/classifier.js'
import { SentimentFuser } from '../emotion/sentiment-fusion.js'
import { GenerationClient } from '../llm/generation-client.js'
import type { GenerationBackend, GenerationRequest } from '../llm/providers.js'
import { GENERIC_FALLBACK } from '../llm/fallback.js'
import { ResponseSynthesizer } from '../character/response-synthesizer.js'
import { RESPONSE_TEMPLATES } from '../character/templates.js'
import { MemoryStore } from '../memory/store.js'
import { SqliteBackend } from '../memory/sqlite-backend.js'
import { EmpathyPipeline } from '../pipeline/orchestrator.js'
import type { NotificationSink } from '../notify/webhook.js'
import type { EmotionBackend } from '../types/memory.js'
import type { ClassificationScore } from '../types/emotion.js'

const HAPPY_REPLY = 'That is wonderful! I am so happy for you, enjoy every bit of this bright day.'

const joyModel = async (): Promise<ClassificationScore[]> => [
    { label: 'surprise', score: 0.021 },
    { label: 'joy', score: 0.973 },
    { label: 'neutral', score: 0.006 },
]
const positiveBase = async (): Promise<ClassificationScore[]> => [
    { label: 'POSITIVE', score: 0.998 },
    { label: 'NEGATIVE', score: 0.002 },
]
const positiveNuanced = async (): Promise<ClassificationScore[]> => [
    { label: 'positive', score: 0.95 },
    { label: 'neutral', score: 0.04 },
]

function backendReturning(impl: (request: GenerationRequest) => Promise<string>) {
    const generate = vi.fn(impl)
    const backend: GenerationBackend = { name: 'fake', generate }
    return { backend, generate }
}

const silentNotifier: NotificationSink = { sendEmotionData: async () => true }

interface Harness {
    pipeline: EmpathyPipeline
    store: MemoryStore
    generate: ReturnType<typeof backendReturning>['generate']
}

async function harness(opts: {
    backend?: (request: GenerationRequest) => Promise<string>
    storage?: EmotionBackend
    configured?: boolean
} = {}): Promise<Harness> {
    let storage = opts.storage
    if (!storage) {
        storage = new SqliteBackend(':memory:')
        await storage.init()
    }
    const store = new MemoryStore(storage)

    const { backend, generate } = backendReturning(opts.backend ?? (async () => HAPPY_REPLY))
    const configured = opts.configured ?? true

    const pipeline = new EmpathyPipeline({
        classifier: new EmotionClassifier(configured ? joyModel : null),
        fuser: new SentimentFuser({
            base: configured ? positiveBase : null,
            nuanced: configured ? positiveNuanced : null,
        }),
        synthesizer: new ResponseSynthesizer(
            new GenerationClient(configured ? backend : null, { minIntervalMs: 0, backoffUnitMs: 0 }),
            { random: () => 0 },
        ),
        memory: store,
        notifier: silentNotifier,
    })
    return { pipeline, store, generate }
}

describe('pipeline scenarios', () => {
    let store: MemoryStore | undefined

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(async () => {
        await store?.close()
        store = undefined
    })

    it('answers a happy message with a joy reply and records it', async () => {
        const h = await harness()
        store = h.store

        const result = await h.pipeline.processTurn('I am so happy today!', 'session-1', 'user-1')

        expect(result).toEqual({
            response: HAPPY_REPLY,
            emotionDetected: 'positive-joy',
            confidence: 0.9,
            emotionConfidence: 0.973,
            primaryEmotion: 'joy',
            generationMethod: 'llm',
            persisted: true,
        })
        expect(h.generate.mock.calls[0][0].prompt).toContain('celebrating positive emotions')

        const [record] = await h.store.recent('user-1')
        expect(record).toMatchObject({
            userId: 'user-1',
            emotionLabel: 'positive-joy',
            confidence: 0.973,
            messageText: 'I am so happy today!',
            responseText: HAPPY_REPLY,
            sessionId: 'session-1',
        })
    })

    it('feeds earlier turns of the session into the next prompt', async () => {
        const h = await harness()
        store = h.store

        await h.pipeline.processTurn('I am so happy today!', 'session-1', 'user-1')
        await h.pipeline.processTurn('I passed my driving test', 'session-1', 'user-1')

        expect(h.generate.mock.calls[1][0].prompt).toContain(
            `Recent conversation context:\n1. User: I am so happy today!, AI: ${HAPPY_REPLY}`
        )
    })

    it('falls back to a canned template when every generation attempt throws', async () => {
        const h = await harness({
            backend: async () => {
                throw new Error('503 upstream unavailable')
            },
        })
        store = h.store

        const result = await h.pipeline.processTurn('I am so happy today!', 'session-1', 'user-1')

        expect(h.generate).toHaveBeenCalledTimes(3)
        expect(result).toMatchObject({
            response: RESPONSE_TEMPLATES.joy[0],
            generationMethod: 'fallback_template',
            confidence: 0.5,
            persisted: true,
        })
    })

    it('returns the reply unchanged when the store cannot write', async () => {
        const sqlite = new SqliteBackend(':memory:')
        await sqlite.init()
        const failingInsert: EmotionBackend = {
            kind: 'sqlite',
            init: () => sqlite.init(),
            insert: async () => {
                throw new Error('database is locked')
            },
            query: (userId, query) => sqlite.query(userId, query),
            close: () => sqlite.close(),
        }
        const h = await harness({ storage: failingInsert })
        store = h.store

        const result = await h.pipeline.processTurn('I am so happy today!', 'session-1', 'user-1')

        expect(result.persisted).toBe(false)
        expect(result.response).toBe(HAPPY_REPLY)
        expect(result.generationMethod).toBe('llm')
    })

    it('still replies with nothing configured at all', async () => {
        const h = await harness({ configured: false })
        store = h.store

        const result = await h.pipeline.processTurn('Just checking in today', 'session-1', 'user-1')

        expect(result).toEqual({
            response: GENERIC_FALLBACK,
            emotionDetected: 'neutral-neutral',
            confidence: 0.8,
            emotionConfidence: 0.5,
            primaryEmotion: 'neutral',
            generationMethod: 'template',
            persisted: true,
        })
        expect(h.generate).not.toHaveBeenCalled()
    })

    it('treats very short input as neutral without calling the models', async () => {
        const h = await harness()
        store = h.store

        const result = await h.pipeline.processTurn('ok', 'session-1', 'user-1')

        expect(result.emotionDetected).toBe('neutral-neutral')
        expect(result.emotionConfidence).toBe(0.5)
    })
})
