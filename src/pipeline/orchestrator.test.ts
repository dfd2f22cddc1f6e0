import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EmpathyPipeline, PIPELINE_FALLBACK_REPLY, type PipelineDeps } from './orchestrator.js'
import type { EmotionResult, FusionResult, SynthesisResult } from '../types/emotion.js'

const EMOTION: EmotionResult = {
    label: 'joy',
    confidence: 0.973,
    allScores: [{ label: 'joy', score: 0.973 }],
    degraded: false,
}

const FUSION: FusionResult = {
    label: 'positive-joy',
    fused: { polarity: 'positive', emotion: 'joy' },
    base: { label: 'positive', confidence: 0.998 },
    nuanced: { label: 'positive', confidence: 0.95 },
    degraded: false,
}

const REPLY: SynthesisResult = {
    response: 'That is wonderful news, enjoy it!',
    emotionDetected: 'positive-joy',
    primaryEmotion: 'joy',
    generationMethod: 'llm',
    confidence: 0.8,
}

function makeDeps() {
    const mocks = {
        classify: vi.fn<PipelineDeps['classifier']['classify']>().mockResolvedValue(EMOTION),
        fuse: vi.fn<PipelineDeps['fuser']['fuse']>().mockResolvedValue(FUSION),
        synthesize: vi.fn<PipelineDeps['synthesizer']['synthesize']>().mockResolvedValue(REPLY),
        history: vi.fn<PipelineDeps['memory']['history']>().mockResolvedValue([{ user: 'hey', ai: 'hello!' }]),
        append: vi.fn<PipelineDeps['memory']['append']>().mockResolvedValue(true),
        sendEmotionData: vi.fn<PipelineDeps['notifier']['sendEmotionData']>().mockResolvedValue(true),
    }
    const deps: PipelineDeps = {
        classifier: { classify: mocks.classify },
        fuser: { fuse: mocks.fuse },
        synthesizer: { synthesize: mocks.synthesize },
        memory: { history: mocks.history, append: mocks.append },
        notifier: { sendEmotionData: mocks.sendEmotionData },
    }
    return { deps, mocks }
}

describe('EmpathyPipeline.processTurn', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    it('runs every stage in order and returns the reply', async () => {
        const { deps, mocks } = makeDeps()

        const result = await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(result).toEqual({
            response: 'That is wonderful news, enjoy it!',
            emotionDetected: 'positive-joy',
            confidence: 0.8,
            emotionConfidence: 0.973,
            primaryEmotion: 'joy',
            generationMethod: 'llm',
            persisted: true,
        })
        expect(mocks.fuse).toHaveBeenCalledWith('I got the job!', 'joy')
        expect(mocks.history).toHaveBeenCalledWith('user-1', 'session-1')
        expect(mocks.synthesize).toHaveBeenCalledWith(
            'I got the job!',
            { polarity: 'positive', emotion: 'joy' },
            [{ user: 'hey', ai: 'hello!' }],
        )
    })

    it('persists the fused label with the classifier confidence', async () => {
        const { deps, mocks } = makeDeps()

        await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(mocks.append).toHaveBeenCalledWith({
            userId: 'user-1',
            emotionLabel: 'positive-joy',
            confidence: 0.973,
            messageText: 'I got the job!',
            responseText: 'That is wonderful news, enjoy it!',
            sessionId: 'session-1',
        })
    })

    it('notifies emotion_detected with the turn data', async () => {
        const { deps, mocks } = makeDeps()

        await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(mocks.sendEmotionData).toHaveBeenCalledWith('user-1', {
            emotion: 'positive-joy',
            confidence: 0.973,
            primary_emotion: 'joy',
            generation_method: 'llm',
            message: 'I got the job!',
            session_id: 'session-1',
        })
    })

    it('reports a failed write without changing the reply', async () => {
        const { deps, mocks } = makeDeps()
        mocks.append.mockResolvedValue(false)

        const result = await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(result.persisted).toBe(false)
        expect(result.response).toBe(REPLY.response)
    })

    it('does not wait for the notification', async () => {
        const { deps, mocks } = makeDeps()
        mocks.sendEmotionData.mockReturnValue(new Promise(() => {}))

        const result = await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(result.persisted).toBe(true)
    })

    it('logs a rejected notification and still returns the reply', async () => {
        const { deps, mocks } = makeDeps()
        mocks.sendEmotionData.mockRejectedValue(new Error('webhook down'))

        const result = await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(result.response).toBe(REPLY.response)
        await vi.waitFor(() => {
            expect(console.error).toHaveBeenCalledWith('[Pipeline] Notification failed:', expect.any(Error))
        })
    })

    it('returns the canned neutral reply when a stage throws before a reply exists', async () => {
        const { deps, mocks } = makeDeps()
        mocks.classify.mockRejectedValue(new Error('boom'))

        const result = await new EmpathyPipeline(deps).processTurn('hello there', 'session-1', 'user-1')

        expect(result).toEqual({
            response: PIPELINE_FALLBACK_REPLY,
            emotionDetected: 'neutral',
            confidence: 0.5,
            emotionConfidence: 0.5,
            primaryEmotion: 'neutral',
            generationMethod: 'fallback_template',
            persisted: false,
        })
        expect(mocks.append).not.toHaveBeenCalled()
        expect(mocks.sendEmotionData).not.toHaveBeenCalled()
    })

    it('keeps the reply when the store throws after synthesis', async () => {
        const { deps, mocks } = makeDeps()
        mocks.append.mockRejectedValue(new Error('disk full'))

        const result = await new EmpathyPipeline(deps).processTurn('I got the job!', 'session-1', 'user-1')

        expect(result).toMatchObject({
            response: REPLY.response,
            generationMethod: 'llm',
            emotionConfidence: 0.973,
            persisted: false,
        })
    })
})
