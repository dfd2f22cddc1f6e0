import { describe, expect, it } from 'vitest'
import { summarizePatterns, summarizeSession } from './patterns.js'

describe('summarizePatterns', () => {
    it('returns exactly the empty summary for no records', () => {
        expect(summarizePatterns([], 7)).toEqual({ totalEntries: 0, patterns: {} })
    })

    it('reports a single label as 100%', () => {
        const records = Array.from({ length: 4 }, () => ({ emotionLabel: 'positive-joy', confidence: 0.9 }))

        expect(summarizePatterns(records, 7)).toEqual({
            totalEntries: 4,
            avgConfidence: 0.9,
            patterns: { 'positive-joy': { frequency: 4, percentage: 100, avgConfidence: 0.9 } },
            timePeriod: '7 days',
        })
    })

    it('rounds shares to one decimal and confidences to two', () => {
        const summary = summarizePatterns([
            { emotionLabel: 'positive-joy', confidence: 0.9 },
            { emotionLabel: 'negative-sadness', confidence: 0.6 },
            { emotionLabel: 'positive-joy', confidence: 0.8 },
        ], 30)

        expect(summary).toEqual({
            totalEntries: 3,
            avgConfidence: 0.77,
            patterns: {
                'positive-joy': { frequency: 2, percentage: 66.7, avgConfidence: 0.85 },
                'negative-sadness': { frequency: 1, percentage: 33.3, avgConfidence: 0.6 },
            },
            timePeriod: '30 days',
        })
    })
})

describe('summarizeSession', () => {
    it('lists the labels in order and measures first to last turn', () => {
        expect(summarizeSession('session-1', [
            { emotionLabel: 'negative-sadness', timestamp: '2026-10-19T08:00:00.000Z' },
            { emotionLabel: 'neutral', timestamp: '2026-10-19T08:01:30.000Z' },
            { emotionLabel: 'positive-joy', timestamp: '2026-10-19T08:04:20.000Z' },
        ])).toEqual({
            sessionId: 'session-1',
            messageCount: 3,
            emotionsDetected: ['negative-sadness', 'neutral', 'positive-joy'],
            durationMinutes: 4.33,
            summary: 'Conversation with 3 messages, emotions: negative-sadness, neutral, positive-joy',
        })
    })

    it('gives a single turn zero duration', () => {
        expect(summarizeSession('session-2', [{ emotionLabel: 'neutral', timestamp: '2026-10-19T08:00:00.000Z' }]))
            .toMatchObject({ messageCount: 1, durationMinutes: 0 })
    })
})
