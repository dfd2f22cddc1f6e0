/**
 * Emotion pattern analytics: per-label frequency, share and mean
 * confidence over a window of records. Pure; the store does the querying.
 */

import type { ConversationSummary, EmotionRecord, LabelPattern, PatternSummary } from '../types/memory.js'
import { roundTo } from '../utils/round.js'

export function emptySummary(): PatternSummary {
    return { totalEntries: 0, patterns: {} }
}

export function summarizePatterns(
    records: Pick<EmotionRecord, 'emotionLabel' | 'confidence'>[],
    days: number,
): PatternSummary {
    if (records.length === 0) return emptySummary()

    const totals = new Map<string, { count: number; confidence: number }>()
    let confidenceSum = 0

    for (const record of records) {
        const entry = totals.get(record.emotionLabel) ?? { count: 0, confidence: 0 }
        entry.count += 1
        entry.confidence += record.confidence
        totals.set(record.emotionLabel, entry)
        confidenceSum += record.confidence
    }

    const patterns: Record<string, LabelPattern> = {}
    for (const [label, { count, confidence }] of totals) {
        patterns[label] = {
            frequency: count,
            percentage: roundTo((count / records.length) * 100, 1),
            avgConfidence: roundTo(confidence / count, 2),
        }
    }

    return {
        totalEntries: records.length,
        avgConfidence: roundTo(confidenceSum / records.length, 2),
        patterns,
        timePeriod: `${days} days`,
    }
}

/** `records` oldest first. */
export function summarizeSession(
    sessionId: string,
    records: Pick<EmotionRecord, 'emotionLabel' | 'timestamp'>[],
): ConversationSummary {
    const emotions = records.map(record => record.emotionLabel)
    const first = records[0]
    const last = records[records.length - 1]
    const durationMs = first && last ? Date.parse(last.timestamp) - Date.parse(first.timestamp) : 0

    return {
        sessionId,
        messageCount: records.length,
        emotionsDetected: emotions,
        durationMinutes: roundTo(durationMs / 60_000, 2),
        summary: `Conversation with ${records.length} messages, emotions: ${emotions.join(', ')}`,
    }
}
