/**
 * Memory Types
 *
 * EmotionRecord is the only durable state: one row per completed turn,
 * immutable after insert. PatternSummary is a read-side view recomputed
 * from records on every request.
 */

import type { MemoryBackendKind } from '../config.js'

export interface EmotionRecord {
    userId: string
    /** UTC ISO-8601 */
    timestamp: string
    /** Rendered fused label, e.g. "negative-sadness" */
    emotionLabel: string
    confidence: number
    messageText: string
    responseText: string
    sessionId: string
}

/** What callers hand to MemoryStore.append; the store stamps the time. */
export type NewEmotionRecord = Omit<EmotionRecord, 'timestamp'> & { timestamp?: string }

export interface RecordQuery {
    /** Inclusive lower bound, ISO-8601 */
    since?: string
    sessionId?: string
    limit?: number
}

export interface LabelPattern {
    frequency: number
    /** Share of the window, 1 decimal */
    percentage: number
    /** 2 decimals */
    avgConfidence: number
}

export interface PatternSummary {
    totalEntries: number
    avgConfidence?: number
    patterns: Record<string, LabelPattern>
    timePeriod?: string
}

/** One finished session, as sent to the webhook's conversation_completed event. */
export interface ConversationSummary {
    sessionId: string
    messageCount: number
    /** Fused labels in turn order */
    emotionsDetected: string[]
    /** First to last turn, 2 decimals */
    durationMinutes: number
    summary: string
}

/**
 * Storage contract shared by every backend. `insert` and `query` throw on
 * failure; MemoryStore turns failures into safe defaults.
 */
export interface EmotionBackend {
    readonly kind: MemoryBackendKind
    init(): Promise<void>
    insert(record: EmotionRecord): Promise<void>
    /** Most recent first; ties keep reverse insertion order */
    query(userId: string, query?: RecordQuery): Promise<EmotionRecord[]>
    close(): Promise<void>
}
