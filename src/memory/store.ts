/**
 * Memory Store — the pipeline's view of persisted turns.
 *
 * Wraps one EmotionBackend and converts every backend failure into a safe
 * default plus a log line: append → false, reads → [] or an empty summary.
 */

import type { ConversationTurn } from '../types/emotion.js'
import type {
    ConversationSummary,
    EmotionBackend,
    EmotionRecord,
    NewEmotionRecord,
    PatternSummary,
} from '../types/memory.js'
import type { MemoryBackendKind } from '../config.js'
import { safeError } from '../utils/safe-log.js'
import { emptySummary, summarizePatterns, summarizeSession } from './patterns.js'

const DAY_MS = 24 * 60 * 60 * 1000

export const DEFAULT_RECENT_LIMIT = 30
export const DEFAULT_HISTORY_TURNS = 3
export const DEFAULT_PATTERN_DAYS = 7

export class MemoryStore {
    constructor(
        private readonly backend: EmotionBackend,
        private readonly now: () => Date = () => new Date(),
    ) {}

    get backendKind(): MemoryBackendKind {
        return this.backend.kind
    }

    /** Timestamps are normalized to UTC ISO-8601; a missing one is stamped now. */
    async append(record: NewEmotionRecord): Promise<boolean> {
        try {
            const timestamp = record.timestamp === undefined
                ? this.now().toISOString()
                : new Date(record.timestamp).toISOString()
            await this.backend.insert({ ...record, timestamp })
            return true
        } catch (err) {
            console.error(`[Memory] Failed to add emotion record for ${record.userId}:`, safeError(err))
            return false
        }
    }

    async recent(userId: string, limit = DEFAULT_RECENT_LIMIT): Promise<EmotionRecord[]> {
        try {
            return await this.backend.query(userId, { limit })
        } catch (err) {
            console.error(`[Memory] Failed to read recent emotions for ${userId}:`, safeError(err))
            return []
        }
    }

    /** Last `limit` exchanges of one session, oldest first. */
    async history(userId: string, sessionId: string, limit = DEFAULT_HISTORY_TURNS): Promise<ConversationTurn[]> {
        try {
            const records = await this.backend.query(userId, { sessionId, limit })
            return records
                .reverse()
                .map(record => ({ user: record.messageText, ai: record.responseText }))
        } catch (err) {
            console.error(`[Memory] Failed to read session history for ${userId}:`, safeError(err))
            return []
        }
    }

    async patterns(userId: string, days = DEFAULT_PATTERN_DAYS): Promise<PatternSummary> {
        try {
            const since = new Date(this.now().getTime() - days * DAY_MS).toISOString()
            const records = await this.backend.query(userId, { since })
            return summarizePatterns(records, days)
        } catch (err) {
            console.error(`[Memory] Failed to analyze patterns for ${userId}:`, safeError(err))
            return emptySummary()
        }
    }

    /** Every turn of one session, summarized; null when the session has none. */
    async sessionSummary(userId: string, sessionId: string): Promise<ConversationSummary | null> {
        try {
            const records = await this.backend.query(userId, { sessionId })
            return records.length ? summarizeSession(sessionId, records.reverse()) : null
        } catch (err) {
            console.error(`[Memory] Failed to summarize session ${sessionId} for ${userId}:`, safeError(err))
            return null
        }
    }

    async close(): Promise<void> {
        await this.backend.close()
    }
}
