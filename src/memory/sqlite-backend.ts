/**
 * SQLite backend — embedded `emotions` table in a local file.
 *
 * better-sqlite3 is synchronous; the async signatures only satisfy the
 * EmotionBackend contract. `id` orders rows that share a timestamp.
 */

import Database from 'better-sqlite3'
import type { EmotionBackend, EmotionRecord, RecordQuery } from '../types/memory.js'

interface EmotionRow {
    user_id: string
    timestamp: string
    emotion_label: string
    confidence: number | null
    message_text: string | null
    response_text: string | null
    session_id: string | null
}

type QueryParams = Record<string, string | number>

export function rowToRecord(row: EmotionRow): EmotionRecord {
    return {
        userId: row.user_id,
        timestamp: row.timestamp,
        emotionLabel: row.emotion_label,
        confidence: row.confidence ?? 0.5,
        messageText: row.message_text ?? '',
        responseText: row.response_text ?? '',
        sessionId: row.session_id ?? '',
    }
}

export class SqliteBackend implements EmotionBackend {
    readonly kind = 'sqlite'
    private db: Database.Database | null = null

    /** `path` may be ':memory:' */
    constructor(private readonly path: string) {}

    async init(): Promise<void> {
        if (this.db) return
        const db = new Database(this.path)
        db.exec(`
            CREATE TABLE IF NOT EXISTS emotions (
                id            INTEGER PRIMARY KEY AUTOINCREMENT,
                user_id       TEXT NOT NULL,
                timestamp     TEXT NOT NULL,
                emotion_label TEXT NOT NULL,
                confidence    REAL,
                message_text  TEXT,
                response_text TEXT,
                session_id    TEXT
            );
            CREATE INDEX IF NOT EXISTS idx_emotions_user_time ON emotions(user_id, timestamp);
        `)
        this.db = db
        console.log(`[Memory] SQLite ready at ${this.path}`)
    }

    async insert(record: EmotionRecord): Promise<void> {
        this.requireDb()
            .prepare<QueryParams>(`
                INSERT INTO emotions
                    (user_id, timestamp, emotion_label, confidence, message_text, response_text, session_id)
                VALUES
                    (@userId, @timestamp, @emotionLabel, @confidence, @messageText, @responseText, @sessionId)
            `)
            .run({
                userId: record.userId,
                timestamp: record.timestamp,
                emotionLabel: record.emotionLabel,
                confidence: record.confidence,
                messageText: record.messageText,
                responseText: record.responseText,
                sessionId: record.sessionId,
            })
    }

    async query(userId: string, query: RecordQuery = {}): Promise<EmotionRecord[]> {
        const clauses = ['user_id = @userId']
        const params: QueryParams = { userId }

        if (query.since !== undefined) {
            clauses.push('timestamp >= @since')
            params.since = query.since
        }
        if (query.sessionId !== undefined) {
            clauses.push('session_id = @sessionId')
            params.sessionId = query.sessionId
        }

        let sql = `
            SELECT user_id, timestamp, emotion_label, confidence, message_text, response_text, session_id
            FROM emotions
            WHERE ${clauses.join(' AND ')}
            ORDER BY timestamp DESC, id DESC`
        if (query.limit !== undefined) {
            sql += ' LIMIT @limit'
            params.limit = query.limit
        }

        return this.requireDb().prepare<QueryParams, EmotionRow>(sql).all(params).map(rowToRecord)
    }

    async close(): Promise<void> {
        this.db?.close()
        this.db = null
    }

    private requireDb(): Database.Database {
        if (!this.db) {
            throw new Error('SQLite backend not initialized. Call init() first.')
        }
        return this.db
    }
}
