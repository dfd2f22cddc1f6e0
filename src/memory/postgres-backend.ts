/**
 * Postgres backend — `emotions` table behind a pg connection pool.
 * The table is created by an idempotent migration on init.
 */

import { Pool } from 'pg'
import type { EmotionBackend, EmotionRecord, RecordQuery } from '../types/memory.js'

interface EmotionRow {
  user_id: string
  timestamp: Date | string
  emotion_label: string
  confidence: number | string | null
  message_text: string | null
  response_text: string | null
  session_id: string | null
}

function toIso(value: Date | string | null | undefined): string {
  if (!value) return new Date(0).toISOString()
  const parsed = value instanceof Date ? value : new Date(value)
  return Number.isNaN(parsed.getTime()) ? new Date(0).toISOString() : parsed.toISOString()
}

function rowToRecord(row: EmotionRow): EmotionRecord {
  const confidence = Number(row.confidence)
  return {
    userId: row.user_id,
    timestamp: toIso(row.timestamp),
    emotionLabel: row.emotion_label,
    confidence: row.confidence === null || Number.isNaN(confidence) ? 0.5 : confidence,
    messageText: row.message_text ?? '',
    responseText: row.response_text ?? '',
    sessionId: row.session_id ?? '',
  }
}

export interface PostgresOptions {
  /** Connect over TLS (production deployments) */
  ssl?: boolean
  /** Base64-encoded CA bundle; certificates are only verified when one is given */
  caCert?: string
}

/** Drop `sslmode`, which conflicts with the explicit ssl option. */
export function stripSslMode(databaseUrl: string): string {
  const url = new URL(databaseUrl)
  url.searchParams.delete('sslmode')
  url.search = url.searchParams.toString()
  return url.toString()
}

export class PostgresBackend implements EmotionBackend {
  readonly kind = 'postgres'
  private pool: Pool | null = null

  constructor(
    private readonly databaseUrl: string,
    private readonly opts: PostgresOptions = {},
  ) {}

  async init(): Promise<void> {
    if (this.pool) return
    const { ssl, caCert } = this.opts

    const pool = new Pool({
      connectionString: stripSslMode(this.databaseUrl),
      max: 10,
      idleTimeoutMillis: 30000,
      ssl: ssl
        ? {
          ca: caCert ? Buffer.from(caCert, 'base64').toString() : undefined,
          rejectUnauthorized: Boolean(caCert),
        }
        : false,
    })

    try {
      await this.runMigrations(pool)
    } catch (err) {
      await pool.end()
      throw err
    }
    this.pool = pool
  }

  async insert(record: EmotionRecord): Promise<void> {
    await this.requirePool().query(
      `INSERT INTO emotions
         (user_id, timestamp, emotion_label, confidence, message_text, response_text, session_id)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        record.userId,
        record.timestamp,
        record.emotionLabel,
        record.confidence,
        record.messageText,
        record.responseText,
        record.sessionId,
      ]
    )
  }

  async query(userId: string, query: RecordQuery = {}): Promise<EmotionRecord[]> {
    // LIMIT NULL means no limit in Postgres
    const result = await this.requirePool().query<EmotionRow>(
      `SELECT user_id, timestamp, emotion_label, confidence, message_text, response_text, session_id
       FROM emotions
       WHERE user_id = $1
         AND ($2::timestamptz IS NULL OR timestamp >= $2::timestamptz)
         AND ($3::text IS NULL OR session_id = $3::text)
       ORDER BY timestamp DESC, id DESC
       LIMIT $4`,
      [userId, query.since ?? null, query.sessionId ?? null, query.limit ?? null]
    )
    return result.rows.map(rowToRecord)
  }

  async close(): Promise<void> {
    await this.pool?.end()
    this.pool = null
  }

  private async runMigrations(pool: Pool): Promise<void> {
    await pool.query(`
      CREATE TABLE IF NOT EXISTS emotions (
        id            BIGSERIAL PRIMARY KEY,
        user_id       TEXT NOT NULL,
        timestamp     TIMESTAMPTZ NOT NULL,
        emotion_label TEXT NOT NULL,
        confidence    DOUBLE PRECISION,
        message_text  TEXT,
        response_text TEXT,
        session_id    TEXT
      )
    `)
    await pool.query(`CREATE INDEX IF NOT EXISTS idx_emotions_user_time ON emotions(user_id, timestamp DESC)`)
    console.log('[Memory] Postgres migrations complete')
  }

  private requirePool(): Pool {
    if (!this.pool) {
      throw new Error('Database not initialized. Call init() first.')
    }
    return this.pool
  }
}
