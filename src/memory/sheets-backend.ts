/**
 * Google Sheets backend — one worksheet, one row per record, header in
 * row 1:
 *
 *   timestamp | user_id | emotion_label | confidence | message_text | response_text | session_id
 *
 * Sheets has no query language, so every read loads the worksheet and
 * filters in process. Rows that fail validation are skipped with a warning.
 */

import { google } from 'googleapis'
import { z } from 'zod'
import type { EmotionBackend, EmotionRecord, RecordQuery } from '../types/memory.js'

export const SHEET_HEADER = [
    'timestamp',
    'user_id',
    'emotion_label',
    'confidence',
    'message_text',
    'response_text',
    'session_id',
] as const

export type SheetRow = (string | number)[]

/** The three spreadsheet calls the backend needs. */
export interface SheetGateway {
    /** Fail when the worksheet is unreachable; write the header into an empty sheet. */
    prepare(header: readonly string[]): Promise<void>
    appendRow(row: SheetRow): Promise<void>
    /** Data rows below the header, in sheet order */
    readRows(): Promise<unknown[][]>
}

const cell = z.preprocess(value => (value === undefined || value === null ? '' : value), z.coerce.string())

/** Rows written without a zone designator are UTC. */
const LOCAL_DATETIME = /T\d{2}:\d{2}:\d{2}(\.\d+)?$/

const timestampCell = z.preprocess(
    value => (typeof value === 'string' && LOCAL_DATETIME.test(value) ? `${value}Z` : value),
    z.string().datetime({ offset: true }),
)

const SheetRecordSchema = z.object({
    timestamp: timestampCell,
    user_id: z.string().min(1),
    emotion_label: z.string().min(1),
    confidence: z.preprocess(
        value => (value === undefined || value === '' ? 0.5 : value),
        z.coerce.number().min(0).max(1),
    ),
    message_text: cell,
    response_text: cell,
    session_id: cell,
})

export function parseSheetRow(row: unknown[]): EmotionRecord | null {
    const parsed = SheetRecordSchema.safeParse(
        Object.fromEntries(SHEET_HEADER.map((column, i) => [column, row[i]])),
    )
    if (!parsed.success) return null
    const r = parsed.data
    return {
        userId: r.user_id,
        timestamp: new Date(r.timestamp).toISOString(),
        emotionLabel: r.emotion_label,
        confidence: r.confidence,
        messageText: r.message_text,
        responseText: r.response_text,
        sessionId: r.session_id,
    }
}

export function recordToRow(record: EmotionRecord): SheetRow {
    return [
        record.timestamp,
        record.userId,
        record.emotionLabel,
        record.confidence,
        record.messageText,
        record.responseText,
        record.sessionId,
    ]
}

export class SheetsBackend implements EmotionBackend {
    readonly kind = 'sheets'

    constructor(private readonly gateway: SheetGateway) {}

    async init(): Promise<void> {
        await this.gateway.prepare(SHEET_HEADER)
        console.log('[Memory] Google Sheets worksheet ready')
    }

    async insert(record: EmotionRecord): Promise<void> {
        await this.gateway.appendRow(recordToRow(record))
    }

    async query(userId: string, query: RecordQuery = {}): Promise<EmotionRecord[]> {
        const rows = await this.gateway.readRows()
        const matches: { record: EmotionRecord; index: number }[] = []
        let skipped = 0

        rows.forEach((row, index) => {
            const record = parseSheetRow(row)
            if (!record) {
                skipped++
                return
            }
            if (record.userId !== userId) return
            if (query.since !== undefined && record.timestamp < query.since) return
            if (query.sessionId !== undefined && record.sessionId !== query.sessionId) return
            matches.push({ record, index })
        })

        if (skipped > 0) {
            console.warn(`[Memory] Skipped ${skipped} malformed sheet row(s)`)
        }

        matches.sort((a, b) => {
            if (a.record.timestamp !== b.record.timestamp) {
                return a.record.timestamp < b.record.timestamp ? 1 : -1
            }
            return b.index - a.index
        })

        const ordered = matches.map(m => m.record)
        return query.limit === undefined ? ordered : ordered.slice(0, query.limit)
    }

    async close(): Promise<void> {}
}

export interface GoogleSheetsOptions {
    credentialsPath: string
    spreadsheetId: string
    worksheet: string
}

export function createGoogleSheetGateway(opts: GoogleSheetsOptions): SheetGateway {
    const auth = new google.auth.GoogleAuth({
        keyFile: opts.credentialsPath,
        scopes: ['https://www.googleapis.com/auth/spreadsheets'],
    })
    const sheets = google.sheets({ version: 'v4', auth })
    const { spreadsheetId, worksheet } = opts

    return {
        async prepare(header) {
            const meta = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' })
            const titles = (meta.data.sheets ?? []).map(sheet => sheet.properties?.title)
            if (!titles.includes(worksheet)) {
                throw new Error(`Worksheet "${worksheet}" not found in spreadsheet`)
            }
            const first = await sheets.spreadsheets.values.get({ spreadsheetId, range: `${worksheet}!A1:G1` })
            if (!first.data.values?.length) {
                await sheets.spreadsheets.values.update({
                    spreadsheetId,
                    range: `${worksheet}!A1:G1`,
                    valueInputOption: 'RAW',
                    requestBody: { values: [[...header]] },
                })
            }
        },
        async appendRow(row) {
            await sheets.spreadsheets.values.append({
                spreadsheetId,
                range: `${worksheet}!A:G`,
                valueInputOption: 'RAW',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: [row] },
            })
        },
        async readRows() {
            const res = await sheets.spreadsheets.values.get({ spreadsheetId, range: `${worksheet}!A2:G` })
            return res.data.values ?? []
        },
    }
}
