/**
 * Memory backend selection. The configured backend is tried once at
 * startup; missing credentials or a failed init fall back to SQLite.
 */

import { existsSync } from 'node:fs'
import type { AppConfig } from '../config.js'
import type { EmotionBackend } from '../types/memory.js'
import { errorMessage } from '../utils/safe-log.js'
import { PostgresBackend } from './postgres-backend.js'
import { SheetsBackend, createGoogleSheetGateway } from './sheets-backend.js'
import { SqliteBackend } from './sqlite-backend.js'
import { MemoryStore } from './store.js'

export { MemoryStore } from './store.js'
export { summarizePatterns } from './patterns.js'

type MemoryConfig = AppConfig['memory']

function configuredBackend(config: MemoryConfig): EmotionBackend | null {
    switch (config.backend) {
        case 'postgres':
            if (!config.databaseUrl) {
                console.warn('[Memory] DATABASE_URL not set — falling back to SQLite')
                return null
            }
            return new PostgresBackend(config.databaseUrl, {
                ssl: config.databaseSsl,
                caCert: config.databaseCaCert,
            })
        case 'sheets':
            if (!config.spreadsheetId || !existsSync(config.sheetsCredentialsPath)) {
                console.warn('[Memory] Google Sheets credentials not found — falling back to SQLite')
                return null
            }
            return new SheetsBackend(createGoogleSheetGateway({
                credentialsPath: config.sheetsCredentialsPath,
                spreadsheetId: config.spreadsheetId,
                worksheet: config.worksheet,
            }))
        case 'sqlite':
            return null
    }
}

/**
 * Initialize the configured backend. Throws only when the SQLite fallback
 * itself cannot open, which aborts startup.
 */
export async function createMemoryStore(config: MemoryConfig): Promise<MemoryStore> {
    const preferred = configuredBackend(config)
    if (preferred) {
        try {
            await preferred.init()
            return new MemoryStore(preferred)
        } catch (err) {
            console.warn(`[Memory] ${preferred.kind} initialization failed (${errorMessage(err)}) — falling back to SQLite`)
        }
    }

    const sqlite = new SqliteBackend(config.sqlitePath)
    await sqlite.init()
    return new MemoryStore(sqlite)
}
