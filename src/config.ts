/**
 * Runtime configuration.
 *
 * Every setting comes from the environment (loaded from .env by the entry
 * point) and is optional; defaults mirror the production deployment.
 * Parsed once at startup; invalid values abort startup with the zod message.
 */

import { z } from 'zod'

const optionalString = z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined))

export const MEMORY_BACKENDS = ['sqlite', 'postgres', 'sheets'] as const
export type MemoryBackendKind = (typeof MEMORY_BACKENDS)[number]

export const GENERATION_PROVIDERS = ['groq', 'gemini'] as const
export type GenerationProviderKind = (typeof GENERATION_PROVIDERS)[number]

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    NODE_ENV: optionalString,

    HF_API_KEY: optionalString,
    EMOTION_MODEL: z.string().default('j-hartmann/emotion-english-distilroberta-base'),
    BASE_SENTIMENT_MODEL: z.string().default('siebert/sentiment-roberta-large-english'),
    NUANCED_SENTIMENT_MODEL: z.string().default('cardiffnlp/twitter-roberta-base-sentiment-latest'),
    EMOTION_MIN_LENGTH: z.coerce.number().int().nonnegative().default(5),
    EMOTION_MAX_LENGTH: z.coerce.number().int().positive().default(512),

    GENERATION_PROVIDER: z
        .string()
        .optional()
        .transform(value => (value ? value : undefined))
        .pipe(z.enum(GENERATION_PROVIDERS).optional()),
    GROQ_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    GENERATION_MODEL: optionalString,
    GENERATION_MIN_INTERVAL_SEC: z.coerce.number().nonnegative().default(1.0),
    GENERATION_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    GENERATION_BACKOFF_BASE: z.coerce.number().min(1).default(2),
    FALLBACK_KEYWORDS_FILE: optionalString,

    MEMORY_BACKEND: z.enum(MEMORY_BACKENDS).default('sqlite'),
    SQLITE_PATH: z.string().default('empathy_memory.db'),
    DATABASE_URL: optionalString,
    DATABASE_CA_CERT: optionalString,
    GOOGLE_SHEETS_CREDENTIALS: z.string().default('gcp_service_account.json'),
    SHEETS_SPREADSHEET_ID: optionalString,
    SHEETS_WORKSHEET: z.string().default('emotions'),
    ANALYTICS_WINDOW_DAYS: z.coerce.number().int().positive().default(7),

    N8N_WEBHOOK_URL: optionalString.pipe(z.string().url().optional()),
    WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    WEBHOOK_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(2),
})

export interface AppConfig {
    port: number
    classifier: {
        apiKey?: string
        emotionModel: string
        baseSentimentModel: string
        nuancedSentimentModel: string
        minLength: number
        maxLength: number
    }
    generation: {
        provider?: GenerationProviderKind
        apiKey?: string
        model?: string
        minIntervalMs: number
        maxRetries: number
        backoffBase: number
        fallbackKeywordsFile?: string
    }
    memory: {
        backend: MemoryBackendKind
        sqlitePath: string
        databaseUrl?: string
        /** TLS to Postgres, on in production */
        databaseSsl: boolean
        databaseCaCert?: string
        sheetsCredentialsPath: string
        spreadsheetId?: string
        worksheet: string
        analyticsWindowDays: number
    }
    webhook: {
        url?: string
        timeoutMs: number
        maxAttempts: number
    }
}

/**
 * Pick the generation provider: explicit setting wins, otherwise whichever
 * API key is present (Groq first). No key at all leaves the client unconfigured.
 */
function resolveProvider(env: z.infer<typeof EnvSchema>): { provider?: GenerationProviderKind; apiKey?: string } {
    const explicit = env.GENERATION_PROVIDER
    if (explicit === 'groq') return { provider: 'groq', apiKey: env.GROQ_API_KEY }
    if (explicit === 'gemini') return { provider: 'gemini', apiKey: env.GEMINI_API_KEY }
    if (env.GROQ_API_KEY) return { provider: 'groq', apiKey: env.GROQ_API_KEY }
    if (env.GEMINI_API_KEY) return { provider: 'gemini', apiKey: env.GEMINI_API_KEY }
    return {}
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env)
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ')
        throw new Error(`Invalid configuration: ${issues}`)
    }
    const e = parsed.data
    const { provider, apiKey } = resolveProvider(e)

    return {
        port: e.PORT,
        classifier: {
            apiKey: e.HF_API_KEY,
            emotionModel: e.EMOTION_MODEL,
            baseSentimentModel: e.BASE_SENTIMENT_MODEL,
            nuancedSentimentModel: e.NUANCED_SENTIMENT_MODEL,
            minLength: e.EMOTION_MIN_LENGTH,
            maxLength: e.EMOTION_MAX_LENGTH,
        },
        generation: {
            provider,
            apiKey,
            model: e.GENERATION_MODEL,
            minIntervalMs: Math.round(e.GENERATION_MIN_INTERVAL_SEC * 1000),
            maxRetries: e.GENERATION_MAX_RETRIES,
            backoffBase: e.GENERATION_BACKOFF_BASE,
            fallbackKeywordsFile: e.FALLBACK_KEYWORDS_FILE,
        },
        memory: {
            backend: e.MEMORY_BACKEND,
            sqlitePath: e.SQLITE_PATH,
            databaseUrl: e.DATABASE_URL,
            databaseSsl: e.NODE_ENV === 'production',
            databaseCaCert: e.DATABASE_CA_CERT,
            sheetsCredentialsPath: e.GOOGLE_SHEETS_CREDENTIALS,
            spreadsheetId: e.SHEETS_SPREADSHEET_ID,
            worksheet: e.SHEETS_WORKSHEET,
            analyticsWindowDays: e.ANALYTICS_WINDOW_DAYS,
        },
        webhook: {
            url: e.N8N_WEBHOOK_URL,
            timeoutMs: e.WEBHOOK_TIMEOUT_MS,
            maxAttempts: e.WEBHOOK_MAX_ATTEMPTS,
        },
    }
}
