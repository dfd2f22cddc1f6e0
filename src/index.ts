/**
 * Empathy Companion - Main Server
 * Builds every component once from the environment and serves the HTTP API
 */

import 'dotenv/config'
import { loadConfig } from './config.js'
import { createHfClassifier, createInferenceClient } from './emotion/hf-client.js'
import { EmotionClassifier } from './emotion/classifier.js'
import { SentimentFuser } from './emotion/sentiment-fusion.js'
import { createGenerationBackend } from './llm/providers.js'
import { loadFallbackKeywords } from './llm/fallback.js'
import { GenerationClient } from './llm/generation-client.js'
import { ResponseSynthesizer } from './character/response-synthesizer.js'
import { createMemoryStore } from './memory/index.js'
import { WebhookNotifier } from './notify/webhook.js'
import { EmpathyPipeline } from './pipeline/orchestrator.js'
import { buildServer } from './server.js'
import { safeError } from './utils/safe-log.js'

/** j-hartmann/emotion-english-distilroberta-base scores seven classes */
const EMOTION_TOP_K = 7

const start = async () => {
  try {
    const config = loadConfig()

    // ── Understanding ──
    const hf = createInferenceClient(config.classifier.apiKey)
    const classifier = new EmotionClassifier(
      hf ? createHfClassifier(hf, config.classifier.emotionModel, EMOTION_TOP_K) : null,
      { minLength: config.classifier.minLength, maxLength: config.classifier.maxLength },
    )
    const fuser = new SentimentFuser({
      base: hf ? createHfClassifier(hf, config.classifier.baseSentimentModel) : null,
      nuanced: hf ? createHfClassifier(hf, config.classifier.nuancedSentimentModel) : null,
    })

    // ── Response ──
    const generator = new GenerationClient(createGenerationBackend(config.generation), {
      minIntervalMs: config.generation.minIntervalMs,
      maxRetries: config.generation.maxRetries,
      backoffBase: config.generation.backoffBase,
      fallbackKeywords: config.generation.fallbackKeywordsFile
        ? loadFallbackKeywords(config.generation.fallbackKeywordsFile)
        : undefined,
    })
    const synthesizer = new ResponseSynthesizer(generator)

    // ── Persistence + notification ──
    const memory = await createMemoryStore(config.memory)
    const notifier = new WebhookNotifier(config.webhook.url, {
      timeoutMs: config.webhook.timeoutMs,
      maxAttempts: config.webhook.maxAttempts,
    })

    const pipeline = new EmpathyPipeline({ classifier, fuser, synthesizer, memory, notifier })
    const server = await buildServer({
      pipeline,
      memory,
      generator,
      notifier,
      analyticsWindowDays: config.memory.analyticsWindowDays,
    })

    const shutdown = async () => {
      await server.close()
      await memory.close()
      process.exit(0)
    }
    process.on('SIGTERM', shutdown)
    process.on('SIGINT', shutdown)

    await server.listen({ port: config.port, host: '0.0.0.0' })
    server.log.info(
      `Empathy companion ready on port ${config.port} | memory: ${memory.backendKind} | generation: ${generator.configured ? 'remote' : 'local fallback'}`
    )
  } catch (err) {
    console.error('[Startup] Failed to start:', safeError(err))
    process.exit(1)
  }
}

await start()
