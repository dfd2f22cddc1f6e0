/**
 * HTTP surface — one turn endpoint plus read-side analytics.
 *
 *   POST /turn                          → TurnResult
 *   GET  /users/:userId/recent?limit=   → { records }
 *   GET  /users/:userId/patterns?days=  → PatternSummary
 *   POST /users/:userId/patterns/report → { sent, summary }
 *   POST /users/:userId/sessions/:sessionId/complete → { sent, summary }
 *   GET  /health                        → liveness + memory backend
 *   GET  /status                        → generation, webhook, memory
 *
 * Components are built by the entry point and passed in, so tests drive the
 * routes with fakes through `server.inject()`.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify'
import cors from '@fastify/cors'
import type { EmpathyPipeline } from './pipeline/orchestrator.js'
import type { MemoryStore } from './memory/store.js'
import type { GenerationClient } from './llm/generation-client.js'
import type { WebhookNotifier } from './notify/webhook.js'
import {
  PatternsQuerySchema,
  RecentQuerySchema,
  SessionParamsSchema,
  TurnRequestSchema,
  UserParamsSchema,
  invalidRequest,
} from './types/schemas.js'

export interface ServerDeps {
  pipeline: Pick<EmpathyPipeline, 'processTurn'>
  memory: Pick<MemoryStore, 'recent' | 'patterns' | 'sessionSummary' | 'backendKind'>
  generator: Pick<GenerationClient, 'checkHealth'>
  notifier: Pick<WebhookNotifier, 'sendUserAnalytics' | 'sendConversationSummary' | 'testConnection'>
  analyticsWindowDays: number
}

export async function buildServer(
  deps: ServerDeps,
  options: FastifyServerOptions = { logger: true },
): Promise<FastifyInstance> {
  const server = Fastify(options)
  await server.register(cors)

  server.get('/health', async () => ({
    status: 'ok',
    memory: deps.memory.backendKind,
  }))

  server.get('/status', async () => {
    const [generation, webhook] = await Promise.all([
      deps.generator.checkHealth(),
      deps.notifier.testConnection(),
    ])
    return { generation, webhook, memory: deps.memory.backendKind }
  })

  // ============================================
  // Turns
  // ============================================

  server.post('/turn', async (request, reply) => {
    const body = TurnRequestSchema.safeParse(request.body)
    if (!body.success) {
      return reply.code(400).send(invalidRequest(body.error))
    }
    const { text, sessionId, userId } = body.data
    return deps.pipeline.processTurn(text, sessionId, userId)
  })

  // ============================================
  // Analytics
  // ============================================

  server.get('/users/:userId/recent', async (request, reply) => {
    const params = UserParamsSchema.safeParse(request.params)
    const query = RecentQuerySchema.safeParse(request.query)
    if (!params.success) return reply.code(400).send(invalidRequest(params.error))
    if (!query.success) return reply.code(400).send(invalidRequest(query.error))

    const records = await deps.memory.recent(params.data.userId, query.data.limit)
    return { records }
  })

  server.get('/users/:userId/patterns', async (request, reply) => {
    const params = UserParamsSchema.safeParse(request.params)
    const query = PatternsQuerySchema.safeParse(request.query)
    if (!params.success) return reply.code(400).send(invalidRequest(params.error))
    if (!query.success) return reply.code(400).send(invalidRequest(query.error))

    return deps.memory.patterns(params.data.userId, query.data.days ?? deps.analyticsWindowDays)
  })

  server.post('/users/:userId/patterns/report', async (request, reply) => {
    const params = UserParamsSchema.safeParse(request.params)
    const query = PatternsQuerySchema.safeParse(request.query)
    if (!params.success) return reply.code(400).send(invalidRequest(params.error))
    if (!query.success) return reply.code(400).send(invalidRequest(query.error))

    const { userId } = params.data
    const summary = await deps.memory.patterns(userId, query.data.days ?? deps.analyticsWindowDays)
    const sent = await deps.notifier.sendUserAnalytics(userId, {
      total_entries: summary.totalEntries,
      avg_confidence: summary.avgConfidence,
      patterns: summary.patterns,
      time_period: summary.timePeriod,
    })
    return { sent, summary }
  })

  server.post('/users/:userId/sessions/:sessionId/complete', async (request, reply) => {
    const params = SessionParamsSchema.safeParse(request.params)
    if (!params.success) return reply.code(400).send(invalidRequest(params.error))

    const { userId, sessionId } = params.data
    const summary = await deps.memory.sessionSummary(userId, sessionId)
    if (!summary) return reply.code(404).send({ error: 'Session not found' })

    const sent = await deps.notifier.sendConversationSummary(userId, {
      session_id: summary.sessionId,
      message_count: summary.messageCount,
      emotions_detected: summary.emotionsDetected,
      duration_minutes: summary.durationMinutes,
      summary: summary.summary,
    })
    return { sent, summary }
  })

  return server
}
