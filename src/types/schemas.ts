/**
 * Zod Validation Schemas — HTTP request shapes
 *
 * Bodies, params and query strings arrive as `unknown`; every route parses
 * them with `.safeParse()` and answers 400 on failure.
 *
 * Usage:
 *   const body = TurnRequestSchema.safeParse(request.body)
 *   if (!body.success) return reply.code(400).send(invalidRequest(body.error))
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════
// 1. TURN
// ═══════════════════════════════════════════════════════════════════════════

export const TurnRequestSchema = z.object({
    text: z.string().max(10_000),
    sessionId: z.string().trim().min(1),
    userId: z.string().trim().min(1),
})

export type TurnRequest = z.infer<typeof TurnRequestSchema>

// ═══════════════════════════════════════════════════════════════════════════
// 2. ANALYTICS
// ═══════════════════════════════════════════════════════════════════════════

export const UserParamsSchema = z.object({
    userId: z.string().trim().min(1),
})

export const SessionParamsSchema = z.object({
    userId: z.string().trim().min(1),
    sessionId: z.string().trim().min(1),
})

/** Query strings are strings; coerce and bound them. */
export const RecentQuerySchema = z.object({
    limit: z.coerce.number().int().min(1).max(1000).default(30),
})

/** Without `days` the configured analytics window applies. */
export const PatternsQuerySchema = z.object({
    days: z.coerce.number().int().min(1).max(365).optional(),
})

// ═══════════════════════════════════════════════════════════════════════════
// 3. ERRORS
// ═══════════════════════════════════════════════════════════════════════════

export interface InvalidRequestBody {
    error: 'Invalid request'
    issues: string[]
}

export function invalidRequest(error: z.ZodError): InvalidRequestBody {
    return {
        error: 'Invalid request',
        issues: error.issues.map(issue =>
            issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        ),
    }
}
