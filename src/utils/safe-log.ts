/**
 * Safe error logging utility.
 * In production, strips stack traces and internal details to avoid
 * leaking user text or credentials into logs that may be forwarded externally.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    return { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}

/** One-line description of a thrown value, for log lines and health reasons. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
