/**
 * Output Filtering for generated replies
 * Reject unusable model output and trim runaway answers before they reach the user
 */

import type { PrimaryEmotion } from '../types/emotion.js'
import { pickTemplate } from './templates.js'

export const MIN_RESPONSE_LENGTH = 10
export const MAX_RESPONSE_LENGTH = 200

// Disclaimers and refusals that break the companion's voice
const FORBIDDEN_PHRASES = [
  "i'm just an ai",
  'i am just an ai',
  'as an ai',
  'as a language model',
  "i'm not a therapist",
  'seek professional help immediately',
  "i can't help with that",
  'i cannot help with that',
  "that's not my job",
]

export type FilterReason = 'too_short' | 'forbidden_phrase' | 'length_truncated'

export interface OutputFilterResult {
  filtered: string
  wasFiltered: boolean
  /** The model text was thrown away and a canned template used instead */
  replaced: boolean
  reason?: FilterReason
}

function normalizeQuotes(text: string): string {
  return text.replace(/[\u2018\u2019]/g, "'")
}

export function findForbiddenPhrase(output: string): string | undefined {
  const lower = normalizeQuotes(output).toLowerCase()
  return FORBIDDEN_PHRASES.find(phrase => lower.includes(phrase))
}

/**
 * Keep the first two sentences of an over-long reply. Sentences are split
 * on ". " only, so "?" and "!" do not end a sentence here.
 */
export function truncateToSentences(text: string, count = 2): string {
  const kept = text.split('. ').slice(0, count).join('. ').trim()
  return /[.!?]$/.test(kept) ? kept : `${kept}.`
}

/**
 * Filter generated output before sending to user
 */
export function filterOutput(
  output: string,
  primary: PrimaryEmotion,
  random: () => number = Math.random,
): OutputFilterResult {
  const trimmed = output.trim()

  // 1. Too short to be a real reply
  if (trimmed.length < MIN_RESPONSE_LENGTH) {
    return { filtered: pickTemplate(primary, random), wasFiltered: true, replaced: true, reason: 'too_short' }
  }

  // 2. Disclaimers
  const phrase = findForbiddenPhrase(trimmed)
  if (phrase) {
    console.warn(`[OUTPUT] Replaced reply containing "${phrase}"`)
    return { filtered: pickTemplate(primary, random), wasFiltered: true, replaced: true, reason: 'forbidden_phrase' }
  }

  // 3. Limit response length
  if (trimmed.length > MAX_RESPONSE_LENGTH) {
    return {
      filtered: truncateToSentences(trimmed),
      wasFiltered: true,
      replaced: false,
      reason: 'length_truncated',
    }
  }

  return { filtered: trimmed, wasFiltered: false, replaced: false }
}
