/**
 * Fused label: polarity + emotion as one key.
 *
 * Rendered "<polarity>-<emotion>" for storage, analytics grouping and the
 * webhook payload. Parsing splits on the LAST separator so multi-part
 * polarities survive; anything that fails to map lands in the neutral bucket.
 */

import type { FusedLabel, PrimaryEmotion } from '../types/emotion.js'

export const FUSED_SEPARATOR = '-'

const EMOTION_BUCKETS = new Map<string, PrimaryEmotion>([
    ['sadness', 'sadness'],
    ['pessimism', 'sadness'],
    ['anger', 'anger'],
    ['disgust', 'anger'],
    ['fear', 'fear'],
    ['anxiety', 'fear'],
    ['joy', 'joy'],
    ['happiness', 'joy'],
    ['love', 'joy'],
    ['optimism', 'joy'],
    ['surprise', 'neutral'],
    ['neutral', 'neutral'],
])

export function formatFusedLabel(label: FusedLabel): string {
    const polarity = label.polarity || 'neutral'
    return label.emotion ? `${polarity}${FUSED_SEPARATOR}${label.emotion}` : polarity
}

export function parseFusedLabel(label: string): FusedLabel {
    const normalized = label.trim().toLowerCase()
    if (!normalized) return { polarity: 'neutral', emotion: null }

    const cut = normalized.lastIndexOf(FUSED_SEPARATOR)
    if (cut <= 0 || cut === normalized.length - 1) {
        return { polarity: normalized.replaceAll(FUSED_SEPARATOR, ''), emotion: null }
    }
    return { polarity: normalized.slice(0, cut), emotion: normalized.slice(cut + 1) }
}

/**
 * Template bucket for a fused label. A bare label (no emotion part) is
 * looked up by its only token, so "joy" still selects joy.
 */
export function primaryEmotionOf(label: FusedLabel | string): PrimaryEmotion {
    const fused = typeof label === 'string' ? parseFusedLabel(label) : label
    const token = (fused.emotion ?? fused.polarity).toLowerCase()
    return EMOTION_BUCKETS.get(token) ?? 'neutral'
}
