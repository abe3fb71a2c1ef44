/**
 * Pure helpers deriving the emotional signature from ranked scores
 */

import { createHash } from 'crypto';
import { compareByPriority } from './normalize';
import { EmotionalSignature, EmotionLabel, EmotionScore } from './types';

/**
 * First 16 hex characters of SHA-256 over the UTF-8 text. A corruption
 * hint only: it does not authenticate anything.
 */
export function messageHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex').slice(0, 16);
}

/**
 * Labels at or above `threshold`, in canonical priority order. When none
 * qualify, the single top-ranked label; `Neutral` for an empty ranking.
 */
export function selectPrimaryEmotions(
  ranked: readonly EmotionScore[],
  threshold: number
): EmotionLabel[] {
  const confidenceOf = new Map(ranked.map(({ emotion, confidence }) => [emotion, confidence]));
  const primary = ranked
    .filter(({ confidence }) => confidence >= threshold)
    .map(({ emotion }) => emotion);

  if (primary.length === 0) {
    return ranked.length > 0 ? [ranked[0].emotion] : ['Neutral'];
  }

  return primary.sort(
    (a, b) =>
      compareByPriority(a, b) || (confidenceOf.get(b) ?? 0) - (confidenceOf.get(a) ?? 0)
  );
}

/**
 * Confidences normalized to sum to 1, or `{ Neutral: 1 }` when the total is 0
 */
export function buildEmotionalVector(scores: readonly EmotionScore[]): Record<string, number> {
  const total = scores.reduce((sum, { confidence }) => sum + confidence, 0);
  if (total <= 0) {
    return { Neutral: 1.0 };
  }

  const vector: Record<string, number> = {};
  for (const { emotion, confidence } of scores) {
    vector[emotion] = confidence / total;
  }
  return vector;
}

export function buildEmotionScores(scores: readonly EmotionScore[]): Record<string, number> {
  const map: Record<string, number> = {};
  for (const { emotion, confidence } of scores) {
    map[emotion] = confidence;
  }
  return map;
}

/**
 * Assemble an immutable signature from one detection pass
 */
export function buildSignature(
  text: string,
  ranked: readonly EmotionScore[],
  threshold: number
): EmotionalSignature {
  return Object.freeze({
    primary_emotions: Object.freeze(selectPrimaryEmotions(ranked, threshold)),
    emotion_scores: Object.freeze(buildEmotionScores(ranked)),
    emotional_vector: Object.freeze(buildEmotionalVector(ranked)),
    message_hash: messageHash(text),
  });
}
