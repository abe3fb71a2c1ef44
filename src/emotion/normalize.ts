/**
 * Label normalization and canonical ordering
 */

import { CANONICAL_EMOTIONS, CanonicalEmotion, EmotionLabel, EmotionScore } from './types';

/**
 * Synonyms emitted by classifier backends, keyed in lower case
 */
const EMOTION_SYNONYMS: Record<string, CanonicalEmotion> = {
  joy: 'Joy',
  happiness: 'Joy',
  happy: 'Joy',
  excitement: 'Excitement',
  excited: 'Excitement',
  sadness: 'Sadness',
  sad: 'Sadness',
  anger: 'Anger',
  angry: 'Anger',
  anxiety: 'Anxiety',
  anxious: 'Anxiety',
  fear: 'Fear',
  afraid: 'Fear',
  surprise: 'Surprise',
  surprised: 'Surprise',
  love: 'Love',
  neutral: 'Neutral',
};

/**
 * Presentation and tie-break priority. Labels not listed sort after these.
 */
export const EMOTION_PRIORITY: readonly CanonicalEmotion[] = [
  'Joy',
  'Excitement',
  'Anxiety',
  'Fear',
  'Anger',
  'Sadness',
  'Surprise',
  'Love',
];

const UNRANKED = EMOTION_PRIORITY.length;

export const isCanonicalEmotion = (label: string): label is CanonicalEmotion =>
  CANONICAL_EMOTIONS.some((emotion) => emotion === label);

/**
 * Capitalize the first character and lower-case the rest
 */
const capitalize = (value: string): string =>
  value.length === 0 ? value : value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();

/**
 * Map a raw classifier label to a canonical label; unknown labels pass
 * through capitalized.
 */
export function normalizeEmotionLabel(label: string): EmotionLabel {
  const key = label.trim().toLowerCase();
  return Object.hasOwn(EMOTION_SYNONYMS, key) ? EMOTION_SYNONYMS[key] : capitalize(label.trim());
}

export function emotionPriority(label: EmotionLabel): number {
  const index = EMOTION_PRIORITY.findIndex((candidate) => candidate === label);
  return index === -1 ? UNRANKED : index;
}

/**
 * Order labels by canonical priority; labels outside the priority list
 * (Neutral and open-vocabulary labels) follow alphabetically.
 */
export function compareByPriority(a: EmotionLabel, b: EmotionLabel): number {
  const byPriority = emotionPriority(a) - emotionPriority(b);
  if (byPriority !== 0) {
    return byPriority;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort by confidence descending, breaking ties by canonical priority
 */
export function rankEmotions(scores: readonly EmotionScore[]): EmotionScore[] {
  return [...scores].sort(
    (a, b) => b.confidence - a.confidence || compareByPriority(a.emotion, b.emotion)
  );
}

/**
 * Normalize raw labels, merge duplicates (highest confidence wins), rank,
 * and keep the top `limit` entries.
 */
export function normalizeRanking(
  raw: ReadonlyArray<{ label: string; confidence: number }>,
  limit: number
): EmotionScore[] {
  const merged = new Map<EmotionLabel, number>();

  for (const { label, confidence } of raw) {
    const emotion = normalizeEmotionLabel(label);
    if (emotion.length === 0) {
      continue;
    }
    const clamped = Number.isFinite(confidence) ? Math.max(0, Math.min(1, confidence)) : 0;
    const existing = merged.get(emotion);
    if (existing === undefined || clamped > existing) {
      merged.set(emotion, clamped);
    }
  }

  const scores = Array.from(merged, ([emotion, confidence]) => ({ emotion, confidence }));
  return rankEmotions(scores).slice(0, limit);
}
