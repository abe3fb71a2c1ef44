/**
 * Emotion Detection Type Definitions
 */

import type { ClassifierError } from '../utils/errors';

/**
 * Closed emotion vocabulary
 */
export const CANONICAL_EMOTIONS = [
  'Joy',
  'Excitement',
  'Sadness',
  'Anger',
  'Anxiety',
  'Fear',
  'Surprise',
  'Love',
  'Neutral',
] as const;

export type CanonicalEmotion = (typeof CANONICAL_EMOTIONS)[number];

/**
 * An emotion label. Canonical labels are the common case; classifier
 * vocabularies outside the closed set pass through capitalized.
 */
export type EmotionLabel = CanonicalEmotion | (string & {});

/**
 * A single (label, confidence) pair. Confidence is in [0, 1].
 */
export interface EmotionScore {
  readonly emotion: EmotionLabel;
  readonly confidence: number;
}

/**
 * Outcome of one classifier call. Failures travel as values so the
 * detector can walk its fallback chain without exceptions.
 */
export type ClassifierResult =
  | { ok: true; emotions: EmotionScore[] }
  | { ok: false; error: ClassifierError };

/**
 * Interchangeable emotion-labelling backend
 */
export interface EmotionClassifier {
  /** Short identifier reported as the detection source */
  readonly name: string;

  /** Whether the backend is configured; unavailable classifiers are skipped */
  isAvailable(): boolean;

  /** Never rejects: failures resolve to `{ ok: false }` */
  classify(text: string): Promise<ClassifierResult>;
}

/**
 * Which tier produced a detection result
 */
export type DetectionSource = string;

export interface DetectionResult {
  emotions: EmotionScore[];
  source: DetectionSource;
}

/**
 * Emotional signature carried in plaintext beside the ciphertext
 */
export interface EmotionalSignature {
  readonly primary_emotions: readonly EmotionLabel[];
  readonly emotion_scores: Readonly<Record<string, number>>;
  readonly emotional_vector: Readonly<Record<string, number>>;
  readonly message_hash: string;
}
