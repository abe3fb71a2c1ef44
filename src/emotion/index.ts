/**
 * Emotion detection module
 */

export { EmotionDetector } from './detector';
export type { EmotionDetectorOptions } from './detector';
export { KeywordClassifier, DEFAULT_KEYWORD_TABLE } from './keyword-classifier';
export type { KeywordTable } from './keyword-classifier';
export { GeminiClassifier, buildEmotionPrompt, extractJson } from './gemini-client';
export type { EmotionTextModel, GeminiClassifierOptions } from './gemini-client';
export { LocalModelClassifier, HttpInferenceBackend, InferenceResponseError } from './local-classifier';
export type { InferenceBackend, LabelScore } from './local-classifier';
export { buildClassifiers, createEmotionDetector } from './factory';

export {
  normalizeEmotionLabel,
  isCanonicalEmotion,
  rankEmotions,
  compareByPriority,
  EMOTION_PRIORITY,
} from './normalize';

export {
  messageHash,
  selectPrimaryEmotions,
  buildEmotionalVector,
  buildEmotionScores,
  buildSignature,
} from './signature';

export { CANONICAL_EMOTIONS } from './types';
export type {
  CanonicalEmotion,
  EmotionLabel,
  EmotionScore,
  EmotionalSignature,
  EmotionClassifier,
  ClassifierResult,
  DetectionResult,
} from './types';
