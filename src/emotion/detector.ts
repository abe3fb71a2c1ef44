/**
 * EmotionDetector - walks the classifier chain and derives signatures
 *
 * Classifiers are tried in the order given; the first successful result
 * wins. When none is available or all fail, the keyword classifier answers.
 */

import { CONFIG } from '../utils/config';
import { createLogger, Logger } from '../utils/logger';
import { KeywordClassifier } from './keyword-classifier';
import { isCanonicalEmotion } from './normalize';
import { buildEmotionalVector, buildSignature, selectPrimaryEmotions } from './signature';
import {
  DetectionResult,
  EmotionalSignature,
  EmotionClassifier,
  EmotionLabel,
  EmotionScore,
} from './types';

export interface EmotionDetectorOptions {
  fallback?: KeywordClassifier;
  threshold?: number;
  logger?: Logger;
}

export class EmotionDetector {
  private readonly classifiers: readonly EmotionClassifier[];
  private readonly fallback: KeywordClassifier;
  private readonly logger: Logger;
  readonly threshold: number;

  constructor(classifiers: readonly EmotionClassifier[] = [], options: EmotionDetectorOptions = {}) {
    this.classifiers = [...classifiers];
    this.fallback = options.fallback ?? new KeywordClassifier();
    this.threshold = options.threshold ?? CONFIG.detection.threshold;
    this.logger = options.logger ?? createLogger('EmotionDetector');
  }

  /**
   * Names of the configured classifier tiers, in priority order
   */
  describeChain(): string[] {
    return [...this.classifiers.map((classifier) => classifier.name), this.fallback.name];
  }

  /**
   * Ranked emotions plus the tier that produced them
   */
  async analyze(text: string): Promise<DetectionResult> {
    if (text.trim().length === 0) {
      return { emotions: this.fallback.score(text), source: this.fallback.name };
    }

    for (const classifier of this.classifiers) {
      if (!classifier.isAvailable()) {
        this.logger.debug(`Skipping unavailable classifier ${classifier.name}`);
        continue;
      }

      const result = await classifier.classify(text);
      if (result.ok) {
        this.reportOpenVocabulary(classifier.name, result.emotions);
        return { emotions: result.emotions, source: classifier.name };
      }

      this.logger.warn(`Classifier ${classifier.name} failed, trying next tier`, {
        code: result.error.code,
        reason: result.error.message,
      });
    }

    return { emotions: this.fallback.score(text), source: this.fallback.name };
  }

  async detect(text: string): Promise<EmotionScore[]> {
    const { emotions } = await this.analyze(text);
    return emotions;
  }

  async primary(text: string, threshold: number = this.threshold): Promise<EmotionLabel[]> {
    return selectPrimaryEmotions(await this.detect(text), threshold);
  }

  async vector(text: string): Promise<Record<string, number>> {
    return buildEmotionalVector(await this.detect(text));
  }

  /**
   * Full signature from a single detection pass
   */
  async signature(text: string, threshold: number = this.threshold): Promise<EmotionalSignature> {
    const { emotions } = await this.analyze(text);
    return buildSignature(text, emotions, threshold);
  }

  private reportOpenVocabulary(source: string, emotions: readonly EmotionScore[]): void {
    const unrecognized = emotions
      .map(({ emotion }) => emotion)
      .filter((emotion) => !isCanonicalEmotion(emotion));
    if (unrecognized.length > 0) {
      this.logger.debug(`Classifier ${source} returned labels outside the closed vocabulary`, {
        labels: unrecognized,
      });
    }
  }
}
