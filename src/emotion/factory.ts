/**
 * Builds the classifier chain from runtime configuration
 */

import { getConfig, RuntimeConfig } from '../utils/config';
import { Logger } from '../utils/logger';
import { EmotionDetector } from './detector';
import { GeminiClassifier } from './gemini-client';
import { HttpInferenceBackend, LocalModelClassifier } from './local-classifier';
import { EmotionClassifier } from './types';

/**
 * Classifiers in strict priority order: remote LLM, then local model.
 * Unconfigured tiers are kept and report themselves unavailable.
 */
export function buildClassifiers(config: RuntimeConfig = getConfig()): EmotionClassifier[] {
  const maxResults = config.detection.maxAdapterResults;

  const gemini = new GeminiClassifier({
    apiKey: config.gemini.apiKey,
    model: config.gemini.model,
    temperature: config.gemini.temperature,
    maxRetries: config.gemini.maxRetries,
    retryDelay: config.gemini.retryDelay,
    timeout: config.gemini.timeout,
    maxResults,
  });

  const local = new LocalModelClassifier({
    backend: config.localModel.url
      ? new HttpInferenceBackend({ url: config.localModel.url, timeout: config.localModel.timeout })
      : null,
    maxResults,
  });

  return [gemini, local];
}

/**
 * Construct a detector once and share it; build a new one to re-initialize
 */
export function createEmotionDetector(
  config: RuntimeConfig = getConfig(),
  logger?: Logger
): EmotionDetector {
  return new EmotionDetector(buildClassifiers(config), {
    threshold: config.detection.threshold,
    logger,
  });
}
