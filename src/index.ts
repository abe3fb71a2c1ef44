/**
 * Emotion Cipher
 *
 * Encrypts text while exposing its emotional signature as plaintext
 * metadata.
 */

export * from './emotion';
export * from './cipher';
export {
  EmotionCipherError,
  ValidationError,
  ConfigurationError,
  ClassifierUnavailableError,
  ClassifierResponseError,
  DecryptionError,
  MalformedEnvelopeError,
  isEmotionCipherError,
  handleError,
} from './utils/errors';
export type { ClassifierError, IntegrityMismatch } from './utils/errors';
export { getConfig, validateConfig, CONFIG } from './utils/config';
export type { RuntimeConfig, AppConfig } from './utils/config';
export { Logger, LogLevel, createLogger } from './utils/logger';
