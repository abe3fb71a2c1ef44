/**
 * Emotion Cipher Custom Error Classes
 *
 * Provides type-safe error handling across the application.
 */

/**
 * Base application error
 */
export class EmotionCipherError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'EmotionCipherError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends EmotionCipherError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration error (500)
 */
export class ConfigurationError extends EmotionCipherError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A classifier backend could not be reached or initialized (503).
 * Recovered by the detector; never surfaces from encrypt/decrypt.
 */
export class ClassifierUnavailableError extends EmotionCipherError {
  constructor(classifier: string, message: string, details?: unknown) {
    super(`${classifier}: ${message}`, 'CLASSIFIER_UNAVAILABLE', 503, details);
    this.name = 'ClassifierUnavailableError';
  }
}

/**
 * A classifier backend answered with unusable data (502)
 */
export class ClassifierResponseError extends EmotionCipherError {
  constructor(classifier: string, message: string, details?: unknown) {
    super(`${classifier}: ${message}`, 'CLASSIFIER_RESPONSE_INVALID', 502, details);
    this.name = 'ClassifierResponseError';
  }
}

export type ClassifierError = ClassifierUnavailableError | ClassifierResponseError;

/**
 * Wrong key, corrupted or truncated ciphertext, or failed MAC (400)
 */
export class DecryptionError extends EmotionCipherError {
  constructor(message: string, details?: unknown) {
    super(message, 'DECRYPTION_ERROR', 400, details);
    this.name = 'DecryptionError';
  }
}

/**
 * Envelope is missing fields or is not validly structured (400)
 */
export class MalformedEnvelopeError extends EmotionCipherError {
  constructor(message: string, details?: unknown) {
    super(message, 'MALFORMED_ENVELOPE', 400, details);
    this.name = 'MalformedEnvelopeError';
  }
}

/**
 * Non-fatal report that a recovered plaintext does not match the stored
 * message hash. Attached to decrypt results, never thrown.
 */
export interface IntegrityMismatch {
  code: 'INTEGRITY_MISMATCH';
  message: string;
  expectedHash: string;
  actualHash: string;
}

export const integrityMismatch = (expectedHash: string, actualHash: string): IntegrityMismatch => ({
  code: 'INTEGRITY_MISMATCH',
  message: 'Message integrity check failed: recovered plaintext does not match the signature hash',
  expectedHash,
  actualHash,
});

/**
 * Type guard for EmotionCipherError
 */
export const isEmotionCipherError = (error: unknown): error is EmotionCipherError => {
  return error instanceof EmotionCipherError;
};

/**
 * Error handler utility
 */
export const handleError = (error: unknown): EmotionCipherError => {
  if (isEmotionCipherError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new EmotionCipherError(
      error.message,
      'UNKNOWN_ERROR',
      500,
      { originalError: error.name }
    );
  }

  return new EmotionCipherError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    500,
    { originalError: String(error) }
  );
};
