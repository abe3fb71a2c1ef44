/**
 * Emotion Cipher Configuration
 *
 * Central configuration for detection thresholds, cipher parameters and
 * classifier backends.
 */

import { ConfigurationError } from './errors';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Emotion detection
   */
  detection: {
    threshold: 0.3,          // Minimum confidence for a primary emotion
    maxAdapterResults: 2,    // Classifier adapters report their top N labels
  },

  /**
   * Cipher Parameters
   *
   * The salt is fixed so that a password alone recovers the key. A random
   * per-envelope salt would need a `salt` field in the envelope schema.
   */
  cipher: {
    method: 'AES-256-Fernet',
    kdfIterations: 100000,
    keyLength: 32,           // bytes: 16 signing + 16 encryption
    salt: 'emotion_crypt_salt',
    shortTextLength: 16,
  },

  /**
   * Gemini API Configuration
   */
  gemini: {
    model: 'gemini-1.5-flash',
    temperature: 0.3,
    maxRetries: 3,           // Max API attempts
    retryDelay: 1000,        // Base backoff delay (ms), doubled per attempt
    timeout: 15000,          // Per-attempt timeout (ms)
  },

  /**
   * Local inference backend
   */
  localModel: {
    url: '',                 // Empty disables the local model tier
    timeout: 10000,
  },

  /**
   * API Server Configuration
   */
  api: {
    port: 3000,
    rateLimit: 100,          // Requests per minute per IP
    cipherRateLimit: 30,     // Encrypt/decrypt/detect calls per minute per IP
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',
  },
} as const;

/**
 * Type-safe configuration access
 */
export type AppConfig = typeof CONFIG;

/**
 * Runtime configuration with environment overrides applied. Logging is
 * read from the environment when each logger is created.
 */
export interface RuntimeConfig {
  detection: {
    threshold: number;
    maxAdapterResults: number;
  };
  cipher: {
    method: string;
    kdfIterations: number;
    keyLength: number;
    salt: string;
    shortTextLength: number;
    secret?: string;
  };
  gemini: {
    apiKey?: string;
    model: string;
    temperature: number;
    maxRetries: number;
    retryDelay: number;
    timeout: number;
  };
  localModel: {
    url: string;
    timeout: number;
  };
  api: {
    port: number;
    rateLimit: number;
    cipherRateLimit: number;
  };
}

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Environment-specific configuration overrides
 */
export const getConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  return {
    detection: {
      threshold: parseNumber(env.EMOTION_THRESHOLD, CONFIG.detection.threshold),
      maxAdapterResults: CONFIG.detection.maxAdapterResults,
    },
    cipher: {
      ...CONFIG.cipher,
      kdfIterations: parseNumber(env.CIPHER_KDF_ITERATIONS, CONFIG.cipher.kdfIterations),
      secret: env.CIPHER_SECRET || undefined,
    },
    gemini: {
      ...CONFIG.gemini,
      apiKey: env.GEMINI_API_KEY || undefined,
      model: env.GEMINI_MODEL || CONFIG.gemini.model,
    },
    localModel: {
      url: env.LOCAL_CLASSIFIER_URL || CONFIG.localModel.url,
      timeout: parseNumber(env.LOCAL_CLASSIFIER_TIMEOUT, CONFIG.localModel.timeout),
    },
    api: {
      ...CONFIG.api,
      port: Math.trunc(parseNumber(env.API_PORT, CONFIG.api.port)),
    },
  };
};

/**
 * Validate configuration on startup
 */
export const validateConfig = (config: RuntimeConfig): void => {
  if (config.detection.threshold < 0 || config.detection.threshold > 1) {
    throw new ConfigurationError('Emotion threshold must be between 0 and 1', {
      threshold: config.detection.threshold,
    });
  }

  if (config.cipher.kdfIterations < 100000) {
    throw new ConfigurationError('PBKDF2 iterations must be at least 100000', {
      kdfIterations: config.cipher.kdfIterations,
    });
  }

  if (config.cipher.keyLength !== 32) {
    throw new ConfigurationError('Fernet keys are exactly 32 bytes');
  }

  if (config.cipher.shortTextLength < 1) {
    throw new ConfigurationError('Short text length must be positive');
  }

  if (config.gemini.maxRetries < 1) {
    throw new ConfigurationError('Gemini maxRetries must be at least 1');
  }

  if (config.api.port < 1024 || config.api.port > 65535) {
    throw new ConfigurationError('API port must be between 1024 and 65535', {
      port: config.api.port,
    });
  }
};
