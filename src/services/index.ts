/**
 * ServiceContainer - wires the detector and cipher for the API and CLI
 *
 * Built once by the entry point and passed to whatever needs it; there is
 * no process-wide instance.
 */

import { EmotionCipher } from '../cipher/emotion-cipher';
import { EmotionDetector } from '../emotion/detector';
import { createEmotionDetector } from '../emotion/factory';
import { getConfig, RuntimeConfig, validateConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('ServiceContainer');

export interface ServiceContainerOptions {
  config?: RuntimeConfig;
  detector?: EmotionDetector;
  secret?: string;
}

export class ServiceContainer {
  public readonly config: RuntimeConfig;
  public readonly emotionDetector: EmotionDetector;
  public readonly cipher: EmotionCipher;

  constructor(options: ServiceContainerOptions = {}) {
    this.config = options.config ?? getConfig();
    validateConfig(this.config);

    // Step 1: classifier chain, initialized once
    this.emotionDetector = options.detector ?? createEmotionDetector(this.config);

    // Step 2: cipher bound to the configured secret
    this.cipher = new EmotionCipher({
      secret: options.secret ?? this.config.cipher.secret,
      detector: this.emotionDetector,
      threshold: this.config.detection.threshold,
      shortTextLength: this.config.cipher.shortTextLength,
      keyDerivation: {
        salt: this.config.cipher.salt,
        iterations: this.config.cipher.kdfIterations,
        keyLength: this.config.cipher.keyLength,
      },
    });

    if (this.cipher.secretWasGenerated) {
      logger.warn('No CIPHER_SECRET configured; generated a one-off secret. Envelopes will not decrypt after a restart.');
    }

    logger.info('Services initialized', {
      classifierChain: this.emotionDetector.describeChain(),
      threshold: this.config.detection.threshold,
    });
  }
}
