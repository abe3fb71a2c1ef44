/**
 * EmotionCipher - encrypts messages and binds them to an emotional
 * signature that stays readable beside the ciphertext
 */

import { TextDecoder } from 'util';
import { EmotionDetector } from '../emotion/detector';
import { buildSignature, messageHash } from '../emotion/signature';
import type { EmotionalSignature, EmotionLabel } from '../emotion/types';
import { CONFIG } from '../utils/config';
import { DecryptionError, IntegrityMismatch, integrityMismatch, MalformedEnvelopeError } from '../utils/errors';
import { createLogger, Logger } from '../utils/logger';
import { decodeBase64Url, encodeBase64Url } from './base64url';
import { Envelope, freezeEnvelope, parseEnvelope, shortEncryptedText } from './envelope';
import { Fernet } from './fernet';
import { deriveKey, generateSecret, KeyDerivationOptions } from './key-derivation';

export interface EmotionCipherOptions {
  /** Password or secret; a random one is generated when absent */
  secret?: string;
  detector?: EmotionDetector;
  threshold?: number;
  shortTextLength?: number;
  /** Reject envelopes older than this many seconds on decrypt */
  ttlSeconds?: number;
  keyDerivation?: KeyDerivationOptions;
  logger?: Logger;
}

export interface IntegrityReport {
  verified: boolean;
  warning?: IntegrityMismatch;
}

export interface DecryptionResult {
  originalMessage: string;
  /** Primary emotions stored in the envelope's signature */
  detectedEmotion: EmotionLabel[];
  /** Primary emotions re-detected from the recovered plaintext */
  verifiedEmotion: EmotionLabel[];
  emotionalSignature: EmotionalSignature;
  integrity: IntegrityReport;
  emotionsMatch: boolean;
  /** ISO time from the token, or null when its timestamp is outside the Date range */
  encryptedAt: string | null;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Largest millisecond value a Date can hold */
const MAX_DATE_MS = 8.64e15;

const tokenTime = (seconds: number): string | null =>
  Number.isSafeInteger(seconds) && Math.abs(seconds * 1000) <= MAX_DATE_MS
    ? new Date(seconds * 1000).toISOString()
    : null;

const sameLabels = (a: readonly EmotionLabel[], b: readonly EmotionLabel[]): boolean => {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((label) => right.has(label));
};

export class EmotionCipher {
  readonly method = CONFIG.cipher.method;
  readonly secretWasGenerated: boolean;

  private readonly secret: string;
  private readonly fernet: Fernet;
  private readonly detector: EmotionDetector;
  private readonly threshold: number;
  private readonly shortTextLength: number;
  private readonly ttlSeconds?: number;
  private readonly logger: Logger;

  constructor(options: EmotionCipherOptions = {}) {
    this.secretWasGenerated = !options.secret;
    this.secret = options.secret || generateSecret();
    this.fernet = new Fernet(deriveKey(this.secret, options.keyDerivation));
    this.detector = options.detector ?? new EmotionDetector();
    this.threshold = options.threshold ?? this.detector.threshold;
    this.shortTextLength = options.shortTextLength ?? CONFIG.cipher.shortTextLength;
    this.ttlSeconds = options.ttlSeconds;
    this.logger = options.logger ?? createLogger('EmotionCipher');
  }

  /**
   * The secret in use, needed to decrypt envelopes elsewhere
   */
  exportSecret(): string {
    return this.secret;
  }

  /**
   * Detect emotions on the plaintext, then encrypt it
   */
  async encrypt(message: string): Promise<Envelope> {
    const { emotions, source } = await this.detector.analyze(message);
    const signature = buildSignature(message, emotions, this.threshold);

    const token = this.fernet.encrypt(Buffer.from(message, 'utf8'));
    const encryptedText = encodeBase64Url(Buffer.from(token, 'ascii'));

    this.logger.debug('Message encrypted', {
      source,
      primaryEmotions: signature.primary_emotions,
      length: message.length,
    });

    return freezeEnvelope({
      encrypted_text: encryptedText,
      short_encrypted_text: shortEncryptedText(encryptedText, this.shortTextLength),
      emotional_signature: signature,
      encryption_method: this.method,
    });
  }

  /**
   * Decrypt an envelope, check the message hash and re-detect emotions.
   * A hash mismatch is reported in `integrity`, not thrown.
   */
  async decrypt(input: unknown): Promise<DecryptionResult> {
    const envelope = parseEnvelope(input);
    if (envelope.encryption_method !== this.method) {
      throw new MalformedEnvelopeError(`Unsupported encryption method: ${envelope.encryption_method}`, {
        expected: this.method,
      });
    }

    const tokenBytes = decodeBase64Url(envelope.encrypted_text);
    if (!tokenBytes) {
      throw new DecryptionError('Encrypted text is not valid base64url');
    }
    const token = tokenBytes.toString('latin1');

    const plaintext = this.fernet.decrypt(token, { ttlSeconds: this.ttlSeconds });

    let originalMessage: string;
    try {
      originalMessage = utf8.decode(plaintext);
    } catch (error) {
      throw new DecryptionError('Decrypted bytes are not valid UTF-8', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const signature = envelope.emotional_signature;
    const actualHash = messageHash(originalMessage);
    const integrity: IntegrityReport = { verified: actualHash === signature.message_hash };
    if (!integrity.verified) {
      integrity.warning = integrityMismatch(signature.message_hash, actualHash);
      this.logger.warn('Message integrity check failed', {
        expectedHash: signature.message_hash,
        actualHash,
      });
    }

    const detectedEmotion = [...signature.primary_emotions];
    const verifiedEmotion = await this.detector.primary(originalMessage, this.threshold);

    return {
      originalMessage,
      detectedEmotion,
      verifiedEmotion,
      emotionalSignature: signature,
      integrity,
      emotionsMatch: sameLabels(detectedEmotion, verifiedEmotion),
      encryptedAt: tokenTime(Fernet.extractTimestamp(token)),
    };
  }
}
