/**
 * Password-based key derivation and secret generation
 */

import { pbkdf2Sync, randomBytes } from 'crypto';
import { CONFIG } from '../utils/config';
import { ValidationError } from '../utils/errors';
import { encodeBase64Url } from './base64url';

export interface KeyDerivationOptions {
  salt?: string | Buffer;
  iterations?: number;
  keyLength?: number;
}

/**
 * PBKDF2-HMAC-SHA256. The salt defaults to a fixed value, so the secret
 * alone determines the key.
 */
export function deriveKey(secret: string, options: KeyDerivationOptions = {}): Buffer {
  if (secret.length === 0) {
    throw new ValidationError('Cipher secret must not be empty');
  }

  return pbkdf2Sync(
    Buffer.from(secret, 'utf8'),
    options.salt ?? CONFIG.cipher.salt,
    options.iterations ?? CONFIG.cipher.kdfIterations,
    options.keyLength ?? CONFIG.cipher.keyLength,
    'sha256'
  );
}

/**
 * Random 32-byte secret, base64url encoded, for callers without a password
 */
export function generateSecret(): string {
  return encodeBase64Url(randomBytes(32));
}
