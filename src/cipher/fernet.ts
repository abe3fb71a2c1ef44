/**
 * Fernet authenticated encryption
 *
 * Token layout (then base64url encoded):
 *   version 0x80 | timestamp (u64 BE, seconds) | IV (16) | AES-128-CBC ciphertext | HMAC-SHA256 (32)
 *
 * The 32-byte key splits into a 16-byte signing key and a 16-byte
 * encryption key. The HMAC covers every byte before it and is checked
 * before any decryption happens.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes, timingSafeEqual } from 'crypto';
import { DecryptionError, ValidationError } from '../utils/errors';
import { decodeBase64Url, encodeBase64Url } from './base64url';

const VERSION = 0x80;
const TIMESTAMP_LENGTH = 8;
const IV_LENGTH = 16;
const BLOCK_SIZE = 16;
const HMAC_LENGTH = 32;
const HEADER_LENGTH = 1 + TIMESTAMP_LENGTH + IV_LENGTH;
const MIN_TOKEN_LENGTH = HEADER_LENGTH + BLOCK_SIZE + HMAC_LENGTH;
/** Tolerated clock skew for tokens from the future when a TTL is enforced */
const MAX_CLOCK_SKEW = 60;

export interface FernetEncryptOptions {
  /** Seconds since the epoch; defaults to now */
  timestamp?: number;
  iv?: Buffer;
}

export interface FernetDecryptOptions {
  /** Reject tokens older than this many seconds */
  ttlSeconds?: number;
  /** Seconds since the epoch; defaults to now */
  now?: number;
}

const currentTime = (): number => Math.floor(Date.now() / 1000);

export class Fernet {
  private readonly signingKey: Buffer;
  private readonly encryptionKey: Buffer;

  constructor(key: Buffer) {
    if (key.length !== 32) {
      throw new ValidationError('Fernet key must be 32 bytes', { length: key.length });
    }
    this.signingKey = key.subarray(0, 16);
    this.encryptionKey = key.subarray(16, 32);
  }

  encrypt(plaintext: Buffer, options: FernetEncryptOptions = {}): string {
    const iv = options.iv ?? randomBytes(IV_LENGTH);
    if (iv.length !== IV_LENGTH) {
      throw new ValidationError('Fernet IV must be 16 bytes', { length: iv.length });
    }

    const cipher = createCipheriv('aes-128-cbc', this.encryptionKey, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

    const header = Buffer.alloc(HEADER_LENGTH);
    header.writeUInt8(VERSION, 0);
    header.writeBigUInt64BE(BigInt(options.timestamp ?? currentTime()), 1);
    iv.copy(header, 1 + TIMESTAMP_LENGTH);

    const signed = Buffer.concat([header, ciphertext]);
    return encodeBase64Url(Buffer.concat([signed, this.sign(signed)]));
  }

  decrypt(token: string, options: FernetDecryptOptions = {}): Buffer {
    const data = decodeBase64Url(token);
    if (!data) {
      throw new DecryptionError('Invalid token: not base64url encoded');
    }

    if (data.length < MIN_TOKEN_LENGTH || (data.length - HEADER_LENGTH - HMAC_LENGTH) % BLOCK_SIZE !== 0) {
      throw new DecryptionError('Invalid token: truncated or malformed', { length: data.length });
    }

    if (data.readUInt8(0) !== VERSION) {
      throw new DecryptionError('Invalid token: unsupported version');
    }

    const signed = data.subarray(0, data.length - HMAC_LENGTH);
    const mac = data.subarray(data.length - HMAC_LENGTH);
    if (!timingSafeEqual(this.sign(signed), mac)) {
      throw new DecryptionError('Invalid token: signature mismatch (wrong key or tampered data)');
    }

    if (options.ttlSeconds !== undefined) {
      const timestamp = Number(data.readBigUInt64BE(1));
      const now = options.now ?? currentTime();
      if (timestamp + options.ttlSeconds < now) {
        throw new DecryptionError('Invalid token: expired', { timestamp, ttlSeconds: options.ttlSeconds });
      }
      if (timestamp > now + MAX_CLOCK_SKEW) {
        throw new DecryptionError('Invalid token: timestamp is in the future', { timestamp });
      }
    }

    const iv = data.subarray(1 + TIMESTAMP_LENGTH, HEADER_LENGTH);
    const ciphertext = data.subarray(HEADER_LENGTH, data.length - HMAC_LENGTH);

    try {
      const decipher = createDecipheriv('aes-128-cbc', this.encryptionKey, iv);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch (error) {
      throw new DecryptionError('Invalid token: bad padding', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Seconds-since-epoch timestamp embedded in a token, without verifying it
   */
  static extractTimestamp(token: string): number {
    const data = decodeBase64Url(token);
    if (!data || data.length < MIN_TOKEN_LENGTH) {
      throw new DecryptionError('Invalid token: truncated or malformed');
    }
    return Number(data.readBigUInt64BE(1));
  }

  private sign(data: Buffer): Buffer {
    return createHmac('sha256', this.signingKey).update(data).digest();
  }
}
