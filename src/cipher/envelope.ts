/**
 * Envelope types and validation
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import type { EmotionalSignature } from '../emotion/types';
import { MalformedEnvelopeError } from '../utils/errors';

/**
 * The persisted/transmitted artifact of one encrypt call
 */
export interface Envelope {
  readonly encrypted_text: string;
  readonly short_encrypted_text: string;
  readonly emotional_signature: EmotionalSignature;
  readonly encryption_method: string;
}

export const SHORT_TEXT_ALPHABET =
  'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789!@#$%^&*()_+-=[]{}|;:,.<>?';

const emotionalSignatureSchema = z.object({
  primary_emotions: z.array(z.string().min(1)),
  emotion_scores: z.record(z.number()),
  emotional_vector: z.record(z.number()),
  message_hash: z.string().regex(/^[0-9a-f]{16}$/, 'message_hash must be 16 lowercase hex characters'),
});

export const envelopeSchema = z.object({
  encrypted_text: z.string().min(1),
  short_encrypted_text: z.string(),
  emotional_signature: emotionalSignatureSchema,
  encryption_method: z.string().min(1),
});

/**
 * Decorative display string derived from the ciphertext text. Not used
 * for decryption.
 */
export function shortEncryptedText(encryptedText: string, length: number): string {
  const digest = createHash('sha256').update(encryptedText, 'utf8').digest();
  let short = '';
  for (let i = 0; i < length; i++) {
    short += SHORT_TEXT_ALPHABET[digest[i % digest.length] % SHORT_TEXT_ALPHABET.length];
  }
  return short;
}

export function freezeEnvelope(envelope: Envelope): Envelope {
  const signature = envelope.emotional_signature;
  return Object.freeze({
    encrypted_text: envelope.encrypted_text,
    short_encrypted_text: envelope.short_encrypted_text,
    emotional_signature: Object.freeze({
      primary_emotions: Object.freeze([...signature.primary_emotions]),
      emotion_scores: Object.freeze({ ...signature.emotion_scores }),
      emotional_vector: Object.freeze({ ...signature.emotional_vector }),
      message_hash: signature.message_hash,
    }),
    encryption_method: envelope.encryption_method,
  });
}

/**
 * Validate an untrusted value as an envelope
 */
export function parseEnvelope(input: unknown): Envelope {
  const parsed = envelopeSchema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedEnvelopeError('Envelope is missing required fields or is malformed', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return freezeEnvelope(parsed.data);
}

/**
 * Validate pasted or downloaded envelope JSON
 */
export function parseEnvelopeJson(text: string): Envelope {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new MalformedEnvelopeError('Envelope is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseEnvelope(payload);
}
