/**
 * Plain-text renderings of cipher results
 */

import type { EmotionLabel } from '../emotion/types';
import type { DecryptionResult } from './emotion-cipher';
import type { Envelope } from './envelope';

export const joinEmotions = (emotions: readonly EmotionLabel[]): string =>
  emotions.length > 0 ? emotions.join(' + ') : 'Neutral';

export function formatEncryptedOutput(envelope: Envelope, useShort: boolean = true): string {
  const encryptedText =
    useShort && envelope.short_encrypted_text
      ? envelope.short_encrypted_text
      : envelope.encrypted_text;

  return `Encrypted Text: ${encryptedText}\nDetected Emotion: ${joinEmotions(envelope.emotional_signature.primary_emotions)}`;
}

export function formatDecryptedOutput(result: DecryptionResult): string {
  return `Original Message: ${result.originalMessage}\nDetected Emotion: ${joinEmotions(result.detectedEmotion)}`;
}
