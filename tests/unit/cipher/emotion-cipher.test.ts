/**
 * EmotionCipher Unit Tests
 *
 * No remote classifiers are configured, so detection runs on the keyword
 * classifier throughout.
 */

import { encodeBase64Url } from '../../../src/cipher/base64url';
import { EmotionCipher } from '../../../src/cipher/emotion-cipher';
import { SHORT_TEXT_ALPHABET } from '../../../src/cipher/envelope';
import { SAMPLE_MESSAGES } from '../../../src/cipher/examples';
import { Fernet } from '../../../src/cipher/fernet';
import { formatDecryptedOutput, formatEncryptedOutput, joinEmotions } from '../../../src/cipher/format';
import { deriveKey } from '../../../src/cipher/key-derivation';
import { DecryptionError, MalformedEnvelopeError } from '../../../src/utils/errors';

describe('EmotionCipher', () => {
  let cipher: EmotionCipher;

  beforeAll(() => {
    cipher = new EmotionCipher({ secret: 'test-secret' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const corrupt = (text: string, index: number): string => {
    const replacement = text[index] === 'A' ? 'B' : 'A';
    return text.slice(0, index) + replacement + text.slice(index + 1);
  };

  describe('encrypt', () => {
    it('should attach the emotional signature to the envelope', async () => {
      // Act
      const envelope = await cipher.encrypt(
        "I can't believe I failed that test again. I'm so disappointed and frustrated right now."
      );

      // Assert
      expect(envelope.encryption_method).toBe('AES-256-Fernet');
      expect(envelope.emotional_signature.primary_emotions).toEqual(['Anger', 'Sadness']);
      expect(envelope.emotional_signature.emotion_scores).toEqual({ Anger: 0.4, Sadness: 0.4 });
      expect(envelope.emotional_signature.emotional_vector).toEqual({ Anger: 0.5, Sadness: 0.5 });
    });

    it('should derive a 16 character display string from the display alphabet', async () => {
      const envelope = await cipher.encrypt('hello there');

      expect(envelope.short_encrypted_text).toHaveLength(16);
      expect([...envelope.short_encrypted_text].every((char) => SHORT_TEXT_ALPHABET.includes(char))).toBe(
        true
      );
    });

    it('should not leak the plaintext into the ciphertext', async () => {
      const envelope = await cipher.encrypt('meet me at the usual place');

      expect(envelope.encrypted_text).not.toContain('usual');
      expect(Buffer.from(envelope.encrypted_text, 'base64url').toString('latin1').startsWith('gAAAAA')).toBe(
        true
      );
    });

    it('should produce different ciphertexts with the same hash for the same message', async () => {
      const first = await cipher.encrypt('same message');
      const second = await cipher.encrypt('same message');

      expect(first.encrypted_text).not.toBe(second.encrypted_text);
      expect(first.emotional_signature.message_hash).toBe(second.emotional_signature.message_hash);
    });

    it('should encrypt the empty string with a neutral signature', async () => {
      const envelope = await cipher.encrypt('');

      expect(envelope.emotional_signature).toEqual({
        primary_emotions: ['Neutral'],
        emotion_scores: { Neutral: 0.5 },
        emotional_vector: { Neutral: 1 },
        message_hash: 'e3b0c44298fc1c14',
      });
    });

    it('should return a frozen envelope', async () => {
      const envelope = await cipher.encrypt('hello there');

      expect(Object.isFrozen(envelope)).toBe(true);
      expect(Object.isFrozen(envelope.emotional_signature)).toBe(true);
      expect(Object.isFrozen(envelope.emotional_signature.emotion_scores)).toBe(true);
    });
  });

  describe('decrypt', () => {
    it('should recover the message and re-detect its emotions', async () => {
      // Arrange
      const message = "Finally got the job offer! I'm thrilled and can't wait to start this new journey.";
      const envelope = await cipher.encrypt(message);

      // Act
      const result = await cipher.decrypt(envelope);

      // Assert
      expect(result.originalMessage).toBe(message);
      expect(result.detectedEmotion).toEqual(['Joy', 'Excitement']);
      expect(result.verifiedEmotion).toEqual(['Joy', 'Excitement']);
      expect(result.emotionsMatch).toBe(true);
      expect(result.integrity).toEqual({ verified: true });
      expect(result.emotionalSignature).toEqual(envelope.emotional_signature);
    });

    it('should round-trip non-ASCII text', async () => {
      const message = 'Über glücklich 😊 heute, 今日は';
      const envelope = await cipher.encrypt(message);

      const result = await cipher.decrypt(envelope);

      expect(result.originalMessage).toBe(message);
    });

    it('should round-trip the empty string', async () => {
      const envelope = await cipher.encrypt('');

      const result = await cipher.decrypt(envelope);

      expect(result.originalMessage).toBe('');
      expect(result.verifiedEmotion).toEqual(['Neutral']);
    });

    it('should decrypt an envelope that went through JSON', async () => {
      const envelope = await cipher.encrypt('I love this');

      const result = await cipher.decrypt(JSON.parse(JSON.stringify(envelope)));

      expect(result.originalMessage).toBe('I love this');
      expect(result.detectedEmotion).toEqual(['Love']);
    });

    it('should report the encryption time from the token', async () => {
      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      const envelope = await cipher.encrypt('hello there');

      const result = await cipher.decrypt(envelope);

      expect(result.encryptedAt).toBe('2023-11-14T22:13:20.000Z');
    });

    it('should still decrypt a token whose timestamp is beyond the Date range', async () => {
      // Arrange: a validly signed token with a far-future timestamp
      const envelope = await cipher.encrypt('hello there');
      const token = new Fernet(deriveKey('test-secret')).encrypt(Buffer.from('hello there', 'utf8'), {
        timestamp: 2 ** 53,
      });
      const farFuture = { ...envelope, encrypted_text: encodeBase64Url(Buffer.from(token, 'ascii')) };

      // Act
      const result = await cipher.decrypt(farFuture);

      // Assert
      expect(result.originalMessage).toBe('hello there');
      expect(result.integrity).toEqual({ verified: true });
      expect(result.encryptedAt).toBeNull();
    });

    it('should not mutate the envelope', async () => {
      const envelope = await cipher.encrypt('I love this');
      const before = JSON.stringify(envelope);

      await cipher.decrypt(envelope);

      expect(JSON.stringify(envelope)).toBe(before);
    });

    it('should fail with a decryption error when the ciphertext is altered', async () => {
      const envelope = await cipher.encrypt('hello there');
      const tampered = { ...envelope, encrypted_text: corrupt(envelope.encrypted_text, 20) };

      await expect(cipher.decrypt(tampered)).rejects.toBeInstanceOf(DecryptionError);
    });

    it('should fail with a decryption error when the last character is altered', async () => {
      const envelope = await cipher.encrypt('hello there');
      const tampered = {
        ...envelope,
        encrypted_text: corrupt(envelope.encrypted_text, envelope.encrypted_text.length - 5),
      };

      await expect(cipher.decrypt(tampered)).rejects.toBeInstanceOf(DecryptionError);
    });

    it('should fail with a decryption error under another secret', async () => {
      const envelope = await cipher.encrypt('hello there');
      const other = new EmotionCipher({ secret: 'another-test-secret' });

      await expect(other.decrypt(envelope)).rejects.toThrow(
        'Invalid token: signature mismatch (wrong key or tampered data)'
      );
    });

    it('should reject encrypted text that is not base64url', async () => {
      const envelope = await cipher.encrypt('hello there');

      await expect(cipher.decrypt({ ...envelope, encrypted_text: 'not base64!' })).rejects.toThrow(
        'Encrypted text is not valid base64url'
      );
    });

    it('should reject a malformed envelope', async () => {
      await expect(cipher.decrypt({ encrypted_text: 'abc' })).rejects.toBeInstanceOf(MalformedEnvelopeError);
    });

    it('should reject an unsupported encryption method', async () => {
      const envelope = await cipher.encrypt('hello there');

      await expect(cipher.decrypt({ ...envelope, encryption_method: 'ROT13' })).rejects.toThrow(
        'Unsupported encryption method: ROT13'
      );
    });

    it('should report a hash mismatch as an integrity warning', async () => {
      // Arrange
      const envelope = await cipher.encrypt('I love this');
      const altered = {
        ...envelope,
        emotional_signature: { ...envelope.emotional_signature, message_hash: '0000000000000000' },
      };

      // Act
      const result = await cipher.decrypt(altered);

      // Assert
      expect(result.originalMessage).toBe('I love this');
      expect(result.integrity.verified).toBe(false);
      expect(result.integrity.warning).toMatchObject({
        code: 'INTEGRITY_MISMATCH',
        expectedHash: '0000000000000000',
        actualHash: envelope.emotional_signature.message_hash,
      });
    });

    it('should flag when stored and re-detected emotions differ', async () => {
      const envelope = await cipher.encrypt('I love this');
      const altered = {
        ...envelope,
        emotional_signature: { ...envelope.emotional_signature, primary_emotions: ['Fear'] },
      };

      const result = await cipher.decrypt(altered);

      expect(result.detectedEmotion).toEqual(['Fear']);
      expect(result.verifiedEmotion).toEqual(['Love']);
      expect(result.emotionsMatch).toBe(false);
    });

    it('should enforce the ttl when one is set', async () => {
      const expiring = new EmotionCipher({ secret: 'test-secret', ttlSeconds: 60 });
      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000);
      const envelope = await expiring.encrypt('hello there');

      jest.spyOn(Date, 'now').mockReturnValue(1_700_000_000_000 + 61_000);

      await expect(expiring.decrypt(envelope)).rejects.toThrow('Invalid token: expired');
    });
  });

  describe('secrets', () => {
    it('should generate a secret when none is given', () => {
      const generated = new EmotionCipher();

      expect(generated.secretWasGenerated).toBe(true);
      expect(generated.exportSecret()).toMatch(/^[A-Za-z0-9_-]{43}=$/);
    });

    it('should let another instance decrypt with the exported secret', async () => {
      const generated = new EmotionCipher();
      const envelope = await generated.encrypt('hello there');

      const result = await new EmotionCipher({ secret: generated.exportSecret() }).decrypt(envelope);

      expect(result.originalMessage).toBe('hello there');
    });
  });

  describe('sample messages', () => {
    it.each([
      ['Joy + Anxiety', ['Joy', 'Excitement', 'Anxiety']],
      ['Sadness + Anger', ['Anger', 'Sadness']],
      ['Joy + Excitement', ['Joy', 'Excitement']],
    ])('should round-trip the %s sample', async (title, expected) => {
      const sample = SAMPLE_MESSAGES.find((entry) => entry.title === title);
      expect(sample).toBeDefined();
      if (!sample) return;

      const envelope = await cipher.encrypt(sample.message);
      const result = await cipher.decrypt(envelope);

      expect(envelope.emotional_signature.primary_emotions).toEqual(expected);
      expect(result.originalMessage).toBe(sample.message);
      expect(result.emotionsMatch).toBe(true);
    });
  });
});

describe('format', () => {
  let cipher: EmotionCipher;

  beforeAll(() => {
    cipher = new EmotionCipher({ secret: 'test-secret' });
  });

  it('should join emotions with a plus sign', () => {
    expect(joinEmotions(['Joy', 'Excitement'])).toBe('Joy + Excitement');
    expect(joinEmotions([])).toBe('Neutral');
  });

  it('should render the short ciphertext by default', async () => {
    const envelope = await cipher.encrypt('I love this');

    expect(formatEncryptedOutput(envelope)).toBe(
      `Encrypted Text: ${envelope.short_encrypted_text}\nDetected Emotion: Love`
    );
    expect(formatEncryptedOutput(envelope, false)).toBe(
      `Encrypted Text: ${envelope.encrypted_text}\nDetected Emotion: Love`
    );
  });

  it('should render the recovered message with the stored emotions', async () => {
    const envelope = await cipher.encrypt('I love this');

    const result = await cipher.decrypt(envelope);

    expect(formatDecryptedOutput(result)).toBe('Original Message: I love this\nDetected Emotion: Love');
  });
});
