/**
 * Cipher module
 */

export { EmotionCipher } from './emotion-cipher';
export type { EmotionCipherOptions, DecryptionResult, IntegrityReport } from './emotion-cipher';
export { Fernet } from './fernet';
export type { FernetEncryptOptions, FernetDecryptOptions } from './fernet';
export { deriveKey, generateSecret } from './key-derivation';
export type { KeyDerivationOptions } from './key-derivation';
export {
  parseEnvelope,
  parseEnvelopeJson,
  freezeEnvelope,
  shortEncryptedText,
  envelopeSchema,
  SHORT_TEXT_ALPHABET,
} from './envelope';
export type { Envelope } from './envelope';
export { encodeBase64Url, decodeBase64Url } from './base64url';
export { formatEncryptedOutput, formatDecryptedOutput, joinEmotions } from './format';
export { SAMPLE_MESSAGES } from './examples';
export type { SampleMessage } from './examples';
