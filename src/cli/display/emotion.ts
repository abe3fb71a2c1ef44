/**
 * Emotion Cipher CLI - Envelope and Emotion Display
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { DecryptionResult } from '../../cipher/emotion-cipher';
import type { Envelope } from '../../cipher/envelope';
import type { EmotionalSignature, EmotionLabel } from '../../emotion/types';

const EMOJI_MAP: Record<string, string> = {
  joy: '😊',
  excitement: '🤩',
  sadness: '😔',
  anger: '😠',
  anxiety: '😟',
  fear: '😨',
  surprise: '😲',
  love: '❤️',
  neutral: '😐',
};

export function getEmotionEmoji(emotion: EmotionLabel): string {
  return EMOJI_MAP[emotion.toLowerCase()] ?? '🎭';
}

/**
 * ASCII progress bar for a value in [0, 1]
 */
export function createProgressBar(value: number, width: number): string {
  const clamped = Math.max(0, Math.min(1, value));
  const filledWidth = Math.round(clamped * width);
  return '█'.repeat(filledWidth) + '░'.repeat(width - filledWidth);
}

export function renderEmotionBadges(emotions: readonly EmotionLabel[]): string {
  const labels = emotions.length > 0 ? emotions : ['Neutral'];
  return labels.map((emotion) => `${getEmotionEmoji(emotion)} ${chalk.bold.cyan(emotion)}`).join(chalk.gray(' + '));
}

/**
 * Scores and normalized vector side by side, in score order
 */
export function renderSignatureTable(signature: EmotionalSignature): string {
  const table = new Table({
    head: [
      chalk.white.bold('Emotion'),
      chalk.white.bold('Confidence'),
      chalk.white.bold('Share'),
    ],
    colWidths: [16, 30, 10],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  const rows = Object.entries(signature.emotion_scores).sort(([, a], [, b]) => b - a);
  for (const [emotion, confidence] of rows) {
    const share = signature.emotional_vector[emotion] ?? 0;
    table.push([
      `${getEmotionEmoji(emotion)} ${emotion}`,
      `${createProgressBar(confidence, 20)} ${confidence.toFixed(2)}`,
      `${(share * 100).toFixed(0)}%`,
    ]);
  }

  return table.toString();
}

export function renderEnvelope(envelope: Envelope): string {
  const signature = envelope.emotional_signature;
  return [
    chalk.bold('  🔒 Encrypted Message'),
    '',
    `   ${chalk.white('Encrypted Text:')} ${chalk.magenta(envelope.short_encrypted_text)}`,
    `   ${chalk.white('Detected Emotion:')} ${renderEmotionBadges(signature.primary_emotions)}`,
    `   ${chalk.white('Message Hash:')} ${chalk.gray(signature.message_hash)}`,
    `   ${chalk.white('Method:')} ${chalk.gray(envelope.encryption_method)}`,
    '',
    renderSignatureTable(signature),
  ].join('\n');
}

export function renderDecryption(result: DecryptionResult): string {
  const integrity = result.integrity.verified
    ? chalk.green('✓ hash verified')
    : chalk.red(`✗ ${result.integrity.warning?.message ?? 'hash mismatch'}`);
  const consistency = result.emotionsMatch
    ? chalk.green('✓ emotions match')
    : chalk.yellow('⚠ re-detected emotions differ from the signature');

  return [
    chalk.bold('  🔓 Decrypted Message'),
    '',
    `   ${chalk.white('Original Message:')} ${result.originalMessage}`,
    `   ${chalk.white('Signature Emotion:')} ${renderEmotionBadges(result.detectedEmotion)}`,
    `   ${chalk.white('Verified Emotion:')} ${renderEmotionBadges(result.verifiedEmotion)}`,
    `   ${chalk.white('Encrypted At:')} ${chalk.gray(result.encryptedAt ?? 'unknown')}`,
    `   ${integrity}`,
    `   ${consistency}`,
  ].join('\n');
}

export function displayEnvelope(envelope: Envelope): void {
  console.log(chalk.gray('\n┌' + '─'.repeat(68) + '┐'));
  console.log(renderEnvelope(envelope));
  console.log(chalk.gray('└' + '─'.repeat(68) + '┘'));
}

export function displayDecryption(result: DecryptionResult): void {
  console.log(chalk.gray('\n┌' + '─'.repeat(68) + '┐'));
  console.log(renderDecryption(result));
  console.log(chalk.gray('└' + '─'.repeat(68) + '┘'));
}
