/**
 * Emotion Cipher CLI - interactive encrypt/decrypt loop
 */

import chalk from 'chalk';
import ora from 'ora';
import { EmotionCipher } from '../cipher/emotion-cipher';
import { Envelope, parseEnvelopeJson } from '../cipher/envelope';
import { isEmotionCipherError } from '../utils/errors';
import { displayDecryption, displayEnvelope } from './display/emotion';
import { displayWelcome } from './display/welcome';
import { MenuAction, promptEnvelopeJson, promptExample, promptMenu, promptMessage } from './prompts';

export class CipherSession {
  private lastEnvelope: Envelope | null = null;

  constructor(
    private readonly cipher: EmotionCipher,
    private readonly classifierChain: string[]
  ) {}

  async run(): Promise<void> {
    console.clear();
    displayWelcome(this.classifierChain);

    if (this.cipher.secretWasGenerated) {
      console.log(chalk.yellow('⚠ No CIPHER_SECRET set. Using a one-off secret for this session:'));
      console.log(chalk.gray(`  ${this.cipher.exportSecret()}\n`));
    }

    for (;;) {
      const action = await promptMenu(this.lastEnvelope !== null);
      if (action === 'exit') {
        console.log(chalk.yellow('\n👋 Goodbye!'));
        return;
      }

      try {
        await this.handle(action);
      } catch (error) {
        if (!isEmotionCipherError(error)) {
          throw error;
        }
        console.log(chalk.red(`\n✗ ${error.message} (${error.code})\n`));
      }
    }
  }

  private async handle(action: Exclude<MenuAction, 'exit'>): Promise<void> {
    switch (action) {
      case 'encrypt':
        await this.encrypt(await promptMessage());
        return;
      case 'example':
        await this.encrypt(await promptExample());
        return;
      case 'decrypt-last':
        if (this.lastEnvelope) {
          await this.decrypt(this.lastEnvelope);
        }
        return;
      case 'decrypt-json':
        await this.decrypt(parseEnvelopeJson(await promptEnvelopeJson()));
        return;
    }
  }

  private async encrypt(message: string): Promise<void> {
    const spinner = ora('Detecting emotions and encrypting...').start();
    try {
      const envelope = await this.cipher.encrypt(message);
      spinner.succeed(chalk.green('✓ Message encrypted'));
      this.lastEnvelope = envelope;
      displayEnvelope(envelope);
      console.log(chalk.gray('\nFull envelope (JSON):'));
      console.log(JSON.stringify(envelope, null, 2));
    } catch (error) {
      spinner.fail(chalk.red('Encryption failed'));
      throw error;
    }
  }

  private async decrypt(envelope: Envelope): Promise<void> {
    const spinner = ora('Decrypting and re-detecting emotions...').start();
    try {
      const result = await this.cipher.decrypt(envelope);
      spinner.succeed(chalk.green('✓ Message decrypted'));
      displayDecryption(result);
    } catch (error) {
      spinner.fail(chalk.red('Decryption failed'));
      throw error;
    }
  }
}
