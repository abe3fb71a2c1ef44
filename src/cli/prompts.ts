/**
 * Emotion Cipher CLI - Inquirer Prompts
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { SAMPLE_MESSAGES } from '../cipher/examples';

export type MenuAction = 'encrypt' | 'example' | 'decrypt-last' | 'decrypt-json' | 'exit';

export async function promptMenu(hasLastEnvelope: boolean): Promise<MenuAction> {
  const { action } = await inquirer.prompt<{ action: MenuAction }>([
    {
      type: 'list',
      name: 'action',
      message: 'What would you like to do?',
      choices: [
        { name: '🔒 Encrypt a message', value: 'encrypt' },
        { name: '📝 Encrypt an example', value: 'example' },
        ...(hasLastEnvelope ? [{ name: '🔓 Decrypt the last envelope', value: 'decrypt-last' }] : []),
        { name: '📋 Decrypt pasted envelope JSON', value: 'decrypt-json' },
        { name: '👋 Exit', value: 'exit' },
      ],
    },
  ]);

  return action;
}

export async function promptMessage(): Promise<string> {
  const { message } = await inquirer.prompt<{ message: string }>([
    {
      type: 'input',
      name: 'message',
      message: 'Message to encrypt:',
      validate: (input: string) => (input.trim().length > 0 ? true : 'Please enter a message'),
    },
  ]);

  return message;
}

export async function promptExample(): Promise<string> {
  const { message } = await inquirer.prompt<{ message: string }>([
    {
      type: 'list',
      name: 'message',
      message: 'Choose an example:',
      choices: SAMPLE_MESSAGES.map((sample) => ({
        name: `${sample.title} ${chalk.gray(`"${sample.message}"`)}`,
        value: sample.message,
        short: sample.title,
      })),
    },
  ]);

  return message;
}

export async function promptEnvelopeJson(): Promise<string> {
  const { json } = await inquirer.prompt<{ json: string }>([
    {
      type: 'editor',
      name: 'json',
      message: 'Paste the envelope JSON (an editor will open):',
    },
  ]);

  return json;
}
