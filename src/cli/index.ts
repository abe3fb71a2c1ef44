#!/usr/bin/env node

/**
 * Emotion Cipher CLI - Entry Point
 */

import chalk from 'chalk';
import dotenv from 'dotenv';
import { ServiceContainer } from '../services';
import { CipherSession } from './session';

dotenv.config();

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  try {
    const services = new ServiceContainer();
    const session = new CipherSession(services.cipher, services.emotionDetector.describeChain());
    await session.run();
    process.exit(0);
  } catch (error) {
    console.error(chalk.red('\n❌ Error:'), error instanceof Error ? error.message : error);
    console.error(chalk.gray('\nStack trace:'), error instanceof Error ? error.stack : '');
    process.exit(1);
  }
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\n👋 Interrupted. Goodbye!'));
  process.exit(0);
});

process.on('SIGTERM', () => {
  process.exit(0);
});

void main();
