/**
 * Emotion Cipher CLI - Welcome Screen
 */

import chalk from 'chalk';

/**
 * Display welcome banner
 */
export function displayWelcome(classifierChain: string[]): void {
  const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('║')}            🔐  ${chalk.magenta.bold('Emotion Cipher')} ${chalk.gray('- encrypted text, readable feelings')}   ${chalk.cyan('║')}
${chalk.cyan('║')}                                                                   ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════════════╝')}

${chalk.cyan.bold('How it works:')}
  ${chalk.white('1.')} ${chalk.green('Detect')} the emotions in your message
  ${chalk.white('2.')} ${chalk.green('Encrypt')} the message itself
  ${chalk.white('3.')} ${chalk.green('Publish')} the emotional signature beside the ciphertext
  ${chalk.white('4.')} ${chalk.green('Decrypt')} to verify the message and its emotions

${chalk.yellow.bold('Classifier chain:')} ${chalk.gray(classifierChain.join(' → '))}

${chalk.gray('─'.repeat(70))}
`;

  console.log(banner);
}
