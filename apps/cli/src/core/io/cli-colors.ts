/**
 * Shared color utilities for CLI output
 */

import chalk from 'chalk';

/**
 * Get the formatted preamble string with version
 */
export function getPreamble(version: string): string {
  return `${chalk.bold('simbatch')} ${chalk.dim(`v${version}`)} | ${chalk.cyan('batched code-similarity checks')}`;
}

/**
 * Get the preamble separator line
 */
export function getPreambleSeparator(): string {
  return chalk.dim('─'.repeat(48));
}
