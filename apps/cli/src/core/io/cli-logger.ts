/**
 * User-facing CLI output
 *
 * Structured logs go through the winston logger; these helpers print the
 * short colored lines an operator reads while a batch runs.
 */

import chalk from 'chalk';

export function printError(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`ℹ ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${message}`));
}

export function printProgress(message: string): void {
  console.log(chalk.dim(`  ${message}`));
}
