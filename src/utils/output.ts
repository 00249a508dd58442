/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
};

export function printSuccess(message: string): void {
  console.log(colors.success(`✓ ${message}`));
}

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printHeader(title: string): void {
  const line = '='.repeat(56);
  console.log(colors.success(line));
  console.log(colors.success(`   ${title}`));
  console.log(colors.success(line));
}

export function printKeyValue(key: string, value: string): void {
  console.log(`${colors.dim(key + ':')} ${value}`);
}

export function printBlank(): void {
  console.log('');
}

/**
 * Print pre-formatted text to stderr
 */
export function printRaw(text: string): void {
  console.error(text);
}

/**
 * Disable colors for the rest of the process
 */
export function disableColors(): void {
  chalk.level = 0;
}
