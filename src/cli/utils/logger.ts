/**
 * CLI logging utilities
 * Core modules never print; everything user-facing goes through here
 */

import chalk from 'chalk';

/**
 * Log info message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Log success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Log warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log debug message (only when RESMAP_DEBUG=true)
 */
export function debug(message: string): void {
  if (process.env.RESMAP_DEBUG === 'true') {
    console.log(chalk.gray('[debug]'), message);
  }
}

/**
 * Log section header
 */
export function section(title: string): void {
  console.log();
  console.log(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.log();
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.log(chalk.gray(`${key}:`), chalk.white(value));
}

/**
 * Log empty line
 */
export function newline(): void {
  console.log();
}
