/**
 * CLI logging utilities
 */

import chalk from 'chalk';
import type { ValidationError } from '../../core/errors.js';

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
 * Log validation errors, one per line, with the field they belong to
 */
export function validationErrors(errors: readonly ValidationError[]): void {
  for (const err of errors) {
    const field = err.field ? chalk.gray(`[${err.field}] `) : '';
    error(`${field}${err.message}`);
  }
}

/**
 * Log fatal error and exit
 */
export function fatal(message: string, exitCode: number = 1): never {
  error(message);
  process.exit(exitCode);
}

/**
 * Log verbose message (only in verbose mode or with CFI_DEBUG=true)
 */
export function verbose(message: string, isVerbose: boolean = false): void {
  if (isVerbose || process.env.CFI_DEBUG === 'true') {
    console.log(chalk.gray('[verbose]'), message);
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
 * Mask a credential for display, keeping the first four characters
 */
export function mask(value: string): string {
  if (value.length <= 4) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, 4)}${'*'.repeat(Math.min(value.length - 4, 12))}`;
}

/**
 * Log empty line
 */
export function newline(): void {
  console.log();
}
