/**
 * CLI logging utilities
 */

import chalk from 'chalk';
import { DeployError } from '../../core/errors.js';

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
 * Log a failed run: "[stage] message" plus provider details for a DeployError
 */
export function failure(err: unknown): void {
  if (err instanceof DeployError) {
    error(`${chalk.bold(`[${err.stage}]`)} ${err.message}`);
    for (const line of err.details()) {
      console.error(chalk.gray(`    ${line}`));
    }
    return;
  }

  error(err instanceof Error ? err.message : String(err));
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
