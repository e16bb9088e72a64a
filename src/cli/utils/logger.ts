/**
 * CLI logging utilities
 *
 * Everything goes to stderr; stdout belongs to the wrapped command.
 */

import chalk from 'chalk';

let verboseEnabled = false;

/**
 * Turn verbose output on or off
 */
export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function isVerbose(): boolean {
  return verboseEnabled;
}

/**
 * Log info message
 */
export function info(message: string): void {
  console.error(chalk.blue('ℹ'), message);
}

/**
 * Log success message
 */
export function success(message: string): void {
  console.error(chalk.green('✓'), message);
}

/**
 * Log warning message
 */
export function warn(message: string): void {
  console.error(chalk.yellow('⚠'), message);
}

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log remediation hint
 */
export function hint(message: string): void {
  console.error(chalk.gray(`  ${message}`));
}

/**
 * Log verbose message (only in verbose mode)
 */
export function verbose(message: string, isEnabled: boolean = verboseEnabled): void {
  if (isEnabled) {
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Log section header
 */
export function section(title: string): void {
  console.error();
  console.error(chalk.bold.cyan(`━━━ ${title} ━━━`));
  console.error();
}

/**
 * Log key-value pair
 */
export function keyValue(key: string, value: string): void {
  console.error(chalk.gray(`${key}:`), chalk.white(value));
}
