/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { JarsmithError, describeError } from '@jarsmith/core';

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i] ?? 'B'}`;
}

/**
 * Print an error with its code and exit with the code's exit status
 */
export function exitWithError(error: unknown): never {
  if (error instanceof JarsmithError) {
    printError(`${chalk.bold(error.code)} ${error.message}`);
    if (error.cause !== undefined) {
      console.error(chalk.gray(`  caused by: ${describeError(error.cause)}`));
    }
    process.exit(error.exitCode);
  }
  printError(describeError(error));
  process.exit(1);
}
