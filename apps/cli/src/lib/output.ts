/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { LinkStatus } from '@linkgarden/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printTable(data: Record<string, unknown>[]): void {
  if (data.length === 0) {
    printInfo('No data to display');
    return;
  }
  console.table(data);
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

const statusColors: Record<LinkStatus, (text: string) => string> = {
  pending: chalk.gray,
  to_download: chalk.cyan,
  to_skip: chalk.yellow,
  to_skip_limit: chalk.magenta,
  to_reprocess: chalk.gray,
  downloading: chalk.blue,
  downloaded: chalk.green,
  skipped: chalk.yellow,
  error: chalk.red,
};

export function formatStatus(status: LinkStatus): string {
  return statusColors[status](status);
}

/**
 * Shorten a string for table cells
 */
export function truncate(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 1)}…` : text;
}
