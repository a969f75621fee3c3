/**
 * Config Command
 *
 * View and manage config.json in the configuration directory.
 */

import chalk from 'chalk';
import { ValidationError } from '@linkgarden/core';
import { isObject } from '@linkgarden/utils';
import { openWorkspace } from '../lib/context.js';
import { printError, printHeader, printKeyValue, printSuccess } from '../lib/output.js';

interface ConfigOptions {
  set?: string;
  get?: string;
  list?: boolean;
  reset?: boolean;
}

/**
 * Flatten nested settings into dotted key paths
 */
export function flattenConfig(value: unknown, prefix: string = ''): Array<[string, unknown]> {
  if (!isObject(value)) {
    return [[prefix, value]];
  }
  return Object.entries(value).flatMap(([key, child]) =>
    flattenConfig(child, prefix ? `${prefix}.${key}` : key)
  );
}

/**
 * Values are read as JSON where possible, so numbers and arrays keep their type
 */
export function parseConfigValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function configCommand(options: ConfigOptions): void {
  const ctx = openWorkspace();
  const { settings } = ctx;

  if (options.reset) {
    settings.reset();
    settings.save();
    printSuccess('Configuration reset to defaults');
    return;
  }

  if (options.set) {
    const separator = options.set.indexOf('=');
    if (separator === -1) {
      throw new ValidationError('set', 'expected <key>=<value>');
    }
    const key = options.set.slice(0, separator);
    const value = parseConfigValue(options.set.slice(separator + 1));
    settings.set(key, value);
    if (!settings.save()) {
      printError('Could not write configuration');
      process.exit(1);
    }
    printSuccess(`Set ${key} = ${JSON.stringify(settings.get(key))}`);
    return;
  }

  if (options.get) {
    const value = settings.get(options.get);
    if (value === undefined) {
      throw new ValidationError(options.get, 'unknown configuration key');
    }
    printKeyValue(options.get, JSON.stringify(value));
    return;
  }

  printHeader('Configuration');
  for (const [key, value] of flattenConfig(settings.current)) {
    console.log(`${chalk.cyan(key)}: ${JSON.stringify(value)}`);
  }
  console.log();
  console.log(chalk.gray(`Stored in ${ctx.paths.configFile}`));
  console.log(chalk.gray('Use "linkgarden config --set <key>=<value>" to change a value'));
}
