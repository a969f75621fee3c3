#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for linkgarden. Data lives in the configuration
 * directory (LINKGARDEN_CONFIG_DIR, or the current directory).
 */

// Loads .env before any workspace package creates the logger
import './config/index.js';

import { Command } from 'commander';
import chalk from 'chalk';

import { addCommand, importCommand } from './commands/add.js';
import { linksCommand, deleteCommand, reprocessCommand } from './commands/links.js';
import {
  filtersListCommand,
  filtersAddCommand,
  filtersRemoveCommand,
  filtersMoveCommand,
  filtersToggleCommand,
  filtersTestCommand,
} from './commands/filters.js';
import { downloadCommand } from './commands/download.js';
import { skippedCommand, overrideCommand } from './commands/skipped.js';
import { configCommand } from './commands/config.js';
import { statsCommand } from './commands/stats.js';
import { printError } from './lib/output.js';

/**
 * Print command failures instead of a stack trace
 */
function action<Args extends unknown[]>(
  handler: (...args: Args) => void | Promise<void>
): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await handler(...args);
    } catch (error) {
      printError(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  };
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('linkgarden')
  .description('Collect links, sort them with filters and download them with gallery-dl')
  .version('1.0.0');

// ============================================
// LINK COMMANDS
// ============================================

program
  .command('add <url...>')
  .description('Add links and classify them')
  .option('-t, --trim', 'Strip trailing brackets and quotes from each URL')
  .action(action(addCommand));

program
  .command('import <file...>')
  .description('Add every http(s) URL found in text files')
  .action(action(importCommand));

program
  .command('links')
  .description('List links')
  .option('-s, --status <status>', 'Only links with this status')
  .option('-a, --all', 'Include deleted links')
  .option('--json', 'Output in JSON format')
  .action(action(linksCommand));

program
  .command('delete <id>')
  .description('Delete a link (kept in storage, hidden from lists)')
  .action(action(deleteCommand));

program
  .command('reprocess [ids...]')
  .description('Run links through the filters again (all active links by default)')
  .action(action(reprocessCommand));

program
  .command('stats')
  .description('Show link statistics')
  .action(action(statsCommand));

// ============================================
// FILTER COMMANDS
// ============================================

const filters = program
  .command('filters')
  .description('Manage classification filters');

filters
  .command('list', { isDefault: true })
  .description('List filters in evaluation order')
  .action(action(filtersListCommand));

filters
  .command('add <name>')
  .description('Add a filter')
  .requiredOption('-a, --action <action>', 'to_download, to_skip or deleted')
  .option('-r, --rule <matchType[=pattern]>', 'Rule for the next token (repeatable)', collect, [])
  .option('-p, --priority <n>', 'Higher runs first', '0')
  .option('-d, --description <text>', 'Description')
  .option('--disabled', 'Create the filter disabled')
  .action(action(filtersAddCommand));

filters
  .command('remove <filter>')
  .description('Remove a filter by number, id or name')
  .action(action(filtersRemoveCommand));

filters
  .command('move <filter> <direction>')
  .description('Move a filter up or down one priority step')
  .action(action(filtersMoveCommand));

filters
  .command('enable <filter>')
  .description('Enable a filter')
  .action(action((reference: string) => filtersToggleCommand(reference, true)));

filters
  .command('disable <filter>')
  .description('Disable a filter')
  .action(action((reference: string) => filtersToggleCommand(reference, false)));

filters
  .command('test <url>')
  .description('Show the tokens of a URL and the filters that match it')
  .action(action(filtersTestCommand));

// ============================================
// DOWNLOAD COMMANDS
// ============================================

program
  .command('download [ids...]')
  .description('Download links waiting to be downloaded, or the given links')
  .option('--on-limit <policy>', 'Answer limit breaches without asking: continue or skip')
  .action(action(downloadCommand));

program
  .command('skipped')
  .description('List links skipped for exceeding a limit')
  .action(action(skippedCommand));

program
  .command('override [ids...]')
  .description('Download skipped links despite their limits')
  .option('--all', 'Every skipped link')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(action(overrideCommand));

// ============================================
// SYSTEM COMMANDS
// ============================================

program
  .command('config')
  .description('View or modify configuration')
  .option('--set <key=value>', 'Set a config value')
  .option('--get <key>', 'Get a config value')
  .option('--list', 'List all config values')
  .option('--reset', 'Reset to defaults')
  .action(action(configCommand));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('linkgarden --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
