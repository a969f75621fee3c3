/**
 * Filters Commands
 *
 * Manage classification filters and try them against a URL.
 */

import chalk from 'chalk';
import { ValidationError } from '@linkgarden/core';
import {
  FILTER_ACTIONS,
  MATCH_TYPES,
  createFilter,
  filterRuleSchema,
  tokenize,
  type FilterAction,
  type FilterRule,
  type LinkFilter,
  type MoveDirection,
} from '@linkgarden/classification';
import { findFilter, openWorkspace } from '../lib/context.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printTable,
} from '../lib/output.js';

interface FilterAddOptions {
  action: string;
  rule: string[];
  priority: string;
  description?: string;
  disabled?: boolean;
}

/**
 * Parse `<matchType>[=<pattern>]`, e.g. `match_exactly=www` or `match_any`
 */
export function parseRule(spec: string): FilterRule {
  const separator = spec.indexOf('=');
  const matchType = separator === -1 ? spec : spec.slice(0, separator);
  const token = separator === -1 ? '' : spec.slice(separator + 1);

  const result = filterRuleSchema.safeParse({ matchType, token });
  if (!result.success) {
    throw new ValidationError('rule', `unknown match type "${matchType}" (expected one of ${MATCH_TYPES.join(', ')})`);
  }
  return result.data;
}

function parseAction(value: string): FilterAction {
  const action = FILTER_ACTIONS.find((candidate) => candidate === value);
  if (!action) {
    throw new ValidationError('action', `must be one of ${FILTER_ACTIONS.join(', ')}`);
  }
  return action;
}

function parsePriority(value: string): number {
  const priority = Number(value);
  if (!Number.isInteger(priority)) {
    throw new ValidationError('priority', 'must be an integer');
  }
  return priority;
}

function formatRules(filter: LinkFilter): string {
  return filter.rules
    .map((rule) => (rule.token || rule.expression ? `${rule.matchType}=${rule.expression || rule.token}` : rule.matchType))
    .join(' | ');
}

export function filtersListCommand(): void {
  const ctx = openWorkspace();
  const filters = ctx.filters.list();

  if (filters.length === 0) {
    printInfo('No filters defined');
    return;
  }

  printTable(
    filters.map((filter) => ({
      id: filter.numericId,
      name: filter.name,
      action: filter.action,
      priority: filter.priority,
      enabled: filter.enabled ? chalk.green('yes') : chalk.gray('no'),
      rules: formatRules(filter),
    }))
  );
}

export function filtersAddCommand(name: string, options: FilterAddOptions): void {
  const ctx = openWorkspace();

  const filter = createFilter({
    name,
    description: options.description ?? '',
    action: parseAction(options.action),
    priority: parsePriority(options.priority),
    enabled: !options.disabled,
    rules: options.rule.map(parseRule),
  });

  if (!ctx.filters.add(filter)) {
    printError(`Could not add filter ${name}`);
    process.exit(1);
  }
  printSuccess(`Added filter #${filter.numericId ?? '?'} ${name}`);
  printInfo('Run "linkgarden reprocess" to apply it to existing links');
}

export function filtersRemoveCommand(reference: string): void {
  const ctx = openWorkspace();
  const filter = findFilter(ctx, reference);
  ctx.filters.remove(filter.id);
  printSuccess(`Removed filter ${filter.name}`);
}

export function filtersMoveCommand(reference: string, direction: string): void {
  if (direction !== 'up' && direction !== 'down') {
    throw new ValidationError('direction', 'must be "up" or "down"');
  }
  const moveDirection: MoveDirection = direction;

  const ctx = openWorkspace();
  const filter = findFilter(ctx, reference);
  if (!ctx.filters.move(filter.id, moveDirection)) {
    printInfo(`${filter.name} is already at the ${moveDirection === 'up' ? 'top' : 'bottom'}`);
    return;
  }
  printSuccess(`Moved ${filter.name} ${moveDirection} (priority ${filter.priority})`);
}

export function filtersToggleCommand(reference: string, enabled: boolean): void {
  const ctx = openWorkspace();
  const filter = findFilter(ctx, reference);
  ctx.filters.update({ ...filter, enabled });
  printSuccess(`${enabled ? 'Enabled' : 'Disabled'} filter ${filter.name}`);
}

export function filtersTestCommand(url: string): void {
  const ctx = openWorkspace();

  printHeader('Tokens');
  tokenize(url).forEach((token, index) => {
    printKeyValue(String(index), token);
  });

  const matches = ctx.engine.findAllMatchingFilters(url);
  printHeader('Matching filters');
  if (matches.length === 0) {
    printInfo('No filter matches this URL');
    return;
  }

  matches.forEach((filter, index) => {
    const marker = index === 0 ? chalk.green('→') : ' ';
    console.log(`${marker} #${filter.numericId ?? '?'} ${filter.name} ${chalk.gray(`(${filter.action}, priority ${filter.priority})`)}`);
  });
}
