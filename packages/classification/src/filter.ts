/**
 * Filter Matching
 *
 * Rules are positional: rule i must match token i of the URL.
 */

import { ruleMatches } from './rules.js';
import { tokenize } from './tokenizer.js';
import type { LinkFilter } from './types.js';

export function filterMatches(filter: LinkFilter, url: string): boolean {
  if (!filter.enabled || filter.rules.length === 0) {
    return false;
  }

  const tokens = tokenize(url);
  if (filter.rules.length > tokens.length) {
    return false;
  }

  return filter.rules.every((rule, index) => {
    const token = tokens[index];
    return token !== undefined && ruleMatches(rule, token);
  });
}

/**
 * Stable sort by descending priority; equal priorities keep their order
 */
export function sortByPriority<T extends { priority: number }>(filters: T[]): T[] {
  return filters.sort((a, b) => b.priority - a.priority);
}
