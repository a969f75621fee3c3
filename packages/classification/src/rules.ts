/**
 * Rule Matching
 *
 * A rule tests a single URL token. `expression` is the pattern when set,
 * otherwise the legacy `token` literal is used.
 */

import { PatternError } from '@linkgarden/core';
import { createLogger } from '@linkgarden/utils';
import type { FilterRule } from './types.js';

const log = createLogger({ module: 'rules' });

const compiled = new Map<string, RegExp | PatternError>();

/**
 * Compile a pattern once; a malformed one is remembered as a PatternError
 */
function compilePattern(pattern: string): RegExp | PatternError {
  let entry = compiled.get(pattern);
  if (entry === undefined) {
    try {
      entry = new RegExp(pattern);
    } catch (error) {
      entry = new PatternError(pattern, error);
      log.error({ err: entry }, 'Invalid regex pattern');
    }
    compiled.set(pattern, entry);
  }
  return entry;
}

export function effectivePattern(rule: FilterRule): string {
  return rule.expression !== '' ? rule.expression : rule.token;
}

export function ruleMatches(rule: FilterRule, value: string): boolean {
  const pattern = effectivePattern(rule);

  switch (rule.matchType) {
    case 'match_exactly':
    case 'match_expression':
      return value === pattern;
    case 'match_case_insensitive':
      return value.toLowerCase() === pattern.toLowerCase();
    case 'match_any':
      return true;
    case 'match_starts_with':
      return value.startsWith(pattern);
    case 'match_ends_with':
      return value.endsWith(pattern);
    case 'match_contains':
      return value.includes(pattern);
    case 'match_not_contains':
      return !value.includes(pattern);
    case 'match_not_starts_with':
      return !value.startsWith(pattern);
    case 'match_not_ends_with':
      return !value.endsWith(pattern);
    case 'match_regex': {
      const regex = compilePattern(pattern);
      return regex instanceof RegExp ? regex.test(value) : false;
    }
    case 'match_not_regex': {
      // A broken negative rule must not block an otherwise valid match
      const regex = compilePattern(pattern);
      return regex instanceof RegExp ? !regex.test(value) : true;
    }
  }
}
