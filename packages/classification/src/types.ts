/**
 * Filter Types
 *
 * Persisted shape of filters and their rules. Older files may lack
 * `expression`, `numericId` or timestamps; the schemas default them.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const MATCH_TYPES = [
  'match_exactly',
  'match_case_insensitive',
  'match_any',
  'match_expression',
  'match_regex',
  'match_starts_with',
  'match_ends_with',
  'match_contains',
  'match_not_contains',
  'match_not_starts_with',
  'match_not_ends_with',
  'match_not_regex',
] as const;

export type MatchType = (typeof MATCH_TYPES)[number];

export const FILTER_ACTIONS = ['to_download', 'to_skip', 'deleted'] as const;

export type FilterAction = (typeof FILTER_ACTIONS)[number];

export const filterRuleSchema = z.object({
  token: z.string().default(''),
  matchType: z.enum(MATCH_TYPES),
  expression: z.string().default(''),
});

export type FilterRule = z.infer<typeof filterRuleSchema>;

export const linkFilterSchema = z.object({
  id: z.string().min(1).default(() => randomUUID()),
  numericId: z.number().int().positive().nullable().default(null),
  name: z.string(),
  description: z.string().default(''),
  rules: z.array(filterRuleSchema).default([]),
  action: z.enum(FILTER_ACTIONS),
  enabled: z.boolean().default(true),
  priority: z.number().int().default(0),
  createdAt: z.string().default(''),
  modifiedAt: z.string().default(''),
});

export type LinkFilter = z.infer<typeof linkFilterSchema>;

export type LinkFilterInput = z.input<typeof linkFilterSchema>;

/**
 * Build a filter, defaulting everything the input leaves out
 */
export function createFilter(input: LinkFilterInput): LinkFilter {
  const now = new Date().toISOString();
  return linkFilterSchema.parse({
    createdAt: now,
    modifiedAt: now,
    ...input,
  });
}
