/**
 * @linkgarden/classification
 *
 * Rule-based link classification.
 *
 * Responsibilities:
 * - Tokenize URLs into host labels, path segments, query fragments and fragment
 * - Match filters positionally, in descending priority
 * - Persist filters with stable numeric ids
 * - Apply filter actions to pending and reprocessed links
 */

export {
  MATCH_TYPES,
  FILTER_ACTIONS,
  filterRuleSchema,
  linkFilterSchema,
  createFilter,
  type MatchType,
  type FilterAction,
  type FilterRule,
  type LinkFilter,
  type LinkFilterInput,
} from './types.js';

export { tokenize } from './tokenizer.js';
export { ruleMatches, effectivePattern } from './rules.js';
export { filterMatches, sortByPriority } from './filter.js';

export {
  JsonFilterStore,
  assignNumericIds,
  type FilterStore,
  type MoveDirection,
} from './filterStore.js';

export { FilterEngine } from './engine.js';

export {
  LinkClassifier,
  type ClassificationOutcome,
  type ClassificationSummary,
} from './classifier.js';

export { FilterNameResolver } from './nameResolver.js';
