/**
 * Filter Engine
 *
 * Finds the filter that decides a URL's fate: the first enabled filter, in
 * descending priority order, whose rules match the URL positionally.
 */

import { createLogger } from '@linkgarden/utils';
import { filterMatches } from './filter.js';
import type { FilterStore } from './filterStore.js';
import type { FilterAction, LinkFilter } from './types.js';

const log = createLogger({ module: 'filter-engine' });

export class FilterEngine {
  constructor(private readonly store: FilterStore) {}

  findMatchingFilter(url: string): LinkFilter | null {
    for (const filter of this.store.list()) {
      if (filterMatches(filter, url)) {
        log.debug({ url, filter: filter.name }, 'URL matched filter');
        return filter;
      }
    }

    log.debug({ url }, 'No filter matched URL');
    return null;
  }

  /**
   * Every filter matching the URL, in evaluation order
   */
  findAllMatchingFilters(url: string): LinkFilter[] {
    return this.store.list().filter((filter) => filterMatches(filter, url));
  }

  getFiltersByAction(action: FilterAction): LinkFilter[] {
    return this.store.list().filter((filter) => filter.action === action);
  }
}
