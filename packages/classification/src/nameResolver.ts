/**
 * Filter Name Resolver
 *
 * Maps the numeric filter ids stored on links to current filter names.
 */

import type { FilterReference } from '@linkgarden/core';
import { isNonEmptyString } from '@linkgarden/utils';
import type { FilterStore } from './filterStore.js';

export class FilterNameResolver {
  private idToName = new Map<number, string>();

  constructor(private readonly store: FilterStore) {
    this.refresh();
  }

  refresh(): void {
    const mapping = new Map<number, string>();
    for (const filter of this.store.list()) {
      if (filter.numericId === null) continue;
      mapping.set(
        filter.numericId,
        isNonEmptyString(filter.name) ? filter.name.trim() : `Unnamed_${filter.numericId}`
      );
    }
    this.idToName = mapping;
  }

  resolve(reference: FilterReference): string {
    if (reference === null) {
      return '';
    }
    if (typeof reference === 'string') {
      return reference;
    }
    return this.idToName.get(reference) ?? `Unnamed_${reference}`;
  }
}
