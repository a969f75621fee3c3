/**
 * Shared test helpers for filters
 */

import { sortByPriority } from '../filter.js';
import type { FilterStore, MoveDirection } from '../filterStore.js';
import { createFilter, type FilterAction, type LinkFilter, type MatchType } from '../types.js';

export interface FilterSpec {
  name: string;
  action?: FilterAction;
  priority?: number;
  enabled?: boolean;
  numericId?: number | null;
  rules: Array<[MatchType, string?]>;
}

export function makeFilter(spec: FilterSpec): LinkFilter {
  return createFilter({
    name: spec.name,
    action: spec.action ?? 'to_download',
    priority: spec.priority ?? 0,
    enabled: spec.enabled ?? true,
    numericId: spec.numericId ?? null,
    rules: spec.rules.map(([matchType, token]) => ({ matchType, token: token ?? '' })),
  });
}

/**
 * FilterStore kept in memory, ordered the way the JSON store orders filters
 */
export class InMemoryFilterStore implements FilterStore {
  private filters: LinkFilter[];

  constructor(filters: LinkFilter[] = []) {
    this.filters = sortByPriority([...filters]);
  }

  list(): readonly LinkFilter[] {
    return this.filters;
  }

  getById(id: string): LinkFilter | undefined {
    return this.filters.find((filter) => filter.id === id);
  }

  add(filter: LinkFilter): boolean {
    this.filters.push(filter);
    sortByPriority(this.filters);
    return true;
  }

  update(filter: LinkFilter): boolean {
    const index = this.filters.findIndex((existing) => existing.id === filter.id);
    if (index === -1) return false;
    this.filters[index] = filter;
    sortByPriority(this.filters);
    return true;
  }

  remove(id: string): boolean {
    const before = this.filters.length;
    this.filters = this.filters.filter((filter) => filter.id !== id);
    return this.filters.length < before;
  }

  move(_id: string, _direction: MoveDirection): boolean {
    return false;
  }

  persist(): boolean {
    return true;
  }
}
