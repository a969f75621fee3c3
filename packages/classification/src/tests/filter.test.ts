/**
 * Filter Matching and Engine Tests
 */

import { describe, expect, it } from 'vitest';
import { FilterEngine } from '../engine.js';
import { filterMatches, sortByPriority } from '../filter.js';
import { InMemoryFilterStore, makeFilter } from './fixtures.js';

const GALLERY_URL = 'https://img.example.com/gallery/42?page=2';

describe('filterMatches', () => {
  it('matches rules against tokens by position', () => {
    const filter = makeFilter({
      name: 'example galleries',
      rules: [['match_any'], ['match_exactly', 'example'], ['match_exactly', 'com'], ['match_exactly', 'gallery']],
    });
    expect(filterMatches(filter, GALLERY_URL)).toBe(true);
  });

  it('does not match when a rule hits the wrong position', () => {
    const filter = makeFilter({ name: 'gallery first', rules: [['match_exactly', 'gallery']] });
    expect(filterMatches(filter, GALLERY_URL)).toBe(false);
  });

  it('never matches with more rules than tokens', () => {
    // img, example, com, gallery, 42, page=2
    const rules = Array.from({ length: 7 }, (): ['match_any'] => ['match_any']);
    const filter = makeFilter({ name: 'too long', rules });
    expect(filterMatches(filter, GALLERY_URL)).toBe(false);

    const fits = makeFilter({ name: 'fits', rules: rules.slice(0, 6) });
    expect(filterMatches(fits, GALLERY_URL)).toBe(true);
  });

  it('never matches when disabled', () => {
    const filter = makeFilter({ name: 'off', enabled: false, rules: [['match_any']] });
    expect(filterMatches(filter, GALLERY_URL)).toBe(false);
    expect(filterMatches(filter, 'https://other.example.org/')).toBe(false);
  });

  it('never matches without rules', () => {
    expect(filterMatches(makeFilter({ name: 'empty', rules: [] }), GALLERY_URL)).toBe(false);
  });
});

describe('sortByPriority', () => {
  it('orders by descending priority and keeps ties in place', () => {
    const sorted = sortByPriority([
      { name: 'a', priority: 1 },
      { name: 'b', priority: 5 },
      { name: 'c', priority: 1 },
      { name: 'd', priority: 3 },
    ]);
    expect(sorted.map((item) => item.name)).toEqual(['b', 'd', 'a', 'c']);
  });
});

describe('FilterEngine', () => {
  const low = makeFilter({ name: 'low', priority: 3, action: 'to_skip', rules: [['match_exactly', 'img']] });
  const high = makeFilter({ name: 'high', priority: 5, rules: [['match_starts_with', 'im']] });
  const other = makeFilter({ name: 'other', priority: 9, action: 'deleted', rules: [['match_exactly', 'cdn']] });
  const engine = new FilterEngine(new InMemoryFilterStore([low, other, high]));

  it('returns the highest-priority matching filter', () => {
    expect(engine.findMatchingFilter(GALLERY_URL)?.name).toBe('high');
  });

  it('returns null when nothing matches', () => {
    expect(engine.findMatchingFilter('https://www.example.net/')).toBeNull();
  });

  it('lists every match in evaluation order', () => {
    expect(engine.findAllMatchingFilters(GALLERY_URL).map((filter) => filter.name)).toEqual(['high', 'low']);
  });

  it('groups filters by action', () => {
    expect(engine.getFiltersByAction('to_skip').map((filter) => filter.name)).toEqual(['low']);
    expect(engine.getFiltersByAction('deleted').map((filter) => filter.name)).toEqual(['other']);
  });
});
