/**
 * Filter Store
 *
 * Keeps filters ordered by descending priority and persists them to a JSON
 * file. Each filter carries a small numeric id for display collaborators.
 * Ids are assigned once from max(existing)+1 and written back as soon as they
 * are handed out so they survive restarts.
 *
 * The file holds `{ nextNumericId, filters }`; a bare array of filters is
 * read as well.
 */

import { StoreIOError } from '@linkgarden/core';
import { createLogger, readJsonFile, writeJsonFile, nowIso } from '@linkgarden/utils';
import { z } from 'zod';
import { sortByPriority } from './filter.js';
import { linkFilterSchema, type LinkFilter } from './types.js';

const log = createLogger({ module: 'filter-store' });

export type MoveDirection = 'up' | 'down';

const filtersFileSchema = z.union([
  z.array(linkFilterSchema).transform((filters) => ({ nextNumericId: 1, filters })),
  z.object({
    nextNumericId: z.number().int().positive().default(1),
    filters: z.array(linkFilterSchema).default([]),
  }),
]);

/**
 * Filter Store contract consumed by the classification engine
 */
export interface FilterStore {
  /** Filters in evaluation order */
  list(): readonly LinkFilter[];
  getById(id: string): LinkFilter | undefined;
  add(filter: LinkFilter): boolean;
  update(filter: LinkFilter): boolean;
  remove(id: string): boolean;
  move(id: string, direction: MoveDirection): boolean;
  persist(): boolean;
}

/**
 * Give every filter without a numeric id the next unused one.
 * Returns how many ids were assigned.
 */
export function assignNumericIds(filters: LinkFilter[], floor: number = 0): number {
  let next = Math.max(floor, ...filters.map((filter) => filter.numericId ?? 0)) + 1;
  let assigned = 0;

  for (const filter of filters) {
    if (filter.numericId === null) {
      filter.numericId = next++;
      assigned++;
    }
  }

  return assigned;
}

export class JsonFilterStore implements FilterStore {
  private filters: LinkFilter[] = [];
  // Highest id ever handed out, so ids of removed filters are not reused
  private highestNumericId = 0;

  constructor(private readonly filePath: string) {
    this.load();
  }

  /**
   * Load filters from disk, assigning numeric ids where missing
   */
  load(): boolean {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error) {
      log.error({ err: new StoreIOError('read', this.filePath, error) }, 'Error loading filters');
      return false;
    }

    if (raw === null) {
      log.info({ filePath: this.filePath }, 'Filters file does not exist, starting with empty filter list');
      return true;
    }

    const parsed = filtersFileSchema.safeParse(raw);
    if (!parsed.success) {
      log.error(
        { err: new StoreIOError('read', this.filePath, parsed.error) },
        'Filters file is malformed'
      );
      return false;
    }

    this.filters = sortByPriority(parsed.data.filters);
    this.highestNumericId = Math.max(this.highestNumericId, parsed.data.nextNumericId - 1);

    const assigned = assignNumericIds(this.filters, this.highestNumericId);
    this.trackHighestId();
    if (assigned > 0) {
      log.info({ assigned }, 'Assigned numeric ids to filters');
      this.persist();
    }

    log.info({ count: this.filters.length, filePath: this.filePath }, 'Loaded filters');
    return true;
  }

  persist(): boolean {
    try {
      writeJsonFile(this.filePath, {
        nextNumericId: this.highestNumericId + 1,
        filters: this.filters,
      });
      log.debug({ count: this.filters.length }, 'Saved filters');
      return true;
    } catch (error) {
      log.error({ err: new StoreIOError('write', this.filePath, error) }, 'Error saving filters');
      return false;
    }
  }

  list(): readonly LinkFilter[] {
    return this.filters;
  }

  getById(id: string): LinkFilter | undefined {
    return this.filters.find((filter) => filter.id === id);
  }

  getByNumericId(numericId: number): LinkFilter | undefined {
    return this.filters.find((filter) => filter.numericId === numericId);
  }

  add(filter: LinkFilter): boolean {
    if (this.getById(filter.id)) {
      log.warn({ id: filter.id }, 'Filter already exists');
      return false;
    }

    if (filter.numericId !== null && this.getByNumericId(filter.numericId)) {
      filter.numericId = null;
    }

    this.filters.push(filter);
    assignNumericIds([filter], this.highestNumericId);
    this.trackHighestId();
    sortByPriority(this.filters);
    log.info({ name: filter.name, numericId: filter.numericId }, 'Added filter');
    return this.persist();
  }

  /**
   * Replace a filter by id. The numeric id of the stored filter is kept.
   */
  update(filter: LinkFilter): boolean {
    const index = this.filters.findIndex((existing) => existing.id === filter.id);
    const existing = this.filters[index];
    if (!existing) {
      log.warn({ id: filter.id }, 'Filter not found for update');
      return false;
    }

    this.filters[index] = {
      ...filter,
      numericId: existing.numericId,
      modifiedAt: nowIso(),
    };
    sortByPriority(this.filters);
    log.info({ name: filter.name }, 'Updated filter');
    return this.persist();
  }

  remove(id: string): boolean {
    const originalCount = this.filters.length;
    this.filters = this.filters.filter((filter) => filter.id !== id);

    if (this.filters.length < originalCount) {
      log.info({ id }, 'Removed filter');
      return this.persist();
    }

    log.warn({ id }, 'Filter not found for removal');
    return false;
  }

  /**
   * Raise or lower a filter's priority by one. Fails at either end of the list.
   */
  move(id: string, direction: MoveDirection): boolean {
    const index = this.filters.findIndex((filter) => filter.id === id);
    const filter = this.filters[index];
    if (!filter) {
      return false;
    }

    if (direction === 'up' && index > 0) {
      filter.priority += 1;
    } else if (direction === 'down' && index < this.filters.length - 1) {
      filter.priority -= 1;
    } else {
      return false;
    }

    filter.modifiedAt = nowIso();
    sortByPriority(this.filters);
    return this.persist();
  }

  private trackHighestId(): void {
    for (const filter of this.filters) {
      if (filter.numericId !== null && filter.numericId > this.highestNumericId) {
        this.highestNumericId = filter.numericId;
      }
    }
  }
}
