/**
 * Link Store
 *
 * Owns Link records and persists them to a JSON file. Records are never
 * removed, only soft-deleted; URL uniqueness holds among non-deleted links.
 */

import { createLogger, readJsonFile, writeJsonFile, nowIso } from '@linkgarden/utils';
import { z } from 'zod';
import { StoreIOError } from '../errors/index.js';
import { assertTransition } from '../stateMachine.js';
import {
  createLink,
  linkSchema,
  type Link,
  type LinkSource,
  type LinkStatus,
} from '../types/link.js';

const log = createLogger({ module: 'link-store' });

/**
 * Link Store contract consumed by classification and the orchestrator
 */
export interface LinkStore {
  getById(id: string): Link | undefined;
  getByUrl(url: string): Link | undefined;
  add(url: string, source?: LinkSource, sourceFile?: string): Link;
  updateStatus(id: string, status: LinkStatus): boolean;
  markDeleted(id: string): boolean;
  listAll(): Link[];
  listActive(): Link[];
  listByStatus(statuses: readonly LinkStatus[]): Link[];
  persist(): boolean;
}

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;
const TRAILING_CLOSERS = /[)\]}'"]+$/;

/**
 * Extract http(s) URLs from free text, dropping trailing punctuation
 */
export function extractUrls(text: string): string[] {
  const matches = text.match(URL_PATTERN) ?? [];
  return matches
    .map((url) => url.replace(TRAILING_PUNCTUATION, ''))
    .filter((url) => url.length > 0);
}

/**
 * Strip closing brackets and quotes left over from surrounding prose.
 * Returns the input unchanged if nothing would remain.
 */
export function trimTrailingClosers(url: string): string {
  const trimmed = url.replace(TRAILING_CLOSERS, '');
  return trimmed.length > 0 ? trimmed : url;
}

/**
 * In-memory link store backed by a JSON file
 */
export class JsonLinkStore implements LinkStore {
  private links = new Map<string, Link>();

  constructor(private readonly filePath: string) {
    this.load();
  }

  /**
   * Load links from disk. Unreadable files leave the store empty.
   * Nothing is in flight when a store is opened, so links left `downloading`
   * by an interrupted run are sent back to `to_reprocess`.
   */
  load(): boolean {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error) {
      log.error({ err: new StoreIOError('read', this.filePath, error) }, 'Error loading links');
      return false;
    }

    if (raw === null) {
      log.info({ filePath: this.filePath }, 'Links file does not exist, starting with empty link list');
      return true;
    }

    const parsed = z.array(linkSchema).safeParse(raw);
    if (!parsed.success) {
      log.error(
        { err: new StoreIOError('read', this.filePath, parsed.error) },
        'Links file is malformed'
      );
      return false;
    }

    this.links.clear();
    let interrupted = 0;
    for (const link of parsed.data) {
      if (link.status === 'downloading') {
        link.status = 'to_reprocess';
        link.processedAt = nowIso();
        interrupted++;
      }
      this.links.set(link.id, link);
    }

    if (interrupted > 0) {
      log.warn({ count: interrupted }, 'Requeued links left downloading by an interrupted run');
      this.persist();
    }

    log.info({ count: this.links.size, filePath: this.filePath }, 'Loaded links');
    return true;
  }

  persist(): boolean {
    try {
      writeJsonFile(this.filePath, Array.from(this.links.values()));
      log.debug({ count: this.links.size }, 'Saved links');
      return true;
    } catch (error) {
      log.error({ err: new StoreIOError('write', this.filePath, error) }, 'Error saving links');
      return false;
    }
  }

  /**
   * Add a link. An existing active link with the same URL is returned as is;
   * a deleted one is reactivated.
   */
  add(url: string, source: LinkSource = 'manual', sourceFile: string = ''): Link {
    const existing = this.getByUrl(url);

    if (existing && !existing.deleted) {
      log.debug({ url }, 'Link already exists');
      return existing;
    }

    if (existing) {
      existing.deleted = false;
      existing.status = 'pending';
      existing.addedAt = nowIso();
      existing.source = source;
      existing.sourceFile = sourceFile;
      this.persist();
      log.info({ url, id: existing.id }, 'Reactivated deleted link');
      return existing;
    }

    const link = createLink(url, source, sourceFile);
    this.links.set(link.id, link);
    this.persist();
    log.info({ url, id: link.id }, 'Added new link');
    return link;
  }

  /**
   * Extract every URL from text and add it
   */
  addFromText(text: string, source: LinkSource = 'manual', sourceFile: string = ''): Link[] {
    const added = extractUrls(text).map((url) => this.add(url, source, sourceFile));
    log.info({ count: added.length, sourceFile }, 'Added links from text');
    return added;
  }

  /**
   * Change a link's URL, keeping URLs unique among active links
   */
  updateUrl(id: string, url: string): boolean {
    const link = this.links.get(id);
    if (!link) {
      log.error({ id }, 'Link not found');
      return false;
    }
    const clash = this.getByUrl(url);
    if (clash && clash.id !== id && !clash.deleted) {
      log.warn({ id, url, existingId: clash.id }, 'Another active link already has this URL');
      return false;
    }
    link.url = url;
    return this.persist();
  }

  getById(id: string): Link | undefined {
    return this.links.get(id);
  }

  /**
   * Prefers an active link when a deleted record shares the URL
   */
  getByUrl(url: string): Link | undefined {
    let deletedMatch: Link | undefined;
    for (const link of this.links.values()) {
      if (link.url !== url) continue;
      if (!link.deleted) return link;
      deletedMatch ??= link;
    }
    return deletedMatch;
  }

  /**
   * Update link status. Throws StateTransitionError on an invalid transition.
   */
  updateStatus(id: string, status: LinkStatus): boolean {
    const link = this.links.get(id);
    if (!link) {
      log.error({ id }, 'Link not found');
      return false;
    }

    if (link.status !== status) {
      assertTransition(id, link.status, status);
    }

    link.status = status;
    link.processedAt = nowIso();
    if (status === 'downloaded') {
      link.downloadedAt = link.processedAt;
    }

    log.debug({ id, status }, 'Updated link status');
    return this.persist();
  }

  markDeleted(id: string): boolean {
    const link = this.links.get(id);
    if (!link) {
      log.error({ id }, 'Link not found');
      return false;
    }

    link.deleted = true;
    log.info({ url: link.url, id }, 'Marked link as deleted');
    return this.persist();
  }

  listAll(): Link[] {
    return Array.from(this.links.values());
  }

  listActive(): Link[] {
    return this.listAll().filter((link) => !link.deleted);
  }

  listByStatus(statuses: readonly LinkStatus[]): Link[] {
    const wanted = new Set(statuses);
    return this.listActive().filter((link) => wanted.has(link.status));
  }
}
