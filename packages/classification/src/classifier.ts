/**
 * Link Classifier
 *
 * Applies the matching filter's action to links during ingestion and
 * reprocessing. Links that are downloading are never touched.
 */

import { CLASSIFIABLE_STATUSES, type Link, type LinkStore } from '@linkgarden/core';
import { createLogger } from '@linkgarden/utils';
import type { FilterEngine } from './engine.js';
import type { LinkFilter } from './types.js';

const log = createLogger({ module: 'classifier' });

export type ClassificationOutcome =
  | { kind: 'to_download'; filter: LinkFilter }
  | { kind: 'to_skip'; filter: LinkFilter }
  | { kind: 'deleted'; filter: LinkFilter }
  | { kind: 'unmatched' }
  | { kind: 'not_classifiable' };

export interface ClassificationSummary {
  toDownload: number;
  toSkip: number;
  deleted: number;
  unmatched: Link[];
}

function emptySummary(): ClassificationSummary {
  return { toDownload: 0, toSkip: 0, deleted: 0, unmatched: [] };
}

export class LinkClassifier {
  constructor(
    private readonly links: LinkStore,
    private readonly engine: FilterEngine
  ) {}

  /**
   * Classify one pending or to_reprocess link
   */
  classify(link: Link): ClassificationOutcome {
    if (link.deleted || !CLASSIFIABLE_STATUSES.includes(link.status)) {
      return { kind: 'not_classifiable' };
    }

    const filter = this.engine.findMatchingFilter(link.url);
    if (!filter) {
      return { kind: 'unmatched' };
    }

    link.filterMatched = filter.numericId ?? filter.name;

    switch (filter.action) {
      case 'to_download':
      case 'to_skip':
        this.links.updateStatus(link.id, filter.action);
        log.debug({ url: link.url, filter: filter.name, status: filter.action }, 'Applied filter');
        return { kind: filter.action, filter };
      case 'deleted':
        this.links.markDeleted(link.id);
        log.debug({ url: link.url, filter: filter.name }, 'Filter deleted link');
        return { kind: 'deleted', filter };
    }
  }

  /**
   * Classify a set of links, tallying the outcomes
   */
  classifyAll(links: readonly Link[]): ClassificationSummary {
    const summary = emptySummary();

    for (const link of links) {
      const outcome = this.classify(link);
      switch (outcome.kind) {
        case 'to_download':
          summary.toDownload++;
          break;
        case 'to_skip':
          summary.toSkip++;
          break;
        case 'deleted':
          summary.deleted++;
          break;
        case 'unmatched':
          summary.unmatched.push(link);
          break;
        case 'not_classifiable':
          break;
      }
    }

    return summary;
  }

  classifyPending(): ClassificationSummary {
    return this.classifyAll(this.links.listByStatus(CLASSIFIABLE_STATUSES));
  }

  /**
   * Send active links back through the filters. Defaults to every active
   * link; links currently downloading are left alone.
   */
  reprocess(linkIds?: readonly string[]): ClassificationSummary {
    const candidates = linkIds
      ? linkIds
          .map((id) => this.links.getById(id))
          .filter((link): link is Link => link !== undefined && !link.deleted)
      : this.links.listActive();

    const targets = candidates.filter((link) => link.status !== 'downloading');
    for (const link of targets) {
      if (link.status !== 'to_reprocess') {
        this.links.updateStatus(link.id, 'to_reprocess');
      }
    }

    const summary = this.classifyAll(targets);
    log.info(
      {
        reprocessed: targets.length,
        toDownload: summary.toDownload,
        toSkip: summary.toSkip,
        deleted: summary.deleted,
        unmatched: summary.unmatched.length,
      },
      'Reprocessed links against filters'
    );
    return summary;
  }
}
