/**
 * Links Commands
 *
 * List, delete and reprocess tracked links.
 */

import chalk from 'chalk';
import { LINK_STATUSES, ValidationError, type LinkStatus } from '@linkgarden/core';
import { findLink, openWorkspace } from '../lib/context.js';
import {
  formatStatus,
  printInfo,
  printJson,
  printSuccess,
  printTable,
  printWarning,
  truncate,
} from '../lib/output.js';
import { printClassification } from './add.js';

interface LinksOptions {
  status?: string;
  all?: boolean;
  json?: boolean;
}

function parseStatus(value: string): LinkStatus {
  const status = LINK_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new ValidationError('status', `must be one of ${LINK_STATUSES.join(', ')}`);
  }
  return status;
}

export function linksCommand(options: LinksOptions): void {
  const ctx = openWorkspace();

  let links = options.all ? ctx.links.listAll() : ctx.links.listActive();
  if (options.status) {
    const status = parseStatus(options.status);
    links = links.filter((link) => link.status === status);
  }

  if (options.json) {
    printJson(links);
    return;
  }

  if (links.length === 0) {
    printInfo('No links found');
    return;
  }

  printTable(
    links.map((link) => ({
      id: link.id.slice(0, 8),
      url: truncate(link.url, 60),
      status: link.deleted ? chalk.strikethrough(link.status) : formatStatus(link.status),
      filter: ctx.filterNames.resolve(link.filterMatched),
      images: link.imagesCount,
      sizeMb: link.fileSizeMb,
    }))
  );
}

export function deleteCommand(id: string): void {
  const ctx = openWorkspace();
  const link = findLink(ctx, id);

  if (link.status === 'downloading') {
    printWarning(`${link.url} is downloading and cannot be deleted`);
    return;
  }

  ctx.links.markDeleted(link.id);
  printSuccess(`Deleted ${link.url}`);
}

export function reprocessCommand(ids: string[]): void {
  const ctx = openWorkspace();
  const linkIds = ids.length > 0 ? ids.map((id) => findLink(ctx, id).id) : undefined;

  const summary = ctx.classifier.reprocess(linkIds);
  printClassification(summary);
}
