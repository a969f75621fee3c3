/**
 * Stats Command
 *
 * Link counts per status.
 */

import chalk from 'chalk';
import { LINK_STATUSES, type Link, type LinkStatus } from '@linkgarden/core';
import { openWorkspace } from '../lib/context.js';
import { formatStatus, printHeader, printKeyValue } from '../lib/output.js';

export function countByStatus(links: readonly Link[]): Record<LinkStatus, number> {
  const counts: Record<LinkStatus, number> = {
    pending: 0,
    to_download: 0,
    to_skip: 0,
    to_skip_limit: 0,
    to_reprocess: 0,
    downloading: 0,
    downloaded: 0,
    skipped: 0,
    error: 0,
  };
  for (const link of links) {
    counts[link.status]++;
  }
  return counts;
}

export function statsCommand(): void {
  const ctx = openWorkspace();
  const active = ctx.links.listActive();
  const counts = countByStatus(active);

  printHeader('Link Statistics');
  printKeyValue('Active', active.length);
  printKeyValue('Deleted', ctx.links.listAll().length - active.length);
  printKeyValue('Filters', ctx.filters.list().length);

  console.log(chalk.bold('\nBy status'));
  for (const status of LINK_STATUSES) {
    console.log(`  ${formatStatus(status)}: ${counts[status]}`);
  }

  const images = active.reduce((sum, link) => sum + link.imagesCount, 0);
  const sizeMb = active.reduce((sum, link) => sum + link.fileSizeMb, 0);
  console.log(chalk.bold('\nDownloaded'));
  printKeyValue('Images', images);
  printKeyValue('Size', `${sizeMb.toFixed(2)} MB`);
}
