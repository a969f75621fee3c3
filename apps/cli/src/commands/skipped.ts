/**
 * Skipped Commands
 *
 * Review links skipped for exceeding a limit and download them anyway.
 */

import chalk from 'chalk';
import { isToolAvailable } from '@linkgarden/acquisition';
import type { Link } from '@linkgarden/core';
import { findLink, openWorkspace } from '../lib/context.js';
import { runDownloads } from '../lib/downloadRunner.js';
import { printError, printInfo, printSuccess, printTable, printWarning, truncate } from '../lib/output.js';
import { confirm } from '../lib/prompt.js';

interface OverrideOptions {
  all?: boolean;
  yes?: boolean;
}

function describeExceeded(link: Link): string {
  switch (link.limitExceeded) {
    case 'image_count':
      return chalk.magenta(`Images (${link.imagesCount})`);
    case 'file_size':
      return chalk.blue(`Size (${link.fileSizeMb.toFixed(2)}MB)`);
    case 'timeout':
      return chalk.yellow('Timeout');
    case null:
      return chalk.gray('Unknown');
  }
}

export function skippedCommand(): void {
  const ctx = openWorkspace();
  const links = ctx.links.listByStatus(['to_skip_limit']);

  if (links.length === 0) {
    printInfo('No links were skipped for exceeding limits');
    return;
  }

  printTable(
    links.map((link) => ({
      id: link.id.slice(0, 8),
      url: truncate(link.url, 60),
      limit: describeExceeded(link),
      images: link.imagesCount,
      sizeMb: link.fileSizeMb,
    }))
  );
  console.log(chalk.gray('Use "linkgarden override <id...>" to download them despite the limits'));
}

export async function overrideCommand(ids: string[], options: OverrideOptions): Promise<void> {
  const ctx = openWorkspace();

  const links = options.all
    ? ctx.links.listByStatus(['to_skip_limit'])
    : ids.map((id) => findLink(ctx, id));

  const eligible = links.filter((link) => link.status === 'to_skip_limit');
  if (eligible.length < links.length) {
    printWarning(`${links.length - eligible.length} link(s) were not skipped for limits and are ignored`);
  }
  if (eligible.length === 0) {
    printInfo('Nothing to override');
    return;
  }

  if (!options.yes) {
    const proceed = await confirm(
      `Override limits and download ${eligible.length} link(s)? This may take significant time and storage.`
    );
    if (!proceed) {
      printWarning('Cancelled');
      return;
    }
  }

  const { command } = ctx.settings.current.tool;
  if (!(await isToolAvailable(command))) {
    printError(`${command} is not installed or not on PATH`);
    process.exit(1);
  }

  const result = await runDownloads(ctx, {
    linkIds: eligible.map((link) => link.id),
    policy: 'continue',
  });
  if (!result) {
    printWarning('Could not start the downloads');
    return;
  }

  printSuccess(`Downloaded ${result.completedLinks} of ${result.totalLinks} overridden link(s)`);
}
