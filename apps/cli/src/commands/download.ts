/**
 * Download Command
 *
 * Runs gallery-dl over the links waiting to be downloaded, or over the
 * given ids.
 */

import chalk from 'chalk';
import { isToolAvailable } from '@linkgarden/acquisition';
import { ValidationError } from '@linkgarden/core';
import { formatDuration } from '@linkgarden/utils';
import { findLink, openWorkspace } from '../lib/context.js';
import { runDownloads } from '../lib/downloadRunner.js';
import { printError, printHeader, printInfo, printKeyValue, printWarning } from '../lib/output.js';
import type { LimitPolicy } from '../lib/prompt.js';

interface DownloadOptions {
  onLimit?: string;
}

function resolvePolicy(onLimit: string | undefined): LimitPolicy {
  switch (onLimit) {
    case undefined:
      // Without a terminal nobody can answer the prompt
      return process.stdin.isTTY ? 'ask' : 'skip';
    case 'continue':
    case 'skip':
      return onLimit;
    default:
      throw new ValidationError('on-limit', 'must be "continue" or "skip"');
  }
}

export async function downloadCommand(ids: string[], options: DownloadOptions): Promise<void> {
  const policy = resolvePolicy(options.onLimit);
  const ctx = openWorkspace();
  const linkIds = ids.length > 0 ? ids.map((id) => findLink(ctx, id).id) : undefined;

  const { command } = ctx.settings.current.tool;
  if (!(await isToolAvailable(command))) {
    printError(`${command} is not installed or not on PATH`);
    process.exit(1);
  }

  const startedAt = Date.now();
  const result = await runDownloads(ctx, { linkIds, policy });
  if (!result) {
    printWarning(linkIds ? 'None of the given links can be downloaded' : 'No links to download');
    return;
  }

  printHeader('Download Summary');
  printKeyValue('Downloaded', chalk.green(result.completedLinks));
  printKeyValue('Failed or skipped', chalk.red(result.failedLinks));
  printKeyValue('Elapsed', formatDuration(Date.now() - startedAt));

  const skipped = ctx.links.listByStatus(['to_skip_limit']).length;
  if (skipped > 0) {
    printInfo(`${skipped} link(s) were skipped for exceeding limits; see "linkgarden skipped"`);
  }
}
