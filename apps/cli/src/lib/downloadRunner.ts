/**
 * Download Runner
 *
 * Drives one orchestrator run from the terminal: a spinner follows the
 * progress snapshots, each finished link is printed, limit breaches are
 * answered by the given policy and Ctrl-C requests a stop.
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  DownloadOrchestrator,
  type ProgressSnapshot,
} from '@linkgarden/acquisition';
import type { WorkspaceContext } from './context.js';
import { formatStatus, truncate } from './output.js';
import { createLimitResolver, type LimitPolicy } from './prompt.js';

export interface RunDownloadsOptions {
  linkIds?: string[];
  policy: LimitPolicy;
}

function renderProgress(snapshot: Readonly<ProgressSnapshot>): string {
  const done = snapshot.completedLinks + snapshot.failedLinks;
  const position = chalk.gray(`[${done}/${snapshot.totalLinks}]`);
  const current = snapshot.currentLink ? truncate(snapshot.currentLink.url, 60) : snapshot.currentOperation;
  const images = snapshot.imagesDownloaded > 0 ? chalk.gray(` ${snapshot.imagesDownloaded} image(s)`) : '';
  return `${position} ${current}${images}`;
}

/**
 * Returns the final snapshot, or null when the run could not be started
 */
export async function runDownloads(
  ctx: WorkspaceContext,
  options: RunDownloadsOptions
): Promise<ProgressSnapshot | null> {
  const orchestrator = new DownloadOrchestrator(ctx.links, ctx.settings.current, {
    baseDir: ctx.paths.configDir,
  });
  const spinner = ora();

  orchestrator.setResolver(
    createLimitResolver(options.policy, {
      beforePrompt: () => spinner.stop(),
      afterPrompt: () => {
        spinner.start();
      },
    })
  );

  orchestrator.onProgress((snapshot) => {
    if (snapshot.status === 'paused') {
      spinner.text = chalk.yellow('Paused');
    } else if (snapshot.status === 'stopped') {
      spinner.text = chalk.yellow('Stopping...');
    } else {
      spinner.text = renderProgress(snapshot);
    }
  });

  orchestrator.onCompletion((linkId, success) => {
    const link = ctx.links.getById(linkId);
    if (!link) return;
    const detail = link.errorMessage ? chalk.gray(` ${truncate(link.errorMessage, 80)}`) : '';
    spinner.stopAndPersist({
      symbol: success ? chalk.green('✓') : chalk.red('✗'),
      text: `${link.url} ${formatStatus(link.status)}${detail}`,
    });
    spinner.start();
  });

  if (!orchestrator.start(options.linkIds)) {
    return null;
  }
  spinner.start('Starting downloads...');

  const onInterrupt = (): void => {
    spinner.text = chalk.yellow('Stopping after the current tick...');
    orchestrator.stop();
  };
  process.once('SIGINT', onInterrupt);

  try {
    await orchestrator.whenIdle();
  } finally {
    process.off('SIGINT', onInterrupt);
    spinner.stop();
  }

  return orchestrator.getProgress();
}
