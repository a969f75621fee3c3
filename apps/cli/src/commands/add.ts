/**
 * Add / Import Commands
 *
 * Ingest URLs typed on the command line or extracted from text files, then
 * classify them against the filters.
 */

import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { trimTrailingClosers, type Link } from '@linkgarden/core';
import type { ClassificationSummary } from '@linkgarden/classification';
import { openWorkspace } from '../lib/context.js';
import { printHeader, printInfo, printKeyValue, printSuccess, printWarning } from '../lib/output.js';

interface AddOptions {
  trim?: boolean;
}

const urlSchema = z.string().url();

export function addCommand(urls: string[], options: AddOptions): void {
  const ctx = openWorkspace();
  const added: Link[] = [];

  for (const raw of urls) {
    const url = options.trim ? trimTrailingClosers(raw) : raw;
    if (!urlSchema.safeParse(url).success) {
      printWarning(`Not a valid URL, ignored: ${url}`);
      continue;
    }
    added.push(ctx.links.add(url, 'manual'));
  }

  if (added.length === 0) {
    printInfo('No links added');
    return;
  }

  printSuccess(`Added ${added.length} link(s)`);
  printClassification(ctx.classifier.classifyAll(added));
}

export async function importCommand(files: string[]): Promise<void> {
  const ctx = openWorkspace();
  const added: Link[] = [];

  for (const file of files) {
    const filePath = resolve(file);
    const text = await readFile(filePath, 'utf-8');
    const links = ctx.links.addFromText(text, 'file', filePath);
    printInfo(`${file}: ${links.length} URL(s) found`);
    added.push(...links);
  }

  if (added.length === 0) {
    printWarning('No URLs found');
    return;
  }

  printClassification(ctx.classifier.classifyAll(added));
}

export function printClassification(summary: ClassificationSummary): void {
  printHeader('Classification');
  printKeyValue('To download', chalk.cyan(summary.toDownload));
  printKeyValue('To skip', chalk.yellow(summary.toSkip));
  printKeyValue('Deleted', chalk.red(summary.deleted));
  printKeyValue('Unmatched', chalk.gray(summary.unmatched.length));

  if (summary.unmatched.length > 0) {
    console.log();
    console.log(chalk.gray('No filter matched:'));
    for (const link of summary.unmatched) {
      console.log(`  ${chalk.gray('•')} ${link.url}`);
    }
  }
}
