/**
 * Interactive Prompts
 */

import chalk from 'chalk';
import { createInterface } from 'node:readline';
import type { LimitKind, Link } from '@linkgarden/core';
import type { LimitResolver } from '@linkgarden/acquisition';

export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(chalk.yellow(`${question} [y/N] `), (reply) => {
      rl.close();
      resolve(reply);
    });
  });

  return answer.trim().toLowerCase() === 'y';
}

const limitDescriptions: Record<LimitKind, string> = {
  timeout: 'took longer than the time limit',
  image_count: 'exceeded the image limit',
  file_size: 'exceeded the size limit',
};

export function describeLimit(kind: LimitKind): string {
  return limitDescriptions[kind];
}

export type LimitPolicy = 'ask' | 'continue' | 'skip';

/**
 * Resolver for limit breaches: a fixed answer, or a y/N prompt.
 * `beforePrompt`/`afterPrompt` let the caller pause a spinner around it.
 */
export function createLimitResolver(
  policy: LimitPolicy,
  hooks: { beforePrompt?: () => void; afterPrompt?: () => void } = {}
): LimitResolver {
  if (policy !== 'ask') {
    const decision = policy === 'continue';
    return () => decision;
  }

  return async (link: Readonly<Link>, kind: LimitKind) => {
    hooks.beforePrompt?.();
    try {
      return await confirm(`${link.url} ${describeLimit(kind)}. Continue downloading?`);
    } finally {
      hooks.afterPrompt?.();
    }
  };
}
