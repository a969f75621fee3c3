/**
 * Decision Gateway
 *
 * Asks whoever registered a resolver (a person at a prompt, an automation
 * policy) whether a download that breached a limit should continue. The
 * orchestrator awaits the answer, so at most one question is open at a time.
 *
 * Without a resolver, or when the resolver fails, the answer is "skip".
 */

import type { LimitKind, Link } from '@linkgarden/core';
import { createLogger } from '@linkgarden/utils';

const log = createLogger({ module: 'decision-gateway' });

/**
 * Returns true to continue the download, false to skip it
 */
export type LimitResolver = (link: Readonly<Link>, kind: LimitKind) => boolean | Promise<boolean>;

export class DecisionGateway {
  private resolver: LimitResolver | null = null;
  private pending = false;

  /**
   * Register the resolver; the last registration wins. Pass null to clear.
   */
  setResolver(resolver: LimitResolver | null): void {
    this.resolver = resolver;
  }

  hasResolver(): boolean {
    return this.resolver !== null;
  }

  isPending(): boolean {
    return this.pending;
  }

  async decide(link: Readonly<Link>, kind: LimitKind): Promise<boolean> {
    if (this.pending) {
      log.error({ linkId: link.id, kind }, 'A limit decision is already outstanding, skipping');
      return false;
    }

    const resolver = this.resolver;
    if (!resolver) {
      log.warn({ url: link.url, kind }, 'Limit exceeded with no resolver registered, skipping by default');
      return false;
    }

    this.pending = true;
    try {
      const decision = await resolver(link, kind);
      log.info({ url: link.url, kind, decision: decision ? 'continue' : 'skip' }, 'Limit decision received');
      return decision;
    } catch (error) {
      log.error({ err: error, url: link.url, kind }, 'Error in limit decision resolver, skipping');
      return false;
    } finally {
      this.pending = false;
    }
  }
}
