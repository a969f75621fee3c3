/**
 * Link Status State Machine
 *
 * Status Flow:
 * pending → to_download → downloading → downloaded
 *         ↘ to_skip                   ↘ error | skipped | to_skip_limit
 *
 * Rules:
 * - Every status can be sent back to to_reprocess, nothing is terminal
 * - to_skip_limit links may be resubmitted straight to downloading (override)
 * - Invalid transitions throw errors
 */

import type { LinkStatus } from './types/link.js';
import { StateTransitionError } from './errors/index.js';

/**
 * Represents a status transition with metadata
 */
export interface LinkStatusTransition {
  from: LinkStatus;
  to: LinkStatus;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid status transitions
 * Maps each status to the set of statuses it can transition to
 */
const validTransitions: Record<LinkStatus, ReadonlySet<LinkStatus>> = {
  pending: new Set<LinkStatus>([
    'to_download',
    'to_skip',
    'to_reprocess',
  ]),
  to_reprocess: new Set<LinkStatus>([
    'to_download',
    'to_skip',
  ]),
  to_download: new Set<LinkStatus>([
    'downloading',
    'to_reprocess',
  ]),
  to_skip: new Set<LinkStatus>([
    'to_reprocess',
  ]),
  to_skip_limit: new Set<LinkStatus>([
    'downloading', // Override batch
    'to_reprocess',
  ]),
  downloading: new Set<LinkStatus>([
    'downloaded',
    'error',
    'skipped',
    'to_skip_limit',
    'to_reprocess',
  ]),
  downloaded: new Set<LinkStatus>(['to_reprocess']),
  skipped: new Set<LinkStatus>(['to_reprocess']),
  error: new Set<LinkStatus>(['to_reprocess']),
};

/**
 * Statuses a classification may be applied to
 */
export const CLASSIFIABLE_STATUSES: readonly LinkStatus[] = ['pending', 'to_reprocess'];

/**
 * Check if a status transition is valid
 */
export function isValidTransition(from: LinkStatus, to: LinkStatus): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next statuses from the current status
 */
export function getNextStatuses(current: LinkStatus): LinkStatus[] {
  return Array.from(validTransitions[current]);
}

/**
 * Validate a transition, returning its record
 * Throws StateTransitionError if the transition is invalid
 */
export function assertTransition(
  linkId: string,
  from: LinkStatus,
  to: LinkStatus,
  reason?: string
): LinkStatusTransition {
  if (!isValidTransition(from, to)) {
    throw new StateTransitionError(linkId, from, to);
  }

  return {
    from,
    to,
    timestamp: new Date(),
    reason,
  };
}
