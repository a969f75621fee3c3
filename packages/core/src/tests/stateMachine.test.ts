/**
 * Link Status State Machine Tests
 */

import { describe, expect, it } from 'vitest';
import { StateTransitionError } from '../errors/index.js';
import {
  assertTransition,
  getNextStatuses,
  isValidTransition,
  type LinkStatusTransition,
} from '../stateMachine.js';
import { LINK_STATUSES } from '../types/link.js';

describe('link status transitions', () => {
  it('lets classification move pending links to a decision', () => {
    expect(isValidTransition('pending', 'to_download')).toBe(true);
    expect(isValidTransition('pending', 'to_skip')).toBe(true);
    expect(isValidTransition('pending', 'downloading')).toBe(false);
  });

  it('only starts downloads from to_download or an override of to_skip_limit', () => {
    const canStart = LINK_STATUSES.filter((status) => isValidTransition(status, 'downloading'));
    expect(canStart).toEqual(['to_download', 'to_skip_limit']);
  });

  it('ends a download in one of four outcomes', () => {
    expect(getNextStatuses('downloading').sort()).toEqual(
      ['downloaded', 'error', 'skipped', 'to_reprocess', 'to_skip_limit'].sort()
    );
  });

  it('keeps every status other than to_reprocess re-enterable through reprocessing', () => {
    for (const status of LINK_STATUSES) {
      if (status === 'to_reprocess') continue;
      expect(isValidTransition(status, 'to_reprocess')).toBe(true);
    }
  });

  it('throws a StateTransitionError for invalid transitions', () => {
    expect(() => assertTransition('link-1', 'downloaded', 'downloading')).toThrow(StateTransitionError);

    try {
      assertTransition('link-1', 'to_skip', 'downloaded');
    } catch (error) {
      expect(error).toBeInstanceOf(StateTransitionError);
      if (error instanceof StateTransitionError) {
        expect(error.code).toBe('STATE_TRANSITION_ERROR');
        expect(error.message).toBe('Invalid status transition from to_skip to downloaded');
        expect(error.details).toEqual({ linkId: 'link-1', fromStatus: 'to_skip', toStatus: 'downloaded' });
      }
    }
  });

  it('returns a transition record for valid transitions', () => {
    const record: LinkStatusTransition = assertTransition('link-1', 'to_download', 'downloading', 'batch start');
    expect(record.from).toBe('to_download');
    expect(record.to).toBe('downloading');
    expect(record.reason).toBe('batch start');
    expect(record.timestamp).toBeInstanceOf(Date);
  });
});
