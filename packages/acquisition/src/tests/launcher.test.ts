/**
 * Process Launcher Tests
 */

import { describe, expect, it } from 'vitest';
import { isToolAvailable } from '../launcher.js';

describe('isToolAvailable', () => {
  it('reports a command that cannot be spawned as unavailable', async () => {
    expect(await isToolAvailable('linkgarden-missing-downloader')).toBe(false);
  });
});
