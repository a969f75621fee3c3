/**
 * Decision Gateway Tests
 */

import { describe, expect, it } from 'vitest';
import { createLink } from '@linkgarden/core';
import { sleep } from '@linkgarden/utils';
import { DecisionGateway } from '../decisionGateway.js';

const link = createLink('https://a.example.com/gallery/1', 'manual', '');

describe('DecisionGateway', () => {
  it('skips when no resolver is registered', async () => {
    const gateway = new DecisionGateway();
    expect(gateway.hasResolver()).toBe(false);
    expect(await gateway.decide(link, 'timeout')).toBe(false);
  });

  it('returns what the resolver decides', async () => {
    const gateway = new DecisionGateway();
    gateway.setResolver((_link, kind) => kind === 'image_count');

    expect(await gateway.decide(link, 'image_count')).toBe(true);
    expect(await gateway.decide(link, 'file_size')).toBe(false);
  });

  it('skips when the resolver throws or rejects', async () => {
    const gateway = new DecisionGateway();
    gateway.setResolver(() => {
      throw new Error('no terminal');
    });
    expect(await gateway.decide(link, 'timeout')).toBe(false);

    gateway.setResolver(async () => {
      throw new Error('prompt closed');
    });
    expect(await gateway.decide(link, 'timeout')).toBe(false);
    expect(gateway.isPending()).toBe(false);
  });

  it('keeps only the last registered resolver', async () => {
    const gateway = new DecisionGateway();
    gateway.setResolver(() => false);
    gateway.setResolver(() => true);
    expect(await gateway.decide(link, 'timeout')).toBe(true);

    gateway.setResolver(null);
    expect(gateway.hasResolver()).toBe(false);
    expect(await gateway.decide(link, 'timeout')).toBe(false);
  });

  it('refuses a second question while one is outstanding', async () => {
    const gateway = new DecisionGateway();
    let calls = 0;
    gateway.setResolver(async () => {
      calls++;
      await sleep(20);
      return true;
    });

    const first = gateway.decide(link, 'timeout');
    expect(gateway.isPending()).toBe(true);
    expect(await gateway.decide(link, 'file_size')).toBe(false);
    expect(await first).toBe(true);
    expect(calls).toBe(1);
    expect(gateway.isPending()).toBe(false);
  });
});
