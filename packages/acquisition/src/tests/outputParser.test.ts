/**
 * Tool Output Parser Tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConsecutiveDedupe,
  countImageEvents,
  deriveErrorMessage,
  isImageEvent,
  measureOutputSizeMb,
} from '../outputParser.js';

describe('isImageEvent', () => {
  it.each([
    ['Saving image 3 of 10', true],
    ['downloaded cover.png', true],
    ['# ./gallery/001.jpg', true],
    ['file already exists', true],
    ['[error] download failed', false],
    ['Saving failed: 403', false],
    ['[info] Using extractor', false],
    ['   ', false],
  ])('%j -> %s', (line, expected) => {
    expect(isImageEvent(line)).toBe(expected);
  });

  it('counts the matching lines', () => {
    expect(countImageEvents(['saving a.jpg', 'noise', '# b.jpg', ''])).toBe(2);
  });
});

describe('ConsecutiveDedupe', () => {
  it('drops repeats only when they are adjacent', () => {
    const dedupe = new ConsecutiveDedupe();
    const kept = ['a', 'a', 'b', 'a', 'a'].filter((line) => dedupe.accept(line));
    expect(kept).toEqual(['a', 'b', 'a']);
  });
});

describe('measureOutputSizeMb', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linkgarden-size-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('sums the files named in the output once each', () => {
    mkdirSync(join(dir, 'gallery'));
    writeFileSync(join(dir, 'gallery', 'a.jpg'), Buffer.alloc(1024 * 1024));
    writeFileSync(join(dir, 'b.jpg'), Buffer.alloc(512 * 1024));

    const size = measureOutputSizeMb(
      ['gallery/a.jpg', '# gallery/a.jpg', join(dir, 'b.jpg'), 'missing.jpg', 'gallery'],
      dir
    );
    expect(size).toBe(1.5);
  });

  it('rounds to two decimals', () => {
    writeFileSync(join(dir, 'c.jpg'), Buffer.alloc(1000));
    expect(measureOutputSizeMb(['c.jpg'], dir)).toBe(0);

    writeFileSync(join(dir, 'd.jpg'), Buffer.alloc(100 * 1024));
    expect(measureOutputSizeMb(['d.jpg'], dir)).toBe(0.1);
  });
});

describe('deriveErrorMessage', () => {
  it('prefers stderr', () => {
    expect(
      deriveErrorMessage(
        [
          { stream: 'stdout', text: 'starting' },
          { stream: 'stderr', text: '[error] HTTP 404' },
          { stream: 'stderr', text: '[error] giving up' },
        ],
        'gallery-dl',
        1
      )
    ).toBe('[error] HTTP 404\n[error] giving up');
  });

  it('falls back to the last non-empty line', () => {
    expect(
      deriveErrorMessage(
        [
          { stream: 'stdout', text: 'no results' },
          { stream: 'stdout', text: '  ' },
        ],
        'gallery-dl',
        4
      )
    ).toBe('no results');
  });

  it('falls back to the command and exit code', () => {
    expect(deriveErrorMessage([], 'gallery-dl', 4)).toBe('gallery-dl failed (code 4)');
  });
});
