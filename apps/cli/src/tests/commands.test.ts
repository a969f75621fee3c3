/**
 * CLI Helper Tests
 */

import { describe, expect, it } from 'vitest';
import { ValidationError, createLink } from '@linkgarden/core';
import { flattenConfig, parseConfigValue } from '../commands/config.js';
import { parseRule } from '../commands/filters.js';
import { countByStatus } from '../commands/stats.js';
import { createLimitResolver, describeLimit } from '../lib/prompt.js';
import { truncate } from '../lib/output.js';

describe('parseRule', () => {
  it('splits the match type from the pattern at the first "="', () => {
    expect(parseRule('match_regex=^page=\\d+$')).toEqual({
      matchType: 'match_regex',
      token: '^page=\\d+$',
      expression: '',
    });
  });

  it('accepts a bare match type', () => {
    expect(parseRule('match_any')).toEqual({ matchType: 'match_any', token: '', expression: '' });
  });

  it('rejects an unknown match type', () => {
    expect(() => parseRule('match_sometimes=www')).toThrow(ValidationError);
  });
});

describe('flattenConfig', () => {
  it('turns nested settings into dotted keys', () => {
    expect(
      flattenConfig({
        downloadLimits: { maxImagesPerLink: 10 },
        tool: { command: 'gallery-dl', defaultArgs: ['--quiet'] },
      })
    ).toEqual([
      ['downloadLimits.maxImagesPerLink', 10],
      ['tool.command', 'gallery-dl'],
      ['tool.defaultArgs', ['--quiet']],
    ]);
  });
});

describe('parseConfigValue', () => {
  it('reads JSON values and keeps anything else as text', () => {
    expect(parseConfigValue('25')).toBe(25);
    expect(parseConfigValue('["-v"]')).toEqual(['-v']);
    expect(parseConfigValue('true')).toBe(true);
    expect(parseConfigValue('gallery-dl')).toBe('gallery-dl');
  });
});

describe('countByStatus', () => {
  it('counts every status, including those with no links', () => {
    const links = [createLink('https://a.example.com/1'), createLink('https://a.example.com/2')];
    const downloaded = createLink('https://a.example.com/3');
    downloaded.status = 'downloaded';

    const counts = countByStatus([...links, downloaded]);
    expect(counts.pending).toBe(2);
    expect(counts.downloaded).toBe(1);
    expect(counts.error).toBe(0);
    expect(Object.keys(counts)).toHaveLength(9);
  });
});

describe('createLimitResolver', () => {
  const link = createLink('https://a.example.com/1');

  it('answers fixed policies without prompting', async () => {
    let prompted = false;
    const hooks = {
      beforePrompt: () => {
        prompted = true;
      },
    };

    expect(await createLimitResolver('continue', hooks)(link, 'timeout')).toBe(true);
    expect(await createLimitResolver('skip', hooks)(link, 'file_size')).toBe(false);
    expect(prompted).toBe(false);
  });

  it('describes each limit', () => {
    expect(describeLimit('image_count')).toBe('exceeded the image limit');
  });
});

describe('truncate', () => {
  it('cuts long text to the width with an ellipsis', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('https://a.example.com', 8)).toBe('https:/…');
  });
});
