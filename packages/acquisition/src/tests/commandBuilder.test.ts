/**
 * Tool Command Builder Tests
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { appConfigSchema, type ToolConfig } from '@linkgarden/core';
import { buildToolInvocation, formatInvocation } from '../commandBuilder.js';

function tool(overrides: Partial<ToolConfig> = {}): ToolConfig {
  return appConfigSchema.parse({ tool: overrides }).tool;
}

describe('buildToolInvocation', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linkgarden-command-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('puts the default arguments before the URL', () => {
    const invocation = buildToolInvocation(tool(), 'https://a.example.com/1', { baseDir: dir });

    expect(invocation).toEqual({
      command: 'gallery-dl',
      args: ['--write-metadata', '--write-info-json', 'https://a.example.com/1'],
    });
  });

  it('resolves and creates the output directory', () => {
    const invocation = buildToolInvocation(
      tool({ defaultArgs: [], outputDir: 'downloads' }),
      'https://a.example.com/1',
      { baseDir: dir }
    );

    expect(invocation.args).toEqual(['-d', join(dir, 'downloads'), 'https://a.example.com/1']);
    expect(existsSync(join(dir, 'downloads'))).toBe(true);
  });

  it('passes the config file only when it exists', () => {
    const withoutFile = buildToolInvocation(
      tool({ defaultArgs: [], configFile: 'gallery-dl.conf' }),
      'https://a.example.com/1',
      { baseDir: dir }
    );
    expect(withoutFile.args).toEqual(['https://a.example.com/1']);

    writeFileSync(join(dir, 'gallery-dl.conf'), '{}');
    const withFile = buildToolInvocation(
      tool({ defaultArgs: [], configFile: 'gallery-dl.conf', outputDir: 'out' }),
      'https://a.example.com/1',
      { baseDir: dir }
    );
    expect(withFile.args).toEqual([
      '-d',
      join(dir, 'out'),
      '--config',
      join(dir, 'gallery-dl.conf'),
      'https://a.example.com/1',
    ]);
  });
});

describe('formatInvocation', () => {
  it('quotes arguments containing whitespace', () => {
    expect(formatInvocation({ command: 'gallery-dl', args: ['-d', '/tmp/my files', 'https://a.example.com/1'] })).toBe(
      'gallery-dl -d "/tmp/my files" https://a.example.com/1'
    );
  });
});
