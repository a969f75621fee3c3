/**
 * Configuration Tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigStore, defaultConfig, getDataPaths, loadConfig, parseConfig } from '../config/index.js';
import { ConfigurationError, ValidationError } from '../errors/index.js';

describe('Configuration', () => {
  let dir: string;
  let configFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'linkgarden-config-'));
    configFile = getDataPaths(dir).configFile;
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('has the documented defaults', () => {
    expect(defaultConfig()).toEqual({
      downloadLimits: { maxImagesPerLink: 1000, maxTimePerLinkSeconds: 3600, maxFileSizeMb: 500 },
      tool: {
        command: 'gallery-dl',
        defaultArgs: ['--write-metadata', '--write-info-json'],
        configFile: '',
        outputDir: '',
      },
      orchestrator: { tickIntervalMs: 100, pausePollMs: 100 },
    });
  });

  it('keeps data files beside config.json', () => {
    expect(getDataPaths('/data')).toEqual({
      configDir: '/data',
      configFile: '/data/config.json',
      linksFile: '/data/links.json',
      filtersFile: '/data/filters.json',
    });
  });

  it('fills missing fields of a partial file', () => {
    writeFileSync(configFile, JSON.stringify({ downloadLimits: { maxImagesPerLink: 10 } }));
    const config = loadConfig(configFile);

    expect(config.downloadLimits).toEqual({ maxImagesPerLink: 10, maxTimePerLinkSeconds: 3600, maxFileSizeMb: 500 });
    expect(config.tool.command).toBe('gallery-dl');
  });

  it('falls back to defaults for unreadable or invalid files', () => {
    writeFileSync(configFile, '{ nope');
    expect(loadConfig(configFile)).toEqual(defaultConfig());

    writeFileSync(configFile, JSON.stringify({ downloadLimits: { maxImagesPerLink: -1 } }));
    expect(loadConfig(configFile)).toEqual(defaultConfig());
  });

  it('raises ConfigurationError from parseConfig', () => {
    expect(() => parseConfig({ tool: { command: '' } }, configFile)).toThrow(ConfigurationError);
  });

  describe('ConfigStore', () => {
    it('reads values by dotted key', () => {
      const store = new ConfigStore(configFile);
      expect(store.get('downloadLimits.maxFileSizeMb')).toBe(500);
      expect(store.get('tool.defaultArgs')).toEqual(['--write-metadata', '--write-info-json']);
      expect(store.get('tool.missing')).toBeUndefined();
    });

    it('validates and saves changes', () => {
      const store = new ConfigStore(configFile);
      store.set('downloadLimits.maxImagesPerLink', 25);
      expect(store.save()).toBe(true);

      expect(new ConfigStore(configFile).current.downloadLimits.maxImagesPerLink).toBe(25);
    });

    it('rejects unknown keys and invalid values', () => {
      const store = new ConfigStore(configFile);

      expect(() => store.set('downloadLimits.maxWidgets', 3)).toThrow(ValidationError);
      expect(() => store.set('nothing.here', 3)).toThrow(ValidationError);
      expect(() => store.set('downloadLimits.maxImagesPerLink', 'lots')).toThrow(ValidationError);
      expect(store.current.downloadLimits.maxImagesPerLink).toBe(1000);
    });

    it('resets to defaults', () => {
      const store = new ConfigStore(configFile);
      store.set('tool.command', 'other-dl');
      store.reset();
      expect(store.current).toEqual(defaultConfig());
    });
  });
});
