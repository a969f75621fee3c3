/**
 * Application Configuration
 *
 * Settings live in <configDir>/config.json next to the link and filter data.
 * Every field has a default, so a missing or partial file is always usable;
 * a file that can't be read or validated falls back to the defaults.
 */

import { join } from 'node:path';
import { z } from 'zod';
import { createLogger, readJsonFile, writeJsonFile, isObject, errorMessage } from '@linkgarden/utils';
import { ConfigurationError, ValidationError } from '../errors/index.js';

const log = createLogger({ module: 'config' });

const downloadLimitsSchema = z.object({
  maxImagesPerLink: z.number().int().positive().default(1000),
  maxTimePerLinkSeconds: z.number().positive().default(3600),
  maxFileSizeMb: z.number().positive().default(500),
});

const toolSchema = z.object({
  command: z.string().min(1).default('gallery-dl'),
  defaultArgs: z.array(z.string()).default(['--write-metadata', '--write-info-json']),
  configFile: z.string().default(''),
  outputDir: z.string().default(''),
});

const orchestratorSchema = z.object({
  tickIntervalMs: z.number().int().positive().default(100),
  pausePollMs: z.number().int().positive().default(100),
});

export const appConfigSchema = z.object({
  downloadLimits: downloadLimitsSchema.default({}),
  tool: toolSchema.default({}),
  orchestrator: orchestratorSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type DownloadLimits = AppConfig['downloadLimits'];
export type ToolConfig = AppConfig['tool'];
export type OrchestratorSettings = AppConfig['orchestrator'];

export function defaultConfig(): AppConfig {
  return appConfigSchema.parse({});
}

/**
 * Files kept in the configuration directory
 */
export interface DataPaths {
  configDir: string;
  configFile: string;
  linksFile: string;
  filtersFile: string;
}

export function getDataPaths(configDir: string): DataPaths {
  return {
    configDir,
    configFile: join(configDir, 'config.json'),
    linksFile: join(configDir, 'links.json'),
    filtersFile: join(configDir, 'filters.json'),
  };
}

/**
 * Parse config file contents. Throws ConfigurationError when invalid.
 */
export function parseConfig(data: unknown, filePath: string): AppConfig {
  const result = appConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(filePath, issues);
  }
  return result.data;
}

/**
 * Load config.json, falling back to defaults on any error
 */
export function loadConfig(filePath: string): AppConfig {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (error) {
    log.error(
      { err: new ConfigurationError(filePath, errorMessage(error), error) },
      'Could not read configuration, using defaults'
    );
    return defaultConfig();
  }

  try {
    return parseConfig(raw, filePath);
  } catch (error) {
    log.error({ err: error }, 'Configuration is invalid, using defaults');
    return defaultConfig();
  }
}

/**
 * Read/write access to config.json by dotted key path
 * (e.g. "downloadLimits.maxImagesPerLink")
 */
export class ConfigStore {
  private config: AppConfig;

  constructor(private readonly filePath: string) {
    this.config = loadConfig(filePath);
  }

  get current(): AppConfig {
    return this.config;
  }

  get(keyPath: string): unknown {
    let value: unknown = this.config;
    for (const key of keyPath.split('.')) {
      if (!isObject(value) || !(key in value)) {
        return undefined;
      }
      value = value[key];
    }
    return value;
  }

  /**
   * Set a value and re-validate the whole config.
   * Throws ValidationError if the result is not a valid config.
   */
  set(keyPath: string, value: unknown): void {
    const keys = keyPath.split('.');
    const draft: Record<string, unknown> = structuredClone(this.config);

    let node: Record<string, unknown> = draft;
    for (const key of keys.slice(0, -1)) {
      const child = node[key];
      if (!isObject(child)) {
        throw new ValidationError(keyPath, 'unknown configuration key');
      }
      node = child;
    }

    const leaf = keys[keys.length - 1];
    if (leaf === undefined || !(leaf in node)) {
      throw new ValidationError(keyPath, 'unknown configuration key');
    }
    node[leaf] = value;

    const result = appConfigSchema.safeParse(draft);
    if (!result.success) {
      throw new ValidationError(keyPath, result.error.issues[0]?.message ?? 'invalid value');
    }
    this.config = result.data;
  }

  reset(): void {
    this.config = defaultConfig();
  }

  save(): boolean {
    try {
      writeJsonFile(this.filePath, this.config);
      return true;
    } catch (error) {
      log.error({ err: error, filePath: this.filePath }, 'Error saving config');
      return false;
    }
  }
}
