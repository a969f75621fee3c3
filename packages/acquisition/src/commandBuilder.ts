/**
 * Tool Command Builder
 *
 * Builds the downloader invocation for one URL:
 *   <command> <defaultArgs...> [-d <outputDir>] [--config <configFile>] <url>
 */

import type { ToolConfig } from '@linkgarden/core';
import { ensureDir, fileExists, resolveFrom } from '@linkgarden/utils';

export interface ToolInvocation {
  command: string;
  args: string[];
}

export interface BuildOptions {
  /** Base for relative output-directory and config-file paths */
  baseDir: string;
}

export function buildToolInvocation(
  tool: ToolConfig,
  url: string,
  options: BuildOptions
): ToolInvocation {
  const args = [...tool.defaultArgs];

  if (tool.outputDir) {
    const outputDir = resolveFrom(options.baseDir, tool.outputDir);
    ensureDir(outputDir);
    args.push('-d', outputDir);
  }

  if (tool.configFile) {
    const configFile = resolveFrom(options.baseDir, tool.configFile);
    if (fileExists(configFile)) {
      args.push('--config', configFile);
    }
  }

  args.push(url);

  return { command: tool.command, args };
}

/**
 * Render an invocation for logs
 */
export function formatInvocation(invocation: ToolInvocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/\s/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}
