/**
 * Process Launcher
 *
 * Starts the downloader for one invocation. The orchestrator only sees the
 * StreamingProcess handle, so tests substitute an in-process launcher.
 */

import { executeCommand, spawnStreaming, type StreamingProcess } from '@linkgarden/utils';
import type { ToolInvocation } from './commandBuilder.js';

export interface LaunchOptions {
  cwd: string;
}

export type ProcessLauncher = (invocation: ToolInvocation, options: LaunchOptions) => StreamingProcess;

export const spawnLauncher: ProcessLauncher = (invocation, options) =>
  spawnStreaming(invocation.command, invocation.args, { cwd: options.cwd });

/**
 * Check that the downloader is installed and runnable
 */
export async function isToolAvailable(command: string): Promise<boolean> {
  try {
    const result = await executeCommand(command, ['--version'], { timeout: 10000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
