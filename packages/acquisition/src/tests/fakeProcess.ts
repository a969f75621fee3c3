/**
 * In-process stand-in for the downloader
 *
 * A FakeProcess exposes the same StreamingProcess handle the real launcher
 * returns, backed by PassThrough streams the test script writes to.
 */

import { PassThrough } from 'node:stream';
import {
  LineQueue,
  readLinesInto,
  sleep,
  type OutputLine,
  type OutputStream,
  type ProcessExit,
  type StreamingProcess,
} from '@linkgarden/utils';
import type { LaunchOptions, ProcessLauncher } from '../launcher.js';
import type { ToolInvocation } from '../commandBuilder.js';

export class FakeProcess implements StreamingProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly drained: Promise<void>;

  terminated = false;

  private readonly queue = new LineQueue();
  private finished = false;
  private ending = false;
  private settle: (exit: ProcessExit) => void = () => undefined;
  readonly exited = new Promise<ProcessExit>((resolve) => {
    this.settle = resolve;
  });

  constructor(readonly invocation: ToolInvocation) {
    this.drained = readLinesInto(this.queue, { stdout: this.stdout, stderr: this.stderr });
  }

  write(text: string, stream: OutputStream = 'stdout'): void {
    if (this.ending) return;
    (stream === 'stdout' ? this.stdout : this.stderr).write(`${text}\n`);
  }

  /**
   * Close the output streams and report the exit once they are drained
   */
  async exit(exitCode: number): Promise<void> {
    if (this.ending) return;
    this.ending = true;
    this.stdout.end();
    this.stderr.end();
    await this.drained;
    this.finished = true;
    this.settle({ exitCode });
  }

  /**
   * Behave like a spawn that emitted 'error'
   */
  failToStart(error: Error): void {
    this.ending = true;
    this.stdout.end();
    this.stderr.end();
    this.finished = true;
    this.settle({ exitCode: -1, error });
  }

  /**
   * Keep running until terminated or the time runs out, then exit cleanly
   */
  async runFor(ms: number): Promise<void> {
    const deadline = Date.now() + ms;
    while (!this.ending && Date.now() < deadline) {
      await sleep(5);
    }
    await this.exit(0);
  }

  hasExited(): boolean {
    return this.finished;
  }

  takeLines(): OutputLine[] {
    return this.queue.drain();
  }

  terminate(): void {
    this.terminated = true;
    void this.exit(143);
  }
}

export type FakeScript = (proc: FakeProcess) => void | Promise<void>;

export interface FakeLauncher {
  launcher: ProcessLauncher;
  processes: FakeProcess[];
  launches: LaunchOptions[];
}

/**
 * Launcher whose processes run the script chosen for their URL
 */
export function createFakeLauncher(scriptFor: (url: string) => FakeScript): FakeLauncher {
  const processes: FakeProcess[] = [];
  const launches: LaunchOptions[] = [];

  const launcher: ProcessLauncher = (invocation, options) => {
    const proc = new FakeProcess(invocation);
    processes.push(proc);
    launches.push(options);
    const url = invocation.args[invocation.args.length - 1] ?? '';
    void Promise.resolve(scriptFor(url)(proc));
    return proc;
  };

  return { launcher, processes, launches };
}

/**
 * Poll until the predicate holds
 */
export async function waitFor(predicate: () => boolean, timeoutMs: number = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await sleep(5);
  }
}

export const scripts = {
  succeed:
    (...lines: string[]): FakeScript =>
    async (proc) => {
      for (const line of lines) proc.write(line);
      await proc.exit(0);
    },
  fail:
    (exitCode: number, lines: Array<[string, OutputStream?]> = []): FakeScript =>
    async (proc) => {
      for (const [line, stream] of lines) proc.write(line, stream);
      await proc.exit(exitCode);
    },
  runFor:
    (ms: number, ...lines: string[]): FakeScript =>
    async (proc) => {
      for (const line of lines) proc.write(line);
      await proc.runFor(ms);
    },
};
