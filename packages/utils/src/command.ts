/**
 * Command Execution Wrapper
 *
 * Wrappers for running external commands:
 * - Buffered execution with timeout handling
 * - Streaming execution with line-by-line output capture
 * - Graceful termination with forced kill fallback
 */

import { spawn } from 'node:child_process';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
}

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 300000 } = options; // 5 minutes default

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = '';
    let stderr = '';

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

export type OutputStream = 'stdout' | 'stderr';

export interface OutputLine {
  stream: OutputStream;
  text: string;
}

/**
 * FIFO of output lines shared between a reader and its consumer.
 * The reader only appends; the consumer takes everything queued so far.
 */
export class LineQueue {
  private lines: OutputLine[] = [];

  push(line: OutputLine): void {
    this.lines.push(line);
  }

  drain(): OutputLine[] {
    const drained = this.lines;
    this.lines = [];
    return drained;
  }

  get size(): number {
    return this.lines.length;
  }
}

/**
 * Read both output streams line by line into the queue.
 * Resolves once every provided stream has closed.
 */
export async function readLinesInto(
  queue: LineQueue,
  streams: Partial<Record<OutputStream, Readable | null>>
): Promise<void> {
  const readers: Promise<unknown>[] = [];

  for (const name of ['stdout', 'stderr'] as const) {
    const input = streams[name];
    if (!input) continue;

    input.setEncoding('utf8');
    const rl = createInterface({ input, crlfDelay: Infinity });
    rl.on('line', (text: string) => {
      queue.push({ stream: name, text });
    });
    readers.push(once(rl, 'close'));
  }

  await Promise.all(readers);
}

/**
 * How a streamed process ended. `error` is set when it could not be spawned.
 */
export interface ProcessExit {
  exitCode: number;
  error?: Error;
}

/**
 * A running process whose combined output is consumed line by line
 */
export interface StreamingProcess {
  readonly pid: number | undefined;
  readonly exited: Promise<ProcessExit>;
  /** Resolves once all output has been queued */
  readonly drained: Promise<void>;
  hasExited(): boolean;
  takeLines(): OutputLine[];
  terminate(): void;
}

export interface StreamingOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  killGraceMs?: number;
}

/**
 * Spawn a command and stream its stdout and stderr into a line queue
 */
export function spawnStreaming(
  command: string,
  args: string[],
  options: StreamingOptions = {}
): StreamingProcess {
  const { cwd = process.cwd(), env = process.env, killGraceMs = 5000 } = options;

  const child = spawn(command, args, {
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const queue = new LineQueue();
  let finished = false;
  let forceKill: NodeJS.Timeout | undefined;

  const exited = new Promise<ProcessExit>((resolve) => {
    child.once('error', (error) => {
      finished = true;
      resolve({ exitCode: -1, error });
    });
    child.once('close', (code, signal) => {
      finished = true;
      if (forceKill) clearTimeout(forceKill);
      resolve({ exitCode: code ?? (signal ? 128 : 1) });
    });
  });

  const drained = readLinesInto(queue, { stdout: child.stdout, stderr: child.stderr });

  return {
    pid: child.pid,
    exited,
    drained,
    hasExited: () => finished,
    takeLines: () => queue.drain(),
    terminate: () => {
      if (finished || child.killed) return;
      child.kill('SIGTERM');
      // Force kill if the process ignores SIGTERM
      forceKill = setTimeout(() => {
        if (!finished) child.kill('SIGKILL');
      }, killGraceMs);
      forceKill.unref();
    },
  };
}
