/**
 * Tool Output Parser
 *
 * Heuristics over the downloader's line output: which lines mark a saved
 * (or already present) file, how much was written, and what to report when
 * the tool fails.
 */

import type { OutputLine } from '@linkgarden/utils';
import { getFileSizeBytes, resolveFrom } from '@linkgarden/utils';

const IMAGE_EVENT_PATTERN = /\b(?:sav(?:e|ed|ing)|exists|download(?:ed|ing)?)\b/i;
const FAILURE_PATTERN = /\b(?:error|failed)\b/i;
// gallery-dl prefixes files it skipped because they already exist
const EXISTING_FILE_PREFIX = '# ';

const BYTES_PER_MB = 1024 * 1024;

export function isImageEvent(line: string): boolean {
  const text = line.trim();
  if (!text) {
    return false;
  }
  if (text.startsWith(EXISTING_FILE_PREFIX)) {
    return true;
  }
  return IMAGE_EVENT_PATTERN.test(text) && !FAILURE_PATTERN.test(text);
}

export function countImageEvents(lines: readonly string[]): number {
  return lines.filter(isImageEvent).length;
}

/**
 * Drops a line identical to the one immediately before it
 */
export class ConsecutiveDedupe {
  private last: string | null = null;

  accept(text: string): boolean {
    if (text === this.last) {
      return false;
    }
    this.last = text;
    return true;
  }
}

/**
 * Total size in MB of the files the tool reported writing.
 * Lines that don't name an existing file are ignored.
 */
export function measureOutputSizeMb(lines: readonly string[], baseDir: string): number {
  const seen = new Set<string>();
  let totalBytes = 0;

  for (const line of lines) {
    let candidate = line.trim();
    if (candidate.startsWith(EXISTING_FILE_PREFIX)) {
      candidate = candidate.slice(EXISTING_FILE_PREFIX.length).trim();
    }
    if (!candidate) continue;

    const filePath = resolveFrom(baseDir, candidate);
    if (seen.has(filePath)) continue;

    const size = getFileSizeBytes(filePath);
    if (size !== null) {
      seen.add(filePath);
      totalBytes += size;
    }
  }

  return Math.round((totalBytes / BYTES_PER_MB) * 100) / 100;
}

/**
 * Error text for a failed run: captured stderr, else the last non-empty
 * output line, else a generic message with the exit code
 */
export function deriveErrorMessage(
  lines: readonly OutputLine[],
  command: string,
  exitCode: number
): string {
  const stderr = lines
    .filter((line) => line.stream === 'stderr')
    .map((line) => line.text)
    .join('\n')
    .trim();
  if (stderr) {
    return stderr;
  }

  for (let i = lines.length - 1; i >= 0; i--) {
    const text = lines[i]?.text.trim();
    if (text) {
      return text;
    }
  }

  return `${command} failed (code ${exitCode})`;
}
