/**
 * File Operations
 *
 * Safe file operations with proper error handling.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';

/**
 * Ensure a directory exists, creating it if necessary
 */
export function ensureDir(dirPath: string): void {
  mkdirSync(dirPath, { recursive: true });
}

/**
 * Read a UTF-8 file, returning null if it doesn't exist
 */
export function safeReadFile(filePath: string): string | null {
  try {
    return readFileSync(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Write a file through a temporary sibling so readers never see a partial file
 */
export function safeWriteFile(filePath: string, content: string): void {
  ensureDir(dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tempPath, content, 'utf8');
  renameSync(tempPath, filePath);
}

/**
 * Parse a JSON file. Returns null when the file doesn't exist.
 */
export function readJsonFile(filePath: string): unknown {
  const content = safeReadFile(filePath);
  if (content === null) {
    return null;
  }
  const data: unknown = JSON.parse(content);
  return data;
}

export function writeJsonFile(filePath: string, data: unknown): void {
  safeWriteFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Size of a regular file in bytes, or null if it is missing or not a file
 */
export function getFileSizeBytes(filePath: string): number | null {
  try {
    const stats = statSync(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/**
 * Resolve a path against a base directory unless it is already absolute
 */
export function resolveFrom(baseDir: string, target: string): string {
  return isAbsolute(target) ? target : resolve(baseDir, target);
}
