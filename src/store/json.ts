/**
 * JSON read/write with locking.
 * This is the data access layer for worksession files.
 */

import { createHash } from 'node:crypto';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { withLock } from './lock.js';
import { WorkSessionError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Parse JSON text, naming the file on failure.
 */
export function parseJson(content: string, filePath: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new WorkSessionError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { fix: `Repair or remove ${filePath}`, cause: err },
    );
  }
}

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return parseJson(content, filePath);
}

/**
 * Truncated SHA-256 checksum (16 hex chars) of raw file content.
 */
export function computeChecksum(content: string): string {
  return createHash('sha256').update(content).digest('hex').substring(0, 16);
}

/**
 * Save JSON data atomically under the file's lock.
 */
export async function saveJson(filePath: string, data: unknown): Promise<void> {
  await withLock(filePath, () => atomicWriteJson(filePath, data));
}
