/**
 * File locking using proper-lockfile.
 * Prevents concurrent modifications to worksession data files.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { WorkSessionError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default lock options. */
const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 100,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  realpath: false,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/** Lock tuning; both default to the values above. */
export interface LockOptions {
  stale?: number;
  retries?: number;
}

/**
 * Acquire an exclusive lock on a file. The file itself need not exist yet.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(
  filePath: string,
  options?: LockOptions,
): Promise<ReleaseFn> {
  await mkdir(dirname(filePath), { recursive: true });
  try {
    const release = await lockfile.lock(filePath, {
      ...DEFAULT_LOCK_OPTIONS,
      ...(options?.stale !== undefined && { stale: options.stale }),
      ...(options?.retries !== undefined && {
        retries: {
          ...DEFAULT_LOCK_OPTIONS.retries,
          retries: options.retries,
        },
      }),
    });
    return release;
  } catch (err) {
    throw new WorkSessionError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      {
        fix: `Another worksession process may be writing to this file. Wait and retry.`,
        cause: err,
      },
    );
  }
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes (or throws).
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const release = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
