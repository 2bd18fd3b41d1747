/**
 * File locking using proper-lockfile.
 * Prevents concurrent modifications to backlog data files, across processes
 * and across overlapping async callers within one process.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { BacklogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Lock tuning. */
export interface LockOptions {
  /** Milliseconds after which an abandoned lock is considered stale. */
  stale?: number;
  /** Number of acquisition retries before giving up. */
  retries?: number;
}

/** Default lock options. */
const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 12,
    minTimeout: 25,
    maxTimeout: 500,
    factor: 1.6,
    randomize: true,
  },
  stale: 10_000,
  realpath: false,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/**
 * Acquire an exclusive lock on a file. The file itself need not exist.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(
  filePath: string,
  options?: LockOptions,
): Promise<ReleaseFn> {
  await mkdir(dirname(filePath), { recursive: true });
  try {
    return await lockfile.lock(filePath, {
      ...DEFAULT_LOCK_OPTIONS,
      ...(options?.stale !== undefined && { stale: options.stale }),
      ...(options?.retries !== undefined && {
        retries: {
          ...DEFAULT_LOCK_OPTIONS.retries,
          retries: options.retries,
        },
      }),
    });
  } catch (err) {
    throw new BacklogError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      {
        fix: 'Another process may be writing to this file. Wait and retry.',
        cause: err,
      },
    );
  }
}

/**
 * Check if a file is currently locked.
 */
export async function isLocked(filePath: string): Promise<boolean> {
  return lockfile.check(filePath, { realpath: false });
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is automatically released when the function completes (or throws).
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
