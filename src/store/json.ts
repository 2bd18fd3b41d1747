/**
 * JSON read/write with schema validation, locking, and backup.
 * This is the primary data access layer for backlog data files.
 */

import { createHash } from 'node:crypto';
import type { z } from 'zod';
import { atomicWrite, atomicWriteJson, safeReadFile } from './atomic.js';
import { createBackup } from './backup.js';
import { withLock, type LockOptions } from './lock.js';
import { BacklogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

function parseContent(filePath: string, content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new BacklogError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

function validate<S extends z.ZodTypeAny>(filePath: string, schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new BacklogError(
      ExitCode.VALIDATION_ERROR,
      `Schema validation failed for: ${filePath}`,
      {
        fix: 'Restore the file from .backlog/backups/operational or repair it by hand.',
        details: { issues: result.error.issues.slice(0, 5).map((i) => `${i.path.join('.')}: ${i.message}`) },
      },
    );
  }
  return result.data;
}

/**
 * Read, parse and validate a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<z.output<S> | null> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return validate(filePath, schema, parseContent(filePath, content));
}

/**
 * Read a JSON file, throwing if it doesn't exist.
 */
export async function readJsonRequired<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<z.output<S>> {
  const data = await readJson(filePath, schema);
  if (data === null) {
    throw new BacklogError(
      ExitCode.NOT_FOUND,
      `Required file not found: ${filePath}`,
    );
  }
  return data;
}

/**
 * Read a JSONL file, validating every line.
 * Returns an empty list if the file does not exist.
 */
export async function readJsonl<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): Promise<Array<z.output<S>>> {
  const content = await safeReadFile(filePath);
  if (content === null) return [];
  const entries: Array<z.output<S>> = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    entries.push(validate(filePath, schema, parseContent(filePath, trimmed)));
  }
  return entries;
}

/**
 * Compute a truncated SHA-256 checksum of a value (16 hex chars).
 */
export function computeChecksum(data: unknown): string {
  const json = JSON.stringify(data);
  const hash = createHash('sha256').update(json).digest('hex');
  return hash.substring(0, 16);
}

/** Options for saveJson. */
export interface SaveJsonOptions {
  /** Directory for backups. If omitted, no backup is created. */
  backupDir?: string;
  /** Maximum number of backups to retain. Default: 5. */
  maxBackups?: number;
  /** JSON indentation. Default: 2. */
  indent?: number;
  /** Lock tuning. */
  lock?: LockOptions;
}

/**
 * Back up the existing file, then write atomically. Caller holds the lock.
 */
export async function writeJsonWithBackup(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<void> {
  if (options?.backupDir) {
    await createBackup(filePath, options.backupDir, options.maxBackups);
  }
  await atomicWriteJson(filePath, data, { indent: options?.indent });
}

/**
 * Save JSON data with locking and optional backup:
 *   1. Acquire lock
 *   2. Create backup of existing file
 *   3. Atomic write (temp file -> rename)
 *   4. Release lock
 */
export async function saveJson(
  filePath: string,
  data: unknown,
  options?: SaveJsonOptions,
): Promise<void> {
  await withLock(filePath, () => writeJsonWithBackup(filePath, data, options), options?.lock);
}

/**
 * Append a line to a JSONL file atomically. Caller holds the lock when
 * ordering across writers matters.
 */
export async function appendJsonl(
  filePath: string,
  entry: unknown,
): Promise<void> {
  const existing = await safeReadFile(filePath);
  const line = JSON.stringify(entry);
  const content = existing ? existing.trimEnd() + '\n' + line + '\n' : line + '\n';
  await atomicWrite(filePath, content);
}
