/**
 * Numbered backup system for backlog data files.
 * Maintains a rotating window of recent backups for rollback protection.
 */

import { copyFile, readdir, unlink, mkdir } from 'node:fs/promises';
import { join, basename } from 'node:path';
import { BacklogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { isNotFoundError } from './atomic.js';

const DEFAULT_MAX_BACKUPS = 5;

async function ignoreMissing(op: Promise<void>): Promise<void> {
  try {
    await op;
  } catch (err) {
    if (!isNotFoundError(err)) throw err;
  }
}

/**
 * Create a numbered backup of a file.
 * Rotates existing backups (file.1 -> file.2, etc.) and removes excess.
 * Returns null when the source file does not exist yet.
 */
export async function createBackup(
  filePath: string,
  backupDir: string,
  maxBackups: number = DEFAULT_MAX_BACKUPS,
): Promise<string | null> {
  if (maxBackups < 1) return null;
  const fileName = basename(filePath);
  try {
    await mkdir(backupDir, { recursive: true });

    const backupPath = join(backupDir, `${fileName}.1`);
    try {
      // Stage the new copy first so a missing source leaves the rotation untouched
      await copyFile(filePath, `${backupPath}.tmp`);
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw err;
    }

    await ignoreMissing(unlink(join(backupDir, `${fileName}.${maxBackups}`)));
    for (let i = maxBackups - 1; i >= 1; i--) {
      await ignoreMissing(
        copyFile(join(backupDir, `${fileName}.${i}`), join(backupDir, `${fileName}.${i + 1}`)),
      );
    }

    await copyFile(`${backupPath}.tmp`, backupPath);
    await unlink(`${backupPath}.tmp`);
    return backupPath;
  } catch (err) {
    throw new BacklogError(
      ExitCode.FILE_ERROR,
      `Backup failed for: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * List existing backups for a file, sorted by number (newest first).
 */
export async function listBackups(
  fileName: string,
  backupDir: string,
): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (isNotFoundError(err)) return [];
    throw err;
  }
  const prefix = `${fileName}.`;
  return entries
    .filter((e) => e.startsWith(prefix) && /^\d+$/.test(e.slice(prefix.length)))
    .sort((a, b) => {
      const numA = parseInt(a.slice(prefix.length), 10);
      const numB = parseInt(b.slice(prefix.length), 10);
      return numA - numB;
    })
    .map((e) => join(backupDir, e));
}
