/**
 * Core init logic - project initialization.
 *
 * Handles:
 *   1. .backlog/ directory structure creation
 *   2. Core data files (tasks.json, config.json)
 *   3. .gitignore for logs and backups
 */

import { mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { atomicWrite, safeReadFile } from '../store/atomic.js';
import { saveJson } from '../store/json.js';
import { createEmptyTaskFile } from '../store/data-accessor.js';
import { DEFAULTS } from './config.js';
import {
  getDataDir,
  getTaskPath,
  getConfigPath,
  getBackupDir,
  getProjectRoot,
} from './paths.js';

// ── Types ────────────────────────────────────────────────────────────

/** Options for the init operation. */
export interface InitOptions {
  /** Project name override (defaults to the project directory name). */
  name?: string;
  /** Overwrite existing config.json. tasks.json is never overwritten. */
  force?: boolean;
}

/** Result of the init operation. */
export interface InitResult {
  initialized: boolean;
  directory: string;
  created: string[];
  skipped: string[];
}

const GITIGNORE = ['logs/', 'backups/', '*.lock', ''].join('\n');

// ── Init ─────────────────────────────────────────────────────────────

/**
 * Initialize a backlog project. Idempotent: existing files are kept and
 * reported as skipped.
 */
export async function initProject(cwd?: string, options: InitOptions = {}): Promise<InitResult> {
  const dataDir = getDataDir(cwd);
  const created: string[] = [];
  const skipped: string[] = [];

  await mkdir(dataDir, { recursive: true });
  await mkdir(getBackupDir(cwd), { recursive: true });

  const taskPath = getTaskPath(cwd);
  if ((await safeReadFile(taskPath)) === null) {
    const name = options.name?.trim() || basename(getProjectRoot(cwd));
    await saveJson(taskPath, createEmptyTaskFile(name));
    created.push('tasks.json');
  } else {
    skipped.push('tasks.json');
  }

  const configPath = getConfigPath(cwd);
  if (options.force || (await safeReadFile(configPath)) === null) {
    await saveJson(configPath, DEFAULTS);
    created.push('config.json');
  } else {
    skipped.push('config.json');
  }

  const gitignorePath = join(dataDir, '.gitignore');
  if ((await safeReadFile(gitignorePath)) === null) {
    await atomicWrite(gitignorePath, GITIGNORE);
    created.push('.gitignore');
  } else {
    skipped.push('.gitignore');
  }

  return { initialized: true, directory: dataDir, created, skipped };
}
