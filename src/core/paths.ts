/**
 * Path resolution for backlog data files.
 *
 * Environment variables:
 *   BACKLOG_HOME - Global directory (default: ~/.backlog)
 *   BACKLOG_DIR  - Project data directory (default: .backlog)
 */

import { resolve, dirname, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the global backlog home directory.
 * Respects BACKLOG_HOME env var, defaults to ~/.backlog.
 */
export function getBacklogHome(): string {
  return process.env['BACKLOG_HOME'] ?? join(homedir(), '.backlog');
}

/**
 * Get the absolute path to the project data directory.
 * Respects BACKLOG_DIR (absolute, or relative to cwd), defaults to ".backlog".
 */
export function getDataDir(cwd?: string): string {
  const dataDir = process.env['BACKLOG_DIR'] ?? '.backlog';
  if (isAbsolute(dataDir)) {
    return dataDir;
  }
  return resolve(cwd ?? process.cwd(), dataDir);
}

/**
 * Get the project root from the data directory.
 * If the data directory is ".backlog", the project root is its parent.
 */
export function getProjectRoot(cwd?: string): string {
  const dataDir = getDataDir(cwd);
  if (dataDir.endsWith('/.backlog') || dataDir.endsWith('\\.backlog')) {
    return dirname(dataDir);
  }
  return cwd ?? process.cwd();
}

/** Path to tasks.json (both partitions plus sessions). */
export function getTaskPath(cwd?: string): string {
  return join(getDataDir(cwd), 'tasks.json');
}

/** Path to the project config file. */
export function getConfigPath(cwd?: string): string {
  return join(getDataDir(cwd), 'config.json');
}

/** Path to the append-only audit log. */
export function getAuditLogPath(cwd?: string): string {
  return join(getDataDir(cwd), 'audit.jsonl');
}

/** Path to the append-only learning ledger. */
export function getLearningsPath(cwd?: string): string {
  return join(getDataDir(cwd), 'learnings.jsonl');
}

/** Directory for rotating operational backups. */
export function getBackupDir(cwd?: string): string {
  return join(getDataDir(cwd), 'backups', 'operational');
}

/** Path to the global config file. */
export function getGlobalConfigPath(): string {
  return join(getBacklogHome(), 'config.json');
}
