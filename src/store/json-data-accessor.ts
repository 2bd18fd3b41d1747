/**
 * JSON file-based implementation of the DataAccessor interface.
 *
 * Delegates to readJson/writeJsonWithBackup/appendJsonl for all I/O, and uses
 * path helpers from ../core/paths.js for file location resolution.
 */

import type { TaskFile } from '../types/task.js';
import type { LearningEntry } from '../types/learning.js';
import {
  type DataAccessor,
  type AccessorOptions,
  createEmptyTaskFile,
  stampTaskFile,
  cloneTaskFile,
} from './data-accessor.js';
import { readJson, readJsonl, writeJsonWithBackup, appendJsonl } from './json.js';
import { withLock } from './lock.js';
import { TaskFileSchema, LearningEntrySchema, type AuditEntry } from './schema.js';
import {
  getTaskPath,
  getAuditLogPath,
  getLearningsPath,
  getBackupDir,
} from '../core/paths.js';
import { getLogger } from '../core/logger.js';

/**
 * Create a JSON file-backed DataAccessor.
 *
 * @param cwd - Working directory for path resolution (defaults to process.cwd())
 */
export async function createJsonDataAccessor(
  cwd?: string,
  options?: AccessorOptions,
): Promise<DataAccessor> {
  const taskPath = getTaskPath(cwd);
  const learningsPath = getLearningsPath(cwd);
  const logger = getLogger('store');

  async function load(): Promise<TaskFile> {
    const data = await readJson(taskPath, TaskFileSchema);
    return data ?? createEmptyTaskFile(options?.projectName);
  }

  const accessor: DataAccessor = {
    engine: 'json' as const,

    async loadTaskFile(): Promise<TaskFile> {
      return load();
    },

    async mutateTaskFile<T>(fn: (data: TaskFile) => T | Promise<T>): Promise<T> {
      return withLock(taskPath, async () => {
        const draft = cloneTaskFile(await load());
        const result = await fn(draft);
        stampTaskFile(draft);
        await writeJsonWithBackup(taskPath, draft, {
          backupDir: getBackupDir(cwd),
          maxBackups: options?.maxBackups,
        });
        logger.debug({ generation: draft._meta.generation }, 'tasks.json committed');
        return result;
      }, options?.lock);
    },

    async appendLog(entry: AuditEntry): Promise<void> {
      const logPath = getAuditLogPath(cwd);
      await withLock(logPath, () => appendJsonl(logPath, entry), options?.lock);
    },

    async loadLearnings(): Promise<LearningEntry[]> {
      return readJsonl(learningsPath, LearningEntrySchema);
    },

    async appendLearning(build: (existing: LearningEntry[]) => LearningEntry): Promise<LearningEntry> {
      return withLock(learningsPath, async () => {
        const existing = await readJsonl(learningsPath, LearningEntrySchema);
        const entry = build(existing);
        await appendJsonl(learningsPath, LearningEntrySchema.parse(entry));
        return entry;
      }, options?.lock);
    },

    async close(): Promise<void> {
      // No-op: JSON files don't hold open resources.
    },
  };

  return accessor;
}
