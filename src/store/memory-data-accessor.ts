/**
 * In-memory implementation of the DataAccessor interface.
 *
 * Holds the backlog document in process. Mutations are serialized through a
 * promise chain so overlapping async callers still observe one
 * read-modify-write at a time, the same guarantee the JSON accessor gets from
 * its file lock.
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
import { TaskFileSchema, LearningEntrySchema, type AuditEntry } from './schema.js';

/** The memory accessor also exposes what it has recorded, for inspection. */
export interface MemoryDataAccessor extends DataAccessor {
  readonly auditLog: readonly AuditEntry[];
}

/** Run async steps strictly one after another. */
function createQueue(): <T>(fn: () => Promise<T>) => Promise<T> {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(fn: () => Promise<T>): Promise<T> => {
    const run = tail.then(fn);
    // Keep the chain alive whether or not this step fails
    tail = run.then(() => undefined, () => undefined);
    return run;
  };
}

/**
 * Create an in-memory DataAccessor, optionally seeded with a document.
 */
export function createMemoryDataAccessor(
  seed?: TaskFile,
  options?: AccessorOptions,
): MemoryDataAccessor {
  let current: TaskFile = seed
    ? TaskFileSchema.parse(cloneTaskFile(seed))
    : createEmptyTaskFile(options?.projectName);
  const learnings: LearningEntry[] = [];
  const auditLog: AuditEntry[] = [];
  // One queue per store, like one lock file per store on disk
  const taskQueue = createQueue();
  const ledgerQueue = createQueue();

  return {
    engine: 'memory' as const,
    auditLog,

    async loadTaskFile(): Promise<TaskFile> {
      return cloneTaskFile(current);
    },

    mutateTaskFile<T>(fn: (data: TaskFile) => T | Promise<T>): Promise<T> {
      return taskQueue(async () => {
        const draft = cloneTaskFile(current);
        const result = await fn(draft);
        current = stampTaskFile(draft);
        return result;
      });
    },

    async appendLog(entry: AuditEntry): Promise<void> {
      auditLog.push(entry);
    },

    async loadLearnings(): Promise<LearningEntry[]> {
      return learnings.map((l) => ({ ...l }));
    },

    appendLearning(build: (existing: LearningEntry[]) => LearningEntry): Promise<LearningEntry> {
      return ledgerQueue(async () => {
        const entry = LearningEntrySchema.parse(build(learnings.map((l) => ({ ...l }))));
        learnings.push(entry);
        return { ...entry };
      });
    },

    async close(): Promise<void> {
      // Nothing to release.
    },
  };
}
