/**
 * DataAccessor: storage abstraction for core modules.
 *
 * Core modules operate on the whole backlog document (TaskFile: both
 * partitions plus parallel sessions). The DataAccessor abstracts WHERE that
 * document lives while preserving the read-modify-write pattern the core
 * relies on. Every mutation runs inside mutateTaskFile(), which holds an
 * exclusive lock across load, checks, mutation and write, so an admission
 * decision is a single test-and-set.
 *
 * Two implementations:
 * - JsonDataAccessor: .backlog/*.json files guarded by proper-lockfile
 * - MemoryDataAccessor: in-process document for embedding and tests
 */

import type { TaskFile } from '../types/task.js';
import type { LearningEntry } from '../types/learning.js';
import type { LockOptions } from './lock.js';
import type { AuditEntry } from './schema.js';
import { computeChecksum } from './json.js';

export const SCHEMA_VERSION = '1.0.0';

/** Storage engines. */
export type StorageEngine = 'json' | 'memory';

/**
 * DataAccessor interface.
 */
export interface DataAccessor {
  /** The storage engine backing this accessor. */
  readonly engine: StorageEngine;

  // ---- Task data (tasks.json) ----

  /** Load a snapshot of the backlog document. Missing data reads as empty. */
  loadTaskFile(): Promise<TaskFile>;

  /**
   * Read-modify-write under an exclusive lock. `fn` receives a private copy;
   * the copy is committed only if `fn` returns normally. A throw leaves the
   * stored document untouched.
   */
  mutateTaskFile<T>(fn: (data: TaskFile) => T | Promise<T>): Promise<T>;

  // ---- Audit log (audit.jsonl) ----

  /** Append an entry to the audit log. */
  appendLog(entry: AuditEntry): Promise<void>;

  // ---- Learning ledger (learnings.jsonl) ----

  /** Load every learning entry in append order. */
  loadLearnings(): Promise<LearningEntry[]>;

  /**
   * Append one learning under the ledger lock. `build` sees the current
   * entries so it can assign the next monotonic id.
   */
  appendLearning(build: (existing: LearningEntry[]) => LearningEntry): Promise<LearningEntry>;

  // ---- Lifecycle ----

  /** Release any resources. */
  close(): Promise<void>;
}

/** Options shared by accessor factories. */
export interface AccessorOptions {
  lock?: LockOptions;
  maxBackups?: number;
  projectName?: string;
}

/** A fresh, empty backlog document. */
export function createEmptyTaskFile(projectName = 'backlog', now = new Date().toISOString()): TaskFile {
  return {
    version: SCHEMA_VERSION,
    project: { name: projectName },
    lastUpdated: now,
    _meta: {
      schemaVersion: SCHEMA_VERSION,
      checksum: computeChecksum({ tasks: [], archive: [] }),
      nextId: 1,
      nextSessionId: 1,
      generation: 0,
    },
    tasks: [],
    archive: [],
    sessions: [],
  };
}

/** Stamp metadata on a document that is about to be committed. */
export function stampTaskFile(data: TaskFile, now = new Date().toISOString()): TaskFile {
  data._meta.checksum = computeChecksum({ tasks: data.tasks, archive: data.archive });
  data._meta.generation += 1;
  data.lastUpdated = now;
  return data;
}

/** Deep copy so a draft never aliases the committed document. */
export function cloneTaskFile(data: TaskFile): TaskFile {
  return structuredClone(data);
}

/**
 * Create a DataAccessor for the given working directory.
 *
 * @param engine - Storage engine (default 'json')
 * @param cwd - Working directory (defaults to process.cwd())
 */
export async function createDataAccessor(
  engine: StorageEngine = 'json',
  cwd?: string,
  options?: AccessorOptions,
): Promise<DataAccessor> {
  switch (engine) {
    case 'memory': {
      const { createMemoryDataAccessor } = await import('./memory-data-accessor.js');
      return createMemoryDataAccessor(undefined, options);
    }
    case 'json':
    default: {
      const { createJsonDataAccessor } = await import('./json-data-accessor.js');
      return createJsonDataAccessor(cwd, options);
    }
  }
}

/** Convenience: get the default (JSON) DataAccessor. */
export async function getAccessor(cwd?: string, options?: AccessorOptions): Promise<DataAccessor> {
  return createDataAccessor('json', cwd, options);
}
