/**
 * Task type definitions for the backlog document (tasks.json).
 */

import type { TaskStatus, TaskPriority } from '../store/status-registry.js';
import type { ParallelSession } from './session.js';
export type { TaskStatus, TaskPriority };

/** A single acceptance criterion. */
export interface AcceptanceCriterion {
  text: string;
  checked: boolean;
}

/** A single progress log entry. Append-only. */
export interface ProgressEntry {
  timestamp: string;
  note: string;
}

/** A single backlog task. */
export interface Task {
  id: string;
  title: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** Free-form classification ("slice"); used for tie-breaks and reporting only. */
  category: string | null;
  blockedBy: string[];
  /** Opaque resource ids (usually file paths) the task will mutate. */
  resourceFootprint: string[];
  acceptanceCriteria: AcceptanceCriterion[];
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  progressLog: ProgressEntry[];
  /** Learning ledger entry ids that reference this task. */
  learnings: string[];
  /** Optimistic-concurrency version; +1 on every write. */
  version: number;
  updatedAt: string;
}

/** Project metadata. */
export interface ProjectMeta {
  name: string;
}

/** File metadata (_meta block). */
export interface FileMeta {
  schemaVersion: string;
  checksum: string;
  /** Next numeric id to hand out. Never decremented, never reused. */
  nextId: number;
  nextSessionId: number;
  /** Incremented on every committed write. */
  generation: number;
}

/** Root tasks.json structure. */
export interface TaskFile {
  version: string;
  project: ProjectMeta;
  lastUpdated: string;
  _meta: FileMeta;
  /** Active partition: pending, in_progress, blocked. */
  tasks: Task[];
  /** Archive partition: completed. */
  archive: Task[];
  sessions: ParallelSession[];
}

/** Which partition a task was found in. */
export type Partition = 'active' | 'archive';

/** Soft warning kinds. These never block the operation that raised them. */
export type IntegrityWarningCode =
  | 'W_DANGLING_BLOCKER'
  | 'W_DUPLICATE_TITLE'
  | 'W_MODULE_OVERLAP'
  | 'W_STALE_TASK'
  | 'W_UNLINKED_LEARNING';

/** A DataIntegrityWarning: recorded and surfaced, not fatal. */
export interface IntegrityWarning {
  code: IntegrityWarningCode;
  taskId: string;
  message: string;
  relatedIds?: string[];
}
