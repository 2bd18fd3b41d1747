/**
 * Task field updates, expressed through TaskStore.update so the
 * optimistic-concurrency and protected-field rules apply uniformly.
 */

import { BacklogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task, TaskPriority } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import {
  TaskStore,
  requireTask,
  assertVersion,
  touch,
  auditEntry,
  auditSnapshot,
} from '../../store/task-store.js';
import { isValidPriority } from '../../store/status-registry.js';

/** Options for updating a task. */
export interface UpdateTaskOptions {
  taskId: string;
  expectedVersion?: number;
  title?: string;
  priority?: TaskPriority;
  category?: string | null;
  resourceFootprint?: string[];
  addCriteria?: string[];
  note?: string;
  actor?: string;
}

/** Result of updating a task. */
export interface UpdateTaskResult {
  task: Task;
  changes: string[];
}

function cleanList(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
}

/**
 * Update a task's editable fields in one write. Fails with NO_CHANGE when
 * nothing was requested.
 */
export async function updateTask(accessor: DataAccessor, options: UpdateTaskOptions): Promise<UpdateTaskResult> {
  const changes: string[] = [];
  if (options.title !== undefined) {
    if (!options.title.trim()) throw new BacklogError(ExitCode.INVALID_INPUT, 'Task title cannot be empty');
    changes.push('title');
  }
  if (options.priority !== undefined) {
    if (!isValidPriority(options.priority)) {
      throw new BacklogError(ExitCode.INVALID_INPUT, `Invalid priority: ${String(options.priority)}`, {
        fix: 'Use one of P1, P2, P3, P4',
      });
    }
    changes.push('priority');
  }
  if (options.category !== undefined) changes.push('category');
  if (options.resourceFootprint !== undefined) changes.push('resourceFootprint');
  if (options.addCriteria?.length) changes.push('acceptanceCriteria');
  if (options.note?.trim()) changes.push('progressLog');

  if (changes.length === 0) {
    throw new BacklogError(ExitCode.NO_CHANGE, `No changes requested for ${options.taskId}`);
  }

  const store = new TaskStore(accessor);
  const task = await store.update(options.taskId, options.expectedVersion, (t) => {
    const now = new Date().toISOString();
    if (options.title !== undefined) t.title = options.title.trim();
    if (options.priority !== undefined) t.priority = options.priority;
    if (options.category !== undefined) t.category = options.category?.trim() || null;
    if (options.resourceFootprint !== undefined) t.resourceFootprint = cleanList(options.resourceFootprint);
    for (const text of cleanList(options.addCriteria ?? [])) {
      t.acceptanceCriteria.push({ text, checked: false });
    }
    if (options.note?.trim()) t.progressLog.push({ timestamp: now, note: options.note.trim() });
  }, { actor: options.actor });

  return { task, changes };
}

/** Append an acceptance criterion. */
export async function addCriterion(
  accessor: DataAccessor,
  taskId: string,
  text: string,
  expectedVersion?: number,
): Promise<Task> {
  const { task } = await updateTask(accessor, { taskId, addCriteria: [text], expectedVersion });
  return task;
}

/**
 * Check or uncheck the criterion at `index` (0-based). A completed task's
 * criteria may still be edited; the Reconciler reports the resulting drift.
 */
export async function setCriterion(
  accessor: DataAccessor,
  taskId: string,
  index: number,
  checked: boolean,
  expectedVersion?: number,
): Promise<Task> {
  const store = new TaskStore(accessor);
  return store.update(taskId, expectedVersion, (t) => {
    const criterion = t.acceptanceCriteria[index];
    if (!criterion) {
      throw new BacklogError(
        ExitCode.INVALID_INPUT,
        `Task ${taskId} has no acceptance criterion #${index + 1}`,
        { details: { count: t.acceptanceCriteria.length } },
      );
    }
    criterion.checked = checked;
  }, { action: checked ? 'criterion_checked' : 'criterion_unchecked' });
}

/** Append a free-text progress note. */
export async function addNote(
  accessor: DataAccessor,
  taskId: string,
  note: string,
  expectedVersion?: number,
): Promise<Task> {
  const { task } = await updateTask(accessor, { taskId, note, expectedVersion });
  return task;
}

/** Result of a promotion. */
export interface PromoteResult {
  task: Task;
  demoted: string | null;
}

/**
 * Make `taskId` the single P1 task. The previous P1 holder, if any, drops to
 * P2 in the same commit.
 */
export async function promote(
  accessor: DataAccessor,
  taskId: string,
  options: { expectedVersion?: number; actor?: string } = {},
): Promise<PromoteResult> {
  const result = await accessor.mutateTaskFile((data) => {
    const { task, partition } = requireTask(data, taskId);
    assertVersion(task, options.expectedVersion);
    if (partition === 'archive') {
      throw new BacklogError(ExitCode.INVALID_STATE, `Task ${taskId} is completed and cannot be promoted`);
    }
    if (task.priority === 'P1') {
      throw new BacklogError(ExitCode.NO_CHANGE, `Task ${taskId} is already P1`);
    }
    const now = new Date().toISOString();
    const holder = data.tasks.find((t) => t.priority === 'P1');
    if (holder) {
      holder.priority = 'P2';
      holder.progressLog.push({ timestamp: now, note: `Demoted to P2 (P1 moved to ${taskId})` });
      touch(holder, now);
    }
    task.priority = 'P1';
    task.progressLog.push({ timestamp: now, note: 'Promoted to P1' });
    touch(task, now);
    return { task: structuredClone(task), demoted: holder?.id ?? null };
  });

  getLogger('store').info({ taskId, demoted: result.demoted }, 'task promoted');
  await accessor.appendLog(
    auditEntry('task_promoted', taskId, { demoted: result.demoted }, auditSnapshot(result.task), options.actor),
  );
  return result;
}
