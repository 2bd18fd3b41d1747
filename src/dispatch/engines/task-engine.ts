/**
 * Task Engine: thin wrapper layer.
 *
 * Delegates all business logic to src/core/tasks/ and the store. Each
 * function catches errors from core and wraps them into EngineResult.
 */

import type { Task, TaskFile, Partition } from '../../types/task.js';
import {
  TaskStore,
  requireTask,
  type CreateTaskInput,
  type CreateTaskResult,
  type TaskFilter,
} from '../../store/task-store.js';
import {
  transition,
  reopen,
  type TransitionContext,
  type TransitionResult,
} from '../../core/tasks/state-machine.js';
import {
  updateTask,
  setCriterion,
  promote,
  type UpdateTaskOptions,
  type UpdateTaskResult,
  type PromoteResult,
} from '../../core/tasks/update.js';
import {
  addBlocker,
  removeBlocker,
  showDependencies,
  checkGraph,
  type BlockerResult,
  type DependencyView,
} from '../../core/tasks/deps.js';
import type { GraphValidation } from '../../core/tasks/dependency-graph.js';
import { rank, next, eligibleCandidates, type RankedTask } from '../../core/tasks/scheduler.js';
import { reconcileTask, type Evidence, type ReconcileReport } from '../../core/tasks/reconcile.js';
import { findConflicts, partition, type ConflictPair } from '../../core/orchestration/conflicts.js';
import { getIndexSummary, staleWarnings, type IndexSummary } from '../../core/stats/index.js';
import { attempt, type EngineResult } from './_error.js';
import { withBacklog } from './_context.js';

export type { EngineResult };

/** Create a task. Duplicate titles and dangling blockers come back as warnings. */
export async function taskAdd(projectRoot: string, input: CreateTaskInput): Promise<EngineResult<CreateTaskResult>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor }) => new TaskStore(accessor).create(input)),
    (r) => r.warnings,
  );
}

/** A task with the partition holding it and its dependency view. */
export interface TaskDetail {
  task: Task;
  partition: Partition;
  dependencies: DependencyView;
}

/** Show one task from either partition. */
export async function taskShow(projectRoot: string, taskId: string): Promise<EngineResult<TaskDetail>> {
  return attempt(
    () => withBacklog(projectRoot, async ({ accessor }) => {
      const located = await new TaskStore(accessor).locate(taskId);
      return { ...located, dependencies: await showDependencies(accessor, taskId) };
    }),
    (d) => d.dependencies.warnings,
  );
}

/** List tasks matching a filter. */
export async function taskList(projectRoot: string, filter: TaskFilter = {}): Promise<EngineResult<Task[]>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => new TaskStore(accessor).list(filter)));
}

/** Update editable fields. */
export async function taskUpdate(projectRoot: string, options: UpdateTaskOptions): Promise<EngineResult<UpdateTaskResult>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => updateTask(accessor, options)));
}

/** Check or uncheck one acceptance criterion (0-based index). */
export async function taskCheck(
  projectRoot: string,
  taskId: string,
  index: number,
  checked: boolean,
  expectedVersion?: number,
): Promise<EngineResult<Task>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) =>
    setCriterion(accessor, taskId, index, checked, expectedVersion),
  ));
}

/** Move P1 to a task, demoting the previous holder. */
export async function taskPromote(projectRoot: string, taskId: string): Promise<EngineResult<PromoteResult>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => promote(accessor, taskId)));
}

/** Run a state machine transition with the configured conflict policy. */
export async function taskTransition(
  projectRoot: string,
  taskId: string,
  target: Task['status'],
  context: TransitionContext = {},
): Promise<EngineResult<TransitionResult>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor, config }) =>
      transition(accessor, taskId, target, context, { conflictPolicy: config.conflicts }),
    ),
    (r) => r.warnings,
  );
}

export function taskStart(projectRoot: string, taskId: string, context?: TransitionContext) {
  return taskTransition(projectRoot, taskId, 'in_progress', context);
}

export function taskBlock(projectRoot: string, taskId: string, context?: TransitionContext) {
  return taskTransition(projectRoot, taskId, 'blocked', context);
}

export function taskUnblock(projectRoot: string, taskId: string, context?: TransitionContext) {
  return taskTransition(projectRoot, taskId, 'pending', context);
}

export function taskComplete(projectRoot: string, taskId: string, context?: TransitionContext) {
  return taskTransition(projectRoot, taskId, 'completed', context);
}

/** Reopen a completed task with a recorded reason. */
export async function taskReopen(
  projectRoot: string,
  taskId: string,
  reason: string,
  expectedVersion?: number,
): Promise<EngineResult<Task>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) =>
    reopen(accessor, taskId, reason, { expectedVersion }),
  ));
}

/** Archive a completed task (no-op if already archived). */
export async function taskArchive(projectRoot: string, taskId: string): Promise<EngineResult<Task>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => new TaskStore(accessor).archive(taskId)));
}

// === DEPENDENCIES ===

export async function depsAdd(projectRoot: string, taskId: string, blockerId: string): Promise<EngineResult<BlockerResult>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => addBlocker(accessor, taskId, blockerId)));
}

export async function depsRemove(projectRoot: string, taskId: string, blockerId: string): Promise<EngineResult<BlockerResult>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => removeBlocker(accessor, taskId, blockerId)));
}

export async function depsShow(projectRoot: string, taskId: string): Promise<EngineResult<DependencyView>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor }) => showDependencies(accessor, taskId)),
    (v) => v.warnings,
  );
}

export async function depsValidate(projectRoot: string): Promise<EngineResult<GraphValidation>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor }) => checkGraph(accessor)),
    (v) => v.warnings,
  );
}

// === SCHEDULING ===

/** Ranked eligible pending tasks. */
export async function taskRank(projectRoot: string, limit?: number): Promise<EngineResult<RankedTask[]>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => rank(accessor, limit)));
}

/** The best next task; null when nothing is eligible. */
export async function taskNext(projectRoot: string): Promise<EngineResult<RankedTask | null>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => next(accessor)));
}

/** Conflicting pairs and admissible groups. */
export interface ConflictReport {
  taskIds: string[];
  pairs: ConflictPair[];
  groups: string[][];
}

function pickTasks(data: TaskFile, taskIds: string[] | undefined): Task[] {
  if (!taskIds || taskIds.length === 0) return eligibleCandidates(data);
  return taskIds.map((id) => requireTask(data, id).task);
}

/**
 * Conflict analysis over the given tasks, or over every eligible pending
 * task when none are given.
 */
export async function taskConflicts(projectRoot: string, taskIds?: string[]): Promise<EngineResult<ConflictReport>> {
  return attempt(() => withBacklog(projectRoot, async ({ accessor, config }) => {
    const tasks = pickTasks(await accessor.loadTaskFile(), taskIds);
    return {
      taskIds: tasks.map((t) => t.id),
      pairs: findConflicts(tasks, config.conflicts),
      groups: partition(tasks, config.conflicts).map((g) => g.map((t) => t.id)),
    };
  }));
}

/** Classify criteria drift against externally supplied evidence. */
export async function taskReconcile(
  projectRoot: string,
  taskId: string,
  evidence: Evidence,
): Promise<EngineResult<ReconcileReport>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => reconcileTask(accessor, taskId, evidence)));
}

/** Derived index summary; stale tasks are also surfaced as warnings. */
export async function taskStatus(projectRoot: string): Promise<EngineResult<IndexSummary>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor, config }) =>
      getIndexSummary(accessor, { staleAfterMinutes: config.session.staleAfterMinutes }),
    ),
    (s) => staleWarnings(s.stale, s.staleAfterMinutes),
  );
}
