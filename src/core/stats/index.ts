/**
 * Index summary: a derived, read-only projection of the backlog.
 *
 * Always recomputed from the task collection on read; there is no stored
 * summary to drift out of date.
 */

import type { Task, TaskFile, TaskStatus, IntegrityWarning } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import { TASK_STATUSES } from '../../store/status-registry.js';
import { allTasks, compareTaskIds } from '../../store/task-store.js';
import { DEFAULTS } from '../config.js';

/** A task that has stayed in progress past the configured age. */
export interface StaleTask {
  id: string;
  title: string;
  startedAt: string;
  ageMinutes: number;
}

/** Derived summary of the backlog. */
export interface IndexSummary {
  counts: Record<TaskStatus, number>;
  total: number;
  /** In-progress task ids, numeric order. */
  activeTaskIds: string[];
  openSessionId: string | null;
  stale: StaleTask[];
  staleAfterMinutes: number;
  generation: number;
}

function emptyCounts(): Record<TaskStatus, number> {
  return { pending: 0, in_progress: 0, blocked: 0, completed: 0 };
}

/** Count tasks per status by scanning both partitions. */
export function countByStatus(tasks: Iterable<Task>): Record<TaskStatus, number> {
  const counts = emptyCounts();
  for (const t of tasks) counts[t.status] += 1;
  return counts;
}

/**
 * In-progress tasks whose startedAt is more than `thresholdMinutes` before
 * `now`. Observability only; nothing is transitioned.
 */
export function staleTasks(tasks: Iterable<Task>, now: Date, thresholdMinutes: number): StaleTask[] {
  const stale: StaleTask[] = [];
  for (const t of tasks) {
    if (t.status !== 'in_progress' || t.startedAt === null) continue;
    const ageMinutes = Math.floor((now.getTime() - Date.parse(t.startedAt)) / 60_000);
    if (ageMinutes > thresholdMinutes) {
      stale.push({ id: t.id, title: t.title, startedAt: t.startedAt, ageMinutes });
    }
  }
  return stale.sort((a, b) => compareTaskIds(a.id, b.id));
}

/** Warnings for stale tasks, in the shape other soft warnings use. */
export function staleWarnings(stale: readonly StaleTask[], thresholdMinutes: number): IntegrityWarning[] {
  return stale.map((s) => ({
    code: 'W_STALE_TASK' as const,
    taskId: s.id,
    message: `Task ${s.id} has been in progress for ${s.ageMinutes} minutes (threshold ${thresholdMinutes})`,
  }));
}

/** Compute the summary from a document. */
export function computeIndexSummary(
  data: TaskFile,
  now: Date = new Date(),
  staleAfterMinutes = DEFAULTS.session.staleAfterMinutes,
): IndexSummary {
  const tasks = allTasks(data);
  const counts = countByStatus(tasks);
  return {
    counts,
    total: TASK_STATUSES.reduce((sum, s) => sum + counts[s], 0),
    activeTaskIds: tasks
      .filter((t) => t.status === 'in_progress')
      .map((t) => t.id)
      .sort(compareTaskIds),
    openSessionId: data.sessions.find((s) => s.status === 'open')?.id ?? null,
    stale: staleTasks(tasks, now, staleAfterMinutes),
    staleAfterMinutes,
    generation: data._meta.generation,
  };
}

/** Load the backlog and compute its summary. */
export async function getIndexSummary(
  accessor: DataAccessor,
  options: { now?: Date; staleAfterMinutes?: number } = {},
): Promise<IndexSummary> {
  const data = await accessor.loadTaskFile();
  return computeIndexSummary(data, options.now, options.staleAfterMinutes);
}
