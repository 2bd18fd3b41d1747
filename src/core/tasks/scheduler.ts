/**
 * Priority scheduler: deterministic "what next" ranking over eligible
 * pending tasks.
 *
 * Comparison chain, each a tie-break on the previous:
 *   1. priority tier (P1 first)
 *   2. leverage: pending tasks this one unblocks (more first)
 *   3. continuity: shares category with the most recently completed task
 *   4. older createdAt first
 *   5. lower id
 *
 * The last key is unique per task, so the order is total and rank() is
 * reproducible on unchanged input.
 */

import type { Task, TaskFile } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import { priorityRank } from '../../store/status-registry.js';
import { allTasks, taskIndex, compareTaskIds } from '../../store/task-store.js';
import { eligible, unblocksOf } from './dependency-graph.js';

/** A ranked candidate with the inputs that placed it. */
export interface RankedTask {
  task: Task;
  position: number;
  leverage: number;
  continuity: boolean;
  reasons: string[];
}

const PENDING: ReadonlySet<Task['status']> = new Set(['pending']);

/** The completed task with the latest completedAt (id breaks ties). */
export function mostRecentlyCompleted(tasks: Iterable<Task>): Task | null {
  let latest: Task | null = null;
  for (const t of tasks) {
    if (t.status !== 'completed' || t.completedAt === null) continue;
    if (
      !latest
      || latest.completedAt === null
      || t.completedAt > latest.completedAt
      || (t.completedAt === latest.completedAt && compareTaskIds(t.id, latest.id) > 0)
    ) {
      latest = t;
    }
  }
  return latest;
}

/**
 * Rank `candidates` against the full task population (both partitions),
 * which supplies the leverage and continuity inputs. Candidates are not
 * filtered here; see eligibleCandidates().
 */
export function rankTasks(candidates: readonly Task[], population: readonly Task[]): RankedTask[] {
  const lastDone = mostRecentlyCompleted(population);
  const anchor = lastDone?.category ?? null;

  const scored = candidates.map((task) => {
    const leverage = unblocksOf(task.id, population, PENDING).size;
    const continuity = anchor !== null && task.category === anchor;
    return { task, leverage, continuity };
  });

  scored.sort((a, b) =>
    priorityRank(a.task.priority) - priorityRank(b.task.priority)
    || b.leverage - a.leverage
    || Number(b.continuity) - Number(a.continuity)
    || (a.task.createdAt < b.task.createdAt ? -1 : a.task.createdAt > b.task.createdAt ? 1 : 0)
    || compareTaskIds(a.task.id, b.task.id),
  );

  return scored.map((s, i) => {
    const reasons = [`priority ${s.task.priority}`];
    if (s.leverage > 0) reasons.push(`unblocks ${s.leverage} pending task${s.leverage === 1 ? '' : 's'}`);
    if (s.continuity && lastDone) reasons.push(`continues ${lastDone.category ?? ''} (after ${lastDone.id})`);
    return { ...s, position: i + 1, reasons };
  });
}

/** Pending tasks in the active partition whose blockers are all completed. */
export function eligibleCandidates(data: TaskFile): Task[] {
  const lookup = taskIndex(data);
  return data.tasks.filter((t) => t.status === 'pending' && eligible(t, lookup));
}

/** Rank every eligible pending task in the stored backlog. */
export async function rank(accessor: DataAccessor, limit?: number): Promise<RankedTask[]> {
  const data = await accessor.loadTaskFile();
  const ranked = rankTasks(eligibleCandidates(data), allTasks(data));
  return limit !== undefined ? ranked.slice(0, limit) : ranked;
}

/** The single best next task, or null when nothing is eligible. */
export async function next(accessor: DataAccessor): Promise<RankedTask | null> {
  const [first] = await rank(accessor, 1);
  return first ?? null;
}
