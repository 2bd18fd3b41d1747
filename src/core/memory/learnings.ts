/**
 * Learning ledger.
 *
 * Append-only, task-linked record of discovered facts. Entries are never
 * edited or removed; ids (L001, L002, ...) are assigned under the ledger lock
 * so they stay monotonic across concurrent writers.
 *
 * Storage: JSONL at .backlog/learnings.jsonl
 *
 * The ledger is the source of truth for task links. A task's `learnings` set
 * mirrors it; an entry whose link never reached tasks.json is reported by
 * unlinkedLearnings() and linked on the next learning for that task.
 */

import { BacklogError, isBacklogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { LearningEntry, AppendLearningParams } from '../../types/learning.js';
import type { TaskFile, IntegrityWarning } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import { requireTask, touch, taskIndex } from '../../store/task-store.js';

/** Parameters for searching learnings. */
export interface SearchLearningParams {
  query?: string;
  taskId?: string;
  limit?: number;
}

/** Ledger statistics. */
export interface LearningStats {
  total: number;
  general: number;
  byTask: Record<string, number>;
  latest: string | null;
}

/** Numeric part of a learning id (L012 -> 12). */
function learningNumber(id: string): number {
  return /^L\d+$/.test(id) ? parseInt(id.slice(1), 10) : 0;
}

/** Next id after the highest already in the ledger. */
export function nextLearningId(existing: readonly LearningEntry[]): string {
  const max = existing.reduce((m, e) => Math.max(m, learningNumber(e.id)), 0);
  return `L${String(max + 1).padStart(3, '0')}`;
}

/**
 * Append a learning. With a taskId the entry id is also added to that task's
 * learnings set; an unknown task fails with NotFound before anything is
 * written.
 */
export async function appendLearning(
  accessor: DataAccessor,
  params: AppendLearningParams,
): Promise<LearningEntry> {
  const context = params.context.trim();
  const insight = params.insight.trim();
  if (!insight) throw new BacklogError(ExitCode.INVALID_INPUT, 'Insight text is required');
  if (!context) throw new BacklogError(ExitCode.INVALID_INPUT, 'Context is required');

  const build = (existing: LearningEntry[]): LearningEntry => ({
    id: nextLearningId(existing),
    createdAt: new Date().toISOString(),
    taskId: params.taskId ?? null,
    context,
    insight,
    appliedAction: params.appliedAction?.trim() ?? '',
  });

  const taskId = params.taskId;
  if (!taskId) {
    const entry = await accessor.appendLearning(build);
    getLogger('ledger').info({ learningId: entry.id }, 'general learning recorded');
    return entry;
  }

  const pending: { entry: LearningEntry | null } = { entry: null };
  try {
    // Ledger lock nests inside the task lock, never the other way around
    const entry = await accessor.mutateTaskFile(async (data) => {
      const { task } = requireTask(data, taskId);
      const missed = (await accessor.loadLearnings())
        .filter((e) => e.taskId === taskId && !task.learnings.includes(e.id))
        .map((e) => e.id);
      const appended = await accessor.appendLearning(build);
      pending.entry = appended;
      task.learnings.push(...missed, appended.id);
      touch(task, appended.createdAt);
      return appended;
    });
    getLogger('ledger').info({ learningId: entry.id, taskId }, 'learning recorded');
    return entry;
  } catch (err) {
    const orphan = pending.entry;
    if (!orphan) throw err;
    const message = err instanceof Error ? err.message : String(err);
    getLogger('ledger').warn(
      { code: 'W_UNLINKED_LEARNING', learningId: orphan.id, taskId },
      `Learning ${orphan.id} was recorded but not linked to ${taskId}`,
    );
    throw new BacklogError(
      isBacklogError(err) ? err.code : ExitCode.FILE_ERROR,
      `Learning ${orphan.id} was recorded but linking it to ${taskId} failed: ${message}`,
      {
        details: { unlinkedLearning: orphan.id, taskId },
        fix: `The link is restored by the next learning recorded for ${taskId}`,
        cause: err,
      },
    );
  }
}

/**
 * Ledger entries whose task exists but does not list them. A task that no
 * longer exists is not reported here.
 */
export function unlinkedLearnings(data: TaskFile, entries: readonly LearningEntry[]): IntegrityWarning[] {
  const index = taskIndex(data);
  const warnings: IntegrityWarning[] = [];
  for (const e of entries) {
    if (e.taskId === null) continue;
    const task = index.get(e.taskId);
    if (!task || task.learnings.includes(e.id)) continue;
    warnings.push({
      code: 'W_UNLINKED_LEARNING',
      taskId: e.taskId,
      message: `Learning ${e.id} names ${e.taskId} but is missing from its learnings`,
      relatedIds: [e.id],
    });
  }
  return warnings;
}

/** Load both stores and report unlinked entries. */
export async function learningLinkWarnings(accessor: DataAccessor): Promise<IntegrityWarning[]> {
  const [data, entries] = await Promise.all([accessor.loadTaskFile(), accessor.loadLearnings()]);
  return unlinkedLearnings(data, entries);
}

/** Every entry, in append order. */
export async function readLearnings(accessor: DataAccessor): Promise<LearningEntry[]> {
  return accessor.loadLearnings();
}

/** Entries linked to `taskId`, or the general entries when `taskId` is null. */
export async function learningsByTask(accessor: DataAccessor, taskId: string | null): Promise<LearningEntry[]> {
  const entries = await accessor.loadLearnings();
  return entries.filter((e) => e.taskId === taskId);
}

/** Case-insensitive substring search over context, insight and applied action. */
export async function searchLearnings(
  accessor: DataAccessor,
  params: SearchLearningParams = {},
): Promise<LearningEntry[]> {
  let entries = await accessor.loadLearnings();

  if (params.taskId !== undefined) {
    entries = entries.filter((e) => e.taskId === params.taskId);
  }
  if (params.query?.trim()) {
    const q = params.query.trim().toLowerCase();
    entries = entries.filter((e) =>
      e.insight.toLowerCase().includes(q)
      || e.context.toLowerCase().includes(q)
      || e.appliedAction.toLowerCase().includes(q),
    );
  }
  if (params.limit !== undefined && params.limit > 0) {
    entries = entries.slice(-params.limit);
  }
  return entries;
}

/** Ledger statistics. */
export async function learningStats(accessor: DataAccessor): Promise<LearningStats> {
  const entries = await accessor.loadLearnings();
  const byTask: Record<string, number> = {};
  let general = 0;
  for (const e of entries) {
    if (e.taskId === null) {
      general += 1;
    } else {
      byTask[e.taskId] = (byTask[e.taskId] ?? 0) + 1;
    }
  }
  return {
    total: entries.length,
    general,
    byTask,
    latest: entries[entries.length - 1]?.id ?? null,
  };
}
