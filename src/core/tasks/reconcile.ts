/**
 * Reconciler: compare recorded acceptance criteria against externally
 * supplied evidence and classify the drift. Never writes.
 */

import type { Task } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import { requireTask } from '../../store/task-store.js';

/** Observed implementation state, keyed by criterion text. */
export type Evidence = Readonly<Record<string, boolean>>;

export type ReconcileClassification =
  | 'Consistent'
  | 'ShouldComplete'
  | 'ShouldReopen'
  | 'PartialUpdateNeeded';

/** One criterion whose recorded state disagrees with the evidence. */
export interface CriterionMismatch {
  index: number;
  text: string;
  recorded: boolean;
  observed: boolean;
}

export interface ReconcileReport {
  taskId: string;
  status: Task['status'];
  classification: ReconcileClassification;
  mismatches: CriterionMismatch[];
  /** Criteria the evidence says nothing about. */
  unknown: string[];
}

/**
 * Classify `task` against `evidence`.
 *
 * - Completed, and a criterion recorded as checked is observed false: ShouldReopen.
 * - Not completed, and every criterion is observed true: ShouldComplete.
 * - Any other recorded/observed mismatch: PartialUpdateNeeded.
 * - Otherwise Consistent. A task with no criteria is always Consistent.
 */
export function reconcile(task: Task, evidence: Evidence): ReconcileReport {
  const mismatches: CriterionMismatch[] = [];
  const unknown: string[] = [];
  let allObservedTrue = task.acceptanceCriteria.length > 0;

  task.acceptanceCriteria.forEach((criterion, index) => {
    const observed = Object.hasOwn(evidence, criterion.text) ? evidence[criterion.text] : undefined;
    if (observed === undefined) {
      unknown.push(criterion.text);
      allObservedTrue = false;
      return;
    }
    if (!observed) allObservedTrue = false;
    if (observed !== criterion.checked) {
      mismatches.push({ index, text: criterion.text, recorded: criterion.checked, observed });
    }
  });

  let classification: ReconcileClassification;
  if (task.status === 'completed' && mismatches.some((m) => m.recorded && !m.observed)) {
    classification = 'ShouldReopen';
  } else if (task.status !== 'completed' && allObservedTrue) {
    classification = 'ShouldComplete';
  } else if (mismatches.length > 0) {
    classification = 'PartialUpdateNeeded';
  } else {
    classification = 'Consistent';
  }

  return { taskId: task.id, status: task.status, classification, mismatches, unknown };
}

/** Load a task from either partition and reconcile it. */
export async function reconcileTask(
  accessor: DataAccessor,
  taskId: string,
  evidence: Evidence,
): Promise<ReconcileReport> {
  const data = await accessor.loadTaskFile();
  return reconcile(requireTask(data, taskId).task, evidence);
}
