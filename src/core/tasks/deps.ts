/**
 * Blocking-edge mutations: add and remove blockers with write-time cycle
 * checks.
 */

import { BacklogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task, IntegrityWarning } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import {
  requireTask,
  taskIndex,
  assertVersion,
  touch,
  auditEntry,
  compareTaskIds,
} from '../../store/task-store.js';
import {
  cycleForNewEdge,
  blockersOf,
  transitiveBlockers,
  unblocksOf,
  validateGraph,
  checkEligibility,
  danglingWarnings,
  type GraphValidation,
} from './dependency-graph.js';

/** Options for blocker mutations. */
export interface BlockerOptions {
  expectedVersion?: number;
  actor?: string;
}

/** Result of a blocker mutation. */
export interface BlockerResult {
  task: Task;
  changed: boolean;
}

/**
 * Add `blockerId` to `taskId.blockedBy`. Rejected with CycleDetected when
 * the blocker can already reach the task; the graph is left unchanged.
 */
export async function addBlocker(
  accessor: DataAccessor,
  taskId: string,
  blockerId: string,
  options: BlockerOptions = {},
): Promise<BlockerResult> {
  const result = await accessor.mutateTaskFile((data) => {
    const { task, partition } = requireTask(data, taskId);
    assertVersion(task, options.expectedVersion);
    if (partition === 'archive') {
      throw new BacklogError(
        ExitCode.INVALID_STATE,
        `Task ${taskId} is completed; blockers can only be added to active tasks`,
      );
    }
    requireTask(data, blockerId);

    if (task.blockedBy.includes(blockerId)) {
      return { task: structuredClone(task), changed: false };
    }

    const cycle = cycleForNewEdge(taskId, blockerId, taskIndex(data));
    if (cycle.length > 0) {
      throw new BacklogError(
        ExitCode.CIRCULAR_REFERENCE,
        `Adding ${blockerId} as a blocker of ${taskId} would create a cycle: ${cycle.join(' -> ')}`,
        { details: { cycle } },
      );
    }

    const now = new Date().toISOString();
    task.blockedBy.push(blockerId);
    task.progressLog.push({ timestamp: now, note: `Blocked by ${blockerId}` });
    touch(task, now);
    return { task: structuredClone(task), changed: true };
  });

  if (result.changed) {
    getLogger('graph').info({ taskId, blockerId }, 'blocker added');
    await accessor.appendLog(
      auditEntry('blocker_added', taskId, null, { blockerId }, options.actor),
    );
  }
  return result;
}

/** Remove `blockerId` from `taskId.blockedBy`. Missing edges are a no-op. */
export async function removeBlocker(
  accessor: DataAccessor,
  taskId: string,
  blockerId: string,
  options: BlockerOptions = {},
): Promise<BlockerResult> {
  const result = await accessor.mutateTaskFile((data) => {
    const { task, partition } = requireTask(data, taskId);
    assertVersion(task, options.expectedVersion);
    if (partition === 'archive') {
      throw new BacklogError(
        ExitCode.INVALID_STATE,
        `Task ${taskId} is completed; its blockers are frozen`,
      );
    }
    if (!task.blockedBy.includes(blockerId)) {
      return { task: structuredClone(task), changed: false };
    }
    const now = new Date().toISOString();
    task.blockedBy = task.blockedBy.filter((id) => id !== blockerId);
    task.progressLog.push({ timestamp: now, note: `No longer blocked by ${blockerId}` });
    touch(task, now);
    return { task: structuredClone(task), changed: true };
  });

  if (result.changed) {
    await accessor.appendLog(
      auditEntry('blocker_removed', taskId, { blockerId }, null, options.actor),
    );
  }
  return result;
}

/** Dependency view of a single task. */
export interface DependencyView {
  taskId: string;
  eligible: boolean;
  blockedBy: string[];
  unresolved: string[];
  transitive: string[];
  unblocks: string[];
  warnings: IntegrityWarning[];
}

/** Show both directions of a task's blocking edges. */
export async function showDependencies(accessor: DataAccessor, taskId: string): Promise<DependencyView> {
  const data = await accessor.loadTaskFile();
  const { task } = requireTask(data, taskId);
  const lookup = taskIndex(data);
  const check = checkEligibility(task, lookup);
  return {
    taskId,
    eligible: check.eligible,
    blockedBy: [...task.blockedBy],
    unresolved: blockersOf(task, lookup),
    transitive: transitiveBlockers(taskId, lookup),
    unblocks: [...unblocksOf(taskId, lookup.values())].sort(compareTaskIds),
    warnings: danglingWarnings(task, lookup),
  };
}

/** Validate the stored graph (dangling references, cycles). */
export async function checkGraph(accessor: DataAccessor): Promise<GraphValidation> {
  const data = await accessor.loadTaskFile();
  return validateGraph(taskIndex(data));
}
