/**
 * Dependency graph queries over blocking edges.
 *
 * An edge `A.blockedBy ∋ B` means B must be completed before A may start.
 * Everything here is pure: callers pass the task lookup they hold (usually a
 * snapshot, or the draft inside a locked mutation).
 */

import type { Task, IntegrityWarning } from '../../types/task.js';
import { compareTaskIds } from '../../store/task-store.js';

/** Task lookup by id across both partitions. */
export type TaskLookup = ReadonlyMap<string, Task>;

/** Result of an eligibility check. */
export interface EligibilityResult {
  eligible: boolean;
  /** Blockers that exist but are not yet completed. */
  unresolved: string[];
  /** Blockers that reference no task at all (permanent blockers). */
  dangling: string[];
}

/** Evaluate every blocker of a task. */
export function checkEligibility(task: Task, lookup: TaskLookup): EligibilityResult {
  const unresolved: string[] = [];
  const dangling: string[] = [];
  for (const blockerId of task.blockedBy) {
    const blocker = lookup.get(blockerId);
    if (!blocker) {
      dangling.push(blockerId);
    } else if (blocker.status !== 'completed') {
      unresolved.push(blockerId);
    }
  }
  return { eligible: unresolved.length === 0 && dangling.length === 0, unresolved, dangling };
}

/**
 * True iff every blocker resolves to a completed task. A missing blocker id
 * never resolves, so the task stays ineligible.
 */
export function eligible(task: Task, lookup: TaskLookup): boolean {
  return checkEligibility(task, lookup).eligible;
}

/** Data-integrity warnings for a task's dangling blocker references. */
export function danglingWarnings(task: Task, lookup: TaskLookup): IntegrityWarning[] {
  return checkEligibility(task, lookup).dangling.map((blockerId) => ({
    code: 'W_DANGLING_BLOCKER' as const,
    taskId: task.id,
    message: `Task ${task.id} is blocked by ${blockerId}, which does not exist`,
    relatedIds: [blockerId],
  }));
}

/**
 * Find a path from `fromId` to `targetId` following blockedBy edges.
 * Iterative DFS with a visited set: O(V + E). Returns the path including both
 * ends, or an empty array when unreachable.
 */
export function findPath(fromId: string, targetId: string, lookup: TaskLookup): string[] {
  const visited = new Set<string>([fromId]);
  const parent = new Map<string, string>();
  const stack: string[] = [fromId];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined) break;
    if (id === targetId) {
      const path = [id];
      let cursor = parent.get(id);
      while (cursor !== undefined) {
        path.unshift(cursor);
        cursor = parent.get(cursor);
      }
      return path;
    }
    for (const next of lookup.get(id)?.blockedBy ?? []) {
      if (visited.has(next)) continue;
      visited.add(next);
      parent.set(next, id);
      stack.push(next);
    }
  }
  return [];
}

/**
 * The cycle that adding `taskId.blockedBy ∋ blockerId` would close, or an
 * empty array if the edge is safe. A self-edge is the one-node cycle.
 */
export function cycleForNewEdge(taskId: string, blockerId: string, lookup: TaskLookup): string[] {
  if (taskId === blockerId) return [taskId, taskId];
  const path = findPath(blockerId, taskId, lookup);
  return path.length > 0 ? [taskId, ...path] : [];
}

/**
 * Detect any cycle in the whole graph (for data edited outside the engine).
 * Three-colour DFS; returns the first cycle found or an empty array.
 */
export function detectCycle(lookup: TaskLookup): string[] {
  const WHITE = 0, GREY = 1, BLACK = 2;
  const colour = new Map<string, number>();
  const ids = [...lookup.keys()].sort(compareTaskIds);

  for (const root of ids) {
    if ((colour.get(root) ?? WHITE) !== WHITE) continue;
    const path: string[] = [];
    const stack: Array<{ id: string; next: number }> = [{ id: root, next: 0 }];
    colour.set(root, GREY);
    path.push(root);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;
      const edges = lookup.get(frame.id)?.blockedBy ?? [];
      const nextId = edges[frame.next];
      if (nextId === undefined) {
        colour.set(frame.id, BLACK);
        stack.pop();
        path.pop();
        continue;
      }
      frame.next += 1;
      if (!lookup.has(nextId)) continue;
      const c = colour.get(nextId) ?? WHITE;
      if (c === GREY) {
        return [...path.slice(path.indexOf(nextId)), nextId];
      }
      if (c === WHITE) {
        colour.set(nextId, GREY);
        path.push(nextId);
        stack.push({ id: nextId, next: 0 });
      }
    }
  }
  return [];
}

/**
 * Reverse-edge query: ids of tasks whose blockedBy contains `taskId`,
 * optionally restricted to tasks in the given statuses.
 */
export function unblocksOf(
  taskId: string,
  tasks: Iterable<Task>,
  statuses?: ReadonlySet<Task['status']>,
): Set<string> {
  const result = new Set<string>();
  for (const t of tasks) {
    if (t.id === taskId) continue;
    if (statuses && !statuses.has(t.status)) continue;
    if (t.blockedBy.includes(taskId)) result.add(t.id);
  }
  return result;
}

/** Unresolved direct blockers of a task (missing ids included). */
export function blockersOf(task: Task, lookup: TaskLookup): string[] {
  const { unresolved, dangling } = checkEligibility(task, lookup);
  return [...unresolved, ...dangling].sort(compareTaskIds);
}

/**
 * Walk upstream through the blocking chain and return every non-completed
 * blocker (deduplicated, id order).
 */
export function transitiveBlockers(taskId: string, lookup: TaskLookup): string[] {
  const blockers = new Set<string>();
  const visited = new Set<string>([taskId]);
  const stack = [...(lookup.get(taskId)?.blockedBy ?? [])];

  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || visited.has(id)) continue;
    visited.add(id);
    const dep = lookup.get(id);
    if (dep?.status === 'completed') continue;
    blockers.add(id);
    stack.push(...(dep?.blockedBy ?? []));
  }
  return [...blockers].sort(compareTaskIds);
}

/** Result of validating the whole graph. */
export interface GraphValidation {
  valid: boolean;
  cycle: string[];
  warnings: IntegrityWarning[];
}

/** Report dangling references and any cycle present in the stored graph. */
export function validateGraph(lookup: TaskLookup): GraphValidation {
  const warnings: IntegrityWarning[] = [];
  for (const task of lookup.values()) {
    warnings.push(...danglingWarnings(task, lookup));
  }
  warnings.sort((a, b) => compareTaskIds(a.taskId, b.taskId));
  const cycle = detectCycle(lookup);
  return { valid: cycle.length === 0 && warnings.length === 0, cycle, warnings };
}
