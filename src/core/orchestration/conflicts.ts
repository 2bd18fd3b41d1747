/**
 * Conflict detection over resource footprints.
 *
 * Two tasks conflict iff their footprints share a resource id. On top of
 * that strict rule sits an optional module policy: resources are also
 * compared by their leading path segments, and a shared module either warns
 * or blocks depending on configuration.
 */

import type { Task, IntegrityWarning } from '../../types/task.js';
import type { ConflictConfig } from '../../types/config.js';
import { priorityRank } from '../../store/status-registry.js';
import { compareTaskIds } from '../../store/task-store.js';

/** The task fields conflict detection reads. */
export type FootprintTask = Pick<Task, 'id' | 'priority' | 'resourceFootprint'>;

/** Conflict policy; defaults to strict resource-level intersection. */
export type ConflictPolicy = ConflictConfig;

export const STRICT_POLICY: ConflictPolicy = { moduleOverlap: 'off', moduleDepth: 1 };

/** A conflicting pair of tasks. */
export interface ConflictPair {
  a: string;
  b: string;
  /** Shared resource ids (strict conflicts). */
  resources: string[];
  /** Shared modules (only under the module policy). */
  modules: string[];
}

/** Resources both tasks will mutate, sorted. */
export function sharedResources(a: FootprintTask, b: FootprintTask): string[] {
  const other = new Set(b.resourceFootprint);
  return [...new Set(a.resourceFootprint.filter((r) => other.has(r)))].sort();
}

/**
 * Module of a resource: its first `depth` directory segments. A resource at
 * the root (no directory part) has no module.
 */
export function moduleOf(resource: string, depth: number): string | null {
  const segments = resource.split(/[\\/]+/).filter((s) => s.length > 0 && s !== '.');
  const dirs = segments.slice(0, Math.min(depth, segments.length - 1));
  return dirs.length > 0 ? dirs.join('/') : null;
}

/** Modules touched by both tasks, sorted. */
export function sharedModules(a: FootprintTask, b: FootprintTask, depth: number): string[] {
  const modulesOf = (t: FootprintTask): Set<string> => new Set(
    t.resourceFootprint
      .map((r) => moduleOf(r, depth))
      .filter((m): m is string => m !== null),
  );
  const other = modulesOf(b);
  return [...modulesOf(a)].filter((m) => other.has(m)).sort();
}

function comparePair(a: FootprintTask, b: FootprintTask, policy: ConflictPolicy): ConflictPair | null {
  if (a.id === b.id) return null;
  const resources = sharedResources(a, b);
  const modules = policy.moduleOverlap === 'off' ? [] : sharedModules(a, b, policy.moduleDepth);
  if (resources.length === 0 && modules.length === 0) return null;
  const [first, second] = compareTaskIds(a.id, b.id) <= 0 ? [a.id, b.id] : [b.id, a.id];
  return { a: first, b: second, resources, modules };
}

/**
 * True iff the two tasks may not run together. Symmetric; a task never
 * conflicts with itself.
 */
export function conflicts(a: FootprintTask, b: FootprintTask, policy: ConflictPolicy = STRICT_POLICY): boolean {
  const pair = comparePair(a, b, policy);
  if (!pair) return false;
  return pair.resources.length > 0 || policy.moduleOverlap === 'block';
}

/** Every pair that shares a resource or (policy permitting) a module. */
export function findConflicts(tasks: readonly FootprintTask[], policy: ConflictPolicy = STRICT_POLICY): ConflictPair[] {
  const pairs: ConflictPair[] = [];
  for (let i = 0; i < tasks.length; i++) {
    for (let j = i + 1; j < tasks.length; j++) {
      const a = tasks[i];
      const b = tasks[j];
      if (!a || !b) continue;
      const pair = comparePair(a, b, policy);
      if (pair) pairs.push(pair);
    }
  }
  return pairs.sort((x, y) => compareTaskIds(x.a, y.a) || compareTaskIds(x.b, y.b));
}

/** True iff no two tasks in the set conflict. */
export function admissible(tasks: readonly FootprintTask[], policy: ConflictPolicy = STRICT_POLICY): boolean {
  if (policy.moduleOverlap !== 'block') {
    const owner = new Map<string, string>();
    for (const task of tasks) {
      for (const resource of new Set(task.resourceFootprint)) {
        const holder = owner.get(resource);
        if (holder !== undefined && holder !== task.id) return false;
        owner.set(resource, task.id);
      }
    }
    return true;
  }
  return findConflicts(tasks, policy).length === 0;
}

/**
 * Soft warnings for module-level overlap that does not block (policy 'warn').
 */
export function overlapWarnings(
  candidate: FootprintTask,
  others: readonly FootprintTask[],
  policy: ConflictPolicy,
): IntegrityWarning[] {
  if (policy.moduleOverlap !== 'warn') return [];
  const warnings: IntegrityWarning[] = [];
  for (const other of others) {
    const pair = comparePair(candidate, other, policy);
    if (!pair || pair.modules.length === 0) continue;
    warnings.push({
      code: 'W_MODULE_OVERLAP',
      taskId: candidate.id,
      message: `Task ${candidate.id} touches module(s) ${pair.modules.join(', ')} also touched by ${other.id}`,
      relatedIds: [other.id],
    });
  }
  return warnings;
}

/** Deterministic order used for grouping: priority tier, then id. */
export function compareByPriorityThenId(a: FootprintTask, b: FootprintTask): number {
  return priorityRank(a.priority) - priorityRank(b.priority) || compareTaskIds(a.id, b.id);
}

/**
 * Greedily split tasks into groups that are each admissible. Tasks are
 * visited in priority-then-id order and placed in the first group they do
 * not conflict with. Describes what may run together; executes nothing.
 */
export function partition<T extends FootprintTask>(
  tasks: readonly T[],
  policy: ConflictPolicy = STRICT_POLICY,
): T[][] {
  const groups: T[][] = [];
  for (const task of [...tasks].sort(compareByPriorityThenId)) {
    const group = groups.find((g) => g.every((member) => !conflicts(task, member, policy)));
    if (group) {
      group.push(task);
    } else {
      groups.push([task]);
    }
  }
  return groups;
}
