/**
 * Status registry: single source of truth for status enums.
 *
 * No other file may define status arrays as constants; types, schemas and
 * the state machine all derive from these.
 */

// === WORKFLOW NAMESPACE ===

export const TASK_STATUSES = [
  'pending', 'in_progress', 'blocked', 'completed',
] as const;

export const SESSION_STATUSES = [
  'open', 'closed',
] as const;

export const TASK_PRIORITIES = [
  'P1', 'P2', 'P3', 'P4',
] as const;

// === DERIVED TYPES ===

export type TaskStatus = typeof TASK_STATUSES[number];
export type SessionStatus = typeof SESSION_STATUSES[number];
export type TaskPriority = typeof TASK_PRIORITIES[number];

// === PARTITIONS ===

/** Statuses held by the archive partition. */
export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> =
  new Set(['completed']);

// === HELPERS ===

export function isValidStatus(value: string): value is TaskStatus {
  return TASK_STATUSES.some((s) => s === value);
}

export function isValidPriority(value: string): value is TaskPriority {
  return TASK_PRIORITIES.some((p) => p === value);
}

/** Numeric rank of a priority tier: P1 = 1 ... P4 = 4 (lower ranks first). */
export function priorityRank(priority: TaskPriority): number {
  return TASK_PRIORITIES.indexOf(priority) + 1;
}
