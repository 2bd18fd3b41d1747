/**
 * Task state machine.
 *
 * Legal edges:
 *   pending     -> in_progress | blocked
 *   in_progress -> blocked | completed
 *   blocked     -> pending
 *   completed   -> (terminal; see reopen())
 *
 * Admission to in_progress is one test-and-set: the dependency check, the
 * single-active / parallel-session check and the footprint check all run on
 * the locked draft that is then committed, so two callers can never both
 * observe a free slot and both take it.
 */

import { BacklogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task, TaskFile, TaskStatus, IntegrityWarning } from '../../types/task.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import {
  requireTask,
  taskIndex,
  assertVersion,
  touch,
  moveToArchive,
  moveToActive,
  auditEntry,
  auditSnapshot,
} from '../../store/task-store.js';
import { checkEligibility, danglingWarnings } from './dependency-graph.js';
import {
  STRICT_POLICY,
  sharedResources,
  conflicts,
  overlapWarnings,
  type ConflictPolicy,
} from '../orchestration/conflicts.js';

/** Legal status edges. */
export const LEGAL_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['in_progress', 'blocked'],
  in_progress: ['blocked', 'completed'],
  blocked: ['pending'],
  completed: [],
};

/** Check a single edge against the legal-edge table. */
export function isLegalTransition(from: TaskStatus, to: TaskStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

/** Caller-supplied context for a transition. */
export interface TransitionContext {
  /** Free-text note appended to the progress log entry. */
  note?: string;
  /** Force completion with unchecked acceptance criteria. */
  override?: boolean;
  /** Version the caller last read; mismatch fails with Conflict. */
  expectedVersion?: number;
  /** If given, the task must belong to this open parallel session. */
  sessionId?: string;
  actor?: string;
}

/** Options that come from configuration rather than the caller. */
export interface TransitionOptions {
  conflictPolicy?: ConflictPolicy;
}

/** Result of a committed transition. */
export interface TransitionResult {
  task: Task;
  from: TaskStatus;
  warnings: IntegrityWarning[];
}

/** The open parallel session, if any. */
export function openSessionOf(data: TaskFile): TaskFile['sessions'][number] | null {
  return data.sessions.find((s) => s.status === 'open') ?? null;
}

/**
 * Run the admission checks for `task` against the draft. Throws the first
 * failing check; returns soft warnings otherwise.
 */
function assertAdmissible(
  data: TaskFile,
  task: Task,
  context: TransitionContext,
  policy: ConflictPolicy,
): IntegrityWarning[] {
  const lookup = taskIndex(data);
  const warnings = danglingWarnings(task, lookup);
  for (const w of warnings) {
    getLogger('state').warn({ code: w.code, taskId: w.taskId, relatedIds: w.relatedIds }, w.message);
  }

  const eligibility = checkEligibility(task, lookup);
  if (!eligibility.eligible) {
    const waitingOn = [...eligibility.unresolved, ...eligibility.dangling];
    throw new BacklogError(
      ExitCode.DEPENDENCY_UNMET,
      `Task ${task.id} is waiting on ${waitingOn.join(', ')}`,
      {
        fix: eligibility.dangling.length > 0
          ? `Remove missing blockers with 'backlog deps remove ${task.id} <id>'`
          : `Complete ${waitingOn.join(', ')} first`,
        details: { unresolved: eligibility.unresolved, dangling: eligibility.dangling },
      },
    );
  }

  const session = openSessionOf(data);
  if (context.sessionId !== undefined) {
    if (!session || session.id !== context.sessionId) {
      throw new BacklogError(
        ExitCode.SESSION_NOT_FOUND,
        `Parallel session ${context.sessionId} is not open`,
      );
    }
    if (!session.taskIds.includes(task.id)) {
      throw new BacklogError(
        ExitCode.TASK_NOT_IN_SCOPE,
        `Task ${task.id} is not part of parallel session ${session.id}`,
      );
    }
  }
  const inSession = session !== null && session.taskIds.includes(task.id);
  const running = data.tasks.filter((t) => t.status === 'in_progress' && t.id !== task.id);

  if (!inSession) {
    if (running.length > 0) {
      throw new BacklogError(
        ExitCode.ACTIVE_LIMIT_EXCEEDED,
        `Task ${running.map((t) => t.id).join(', ')} is already in progress`,
        {
          fix: 'Finish or block the active task, or open a parallel session',
          details: { activeTaskIds: running.map((t) => t.id) },
        },
      );
    }
    return warnings;
  }

  const clashing = running.filter((r) => conflicts(task, r, policy));
  const first = clashing[0];
  if (first) {
    const resources = sharedResources(task, first);
    throw new BacklogError(
      ExitCode.RESOURCE_CONFLICT,
      `Task ${task.id} conflicts with in-progress ${clashing.map((t) => t.id).join(', ')}`
        + (resources.length > 0 ? ` on ${resources.join(', ')}` : ' (shared module)'),
      { details: { conflictsWith: clashing.map((t) => t.id), resources } },
    );
  }

  const overlaps = overlapWarnings(task, running, policy);
  for (const w of overlaps) {
    getLogger('state').warn({ code: w.code, taskId: w.taskId, relatedIds: w.relatedIds }, w.message);
  }
  return [...warnings, ...overlaps];
}

function describe(from: TaskStatus, to: TaskStatus, extra: string[], note?: string): string {
  const parts = [`${from} -> ${to}`, ...extra];
  const head = parts.join(' ');
  return note?.trim() ? `${head}: ${note.trim()}` : head;
}

/**
 * Apply one transition to a locked draft. Shared by transition() and the
 * parallel-session operations, which batch several of these into one commit.
 */
export function applyTransition(
  data: TaskFile,
  id: string,
  target: TaskStatus,
  context: TransitionContext,
  policy: ConflictPolicy,
  now: string,
): TransitionResult {
  const { task, partition } = requireTask(data, id);
  assertVersion(task, context.expectedVersion);
  const from = task.status;

  if (partition === 'archive' || !isLegalTransition(from, target)) {
    throw new BacklogError(
      ExitCode.ILLEGAL_TRANSITION,
      `Illegal transition for ${id}: ${from} -> ${target}`,
      {
        fix: from === 'completed'
          ? `Use 'backlog reopen ${id} <reason>' to reopen a completed task`
          : `Allowed from ${from}: ${LEGAL_TRANSITIONS[from].join(', ') || 'none'}`,
        details: { from, to: target, allowed: [...LEGAL_TRANSITIONS[from]] },
      },
    );
  }

  let warnings: IntegrityWarning[] = [];
  const extra: string[] = [];

  if (target === 'in_progress') {
    warnings = assertAdmissible(data, task, context, policy);
  }

  if (target === 'completed') {
    const unchecked = task.acceptanceCriteria.filter((c) => !c.checked);
    if (unchecked.length > 0 && !context.override) {
      throw new BacklogError(
        ExitCode.ACCEPTANCE_INCOMPLETE,
        `Task ${id} has ${unchecked.length} of ${task.acceptanceCriteria.length} acceptance criteria unchecked`,
        {
          fix: `Check them with 'backlog check ${id} <n>' or pass --force to override`,
          details: { unchecked: unchecked.map((c) => c.text) },
        },
      );
    }
    if (unchecked.length > 0) {
      extra.push(`(override: ${unchecked.length} unchecked criteria: ${unchecked.map((c) => c.text).join('; ')})`);
    }
  }

  task.status = target;
  if (target === 'in_progress' && task.startedAt === null) task.startedAt = now;
  if (target === 'completed') task.completedAt = now;
  task.progressLog.push({ timestamp: now, note: describe(from, target, extra, context.note) });
  touch(task, now);

  if (target === 'completed') moveToArchive(data, id);

  return { task: structuredClone(task), from, warnings };
}

/**
 * Transition a task to `target`.
 *
 * Failure kinds: NotFound, IllegalTransition, DependencyUnmet,
 * ActiveLimitExceeded, ResourceConflict, AcceptanceCriteriaIncomplete,
 * Conflict. A failed transition writes nothing.
 */
export async function transition(
  accessor: DataAccessor,
  id: string,
  target: TaskStatus,
  context: TransitionContext = {},
  options: TransitionOptions = {},
): Promise<TransitionResult> {
  const policy = options.conflictPolicy ?? STRICT_POLICY;
  const result = await accessor.mutateTaskFile((data) =>
    applyTransition(data, id, target, context, policy, new Date().toISOString()),
  );

  getLogger('state').info({ taskId: id, from: result.from, to: target }, 'status changed');
  await accessor.appendLog(
    auditEntry(
      'status_changed',
      id,
      { status: result.from },
      auditSnapshot(result.task),
      context.actor,
    ),
  );
  return result;
}

/** Convenience wrappers for the common edges. */
export function startTask(accessor: DataAccessor, id: string, context?: TransitionContext, options?: TransitionOptions) {
  return transition(accessor, id, 'in_progress', context, options);
}

export function blockTask(accessor: DataAccessor, id: string, context?: TransitionContext) {
  return transition(accessor, id, 'blocked', context);
}

export function unblockTask(accessor: DataAccessor, id: string, context?: TransitionContext) {
  return transition(accessor, id, 'pending', context);
}

export function completeTask(accessor: DataAccessor, id: string, context?: TransitionContext) {
  return transition(accessor, id, 'completed', context);
}

/**
 * Reopen a completed task: an audited operation outside the normal edge set.
 * Moves the task back to the active partition as pending and records why.
 */
export async function reopen(
  accessor: DataAccessor,
  id: string,
  reason: string,
  context: Pick<TransitionContext, 'expectedVersion' | 'actor'> = {},
): Promise<Task> {
  if (!reason.trim()) {
    throw new BacklogError(ExitCode.INVALID_INPUT, 'A reason is required to reopen a task');
  }

  const task = await accessor.mutateTaskFile((data) => {
    const { task, partition } = requireTask(data, id);
    assertVersion(task, context.expectedVersion);
    if (partition !== 'archive' || task.status !== 'completed') {
      throw new BacklogError(
        ExitCode.INVALID_STATE,
        `Task ${id} is ${task.status}; only completed tasks can be reopened`,
      );
    }
    const now = new Date().toISOString();
    task.status = 'pending';
    task.completedAt = null;
    task.progressLog.push({ timestamp: now, note: `Reopened: ${reason.trim()}` });
    // The active partition holds at most one P1
    const holder = data.tasks.find((t) => t.priority === 'P1');
    if (task.priority === 'P1' && holder) {
      task.priority = 'P2';
      task.progressLog.push({ timestamp: now, note: `Demoted to P2 (P1 held by ${holder.id})` });
    }
    touch(task, now);
    moveToActive(data, id);
    return structuredClone(task);
  });

  getLogger('state').info({ taskId: id }, 'task reopened');
  await accessor.appendLog(
    auditEntry('task_reopened', id, { status: 'completed' }, { ...auditSnapshot(task), reason }, context.actor),
  );
  return task;
}
