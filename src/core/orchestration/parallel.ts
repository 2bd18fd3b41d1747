/**
 * Parallel session management.
 *
 * A session names a fixed set of tasks that may be in progress together as
 * long as their footprints stay disjoint. Workers report back per task; a
 * failed task alone drops to blocked, its siblings carry on.
 */

import { BacklogError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task, TaskFile } from '../../types/task.js';
import type { ParallelSession, WorkerOutcome } from '../../types/session.js';
import type { DataAccessor } from '../../store/data-accessor.js';
import { locateTask, auditEntry, auditSnapshot, compareTaskIds } from '../../store/task-store.js';
import { applyTransition, openSessionOf, type TransitionResult } from '../tasks/state-machine.js';
import { STRICT_POLICY, type ConflictPolicy } from './conflicts.js';

/** Format a numeric id as S001, S002, ... */
export function formatSessionId(n: number): string {
  return `S${String(n).padStart(3, '0')}`;
}

/** Options shared by session operations. */
export interface SessionOptions {
  conflictPolicy?: ConflictPolicy;
  actor?: string;
}

function requireOpenSession(data: TaskFile, sessionId: string): ParallelSession {
  const session = data.sessions.find((s) => s.id === sessionId);
  if (!session) {
    throw new BacklogError(ExitCode.SESSION_NOT_FOUND, `Parallel session not found: ${sessionId}`);
  }
  if (session.status !== 'open') {
    throw new BacklogError(ExitCode.INVALID_STATE, `Parallel session ${sessionId} is closed`);
  }
  return session;
}

/**
 * Open a parallel session over `taskIds`. Only one session may be open at a
 * time; every constituent must be in the active partition.
 */
export async function openSession(
  accessor: DataAccessor,
  taskIds: string[],
  options: SessionOptions & { label?: string } = {},
): Promise<ParallelSession> {
  const ids = [...new Set(taskIds)];
  if (ids.length === 0) {
    throw new BacklogError(ExitCode.INVALID_INPUT, 'A parallel session needs at least one task');
  }

  const session = await accessor.mutateTaskFile((data) => {
    const existing = openSessionOf(data);
    if (existing) {
      throw new BacklogError(
        ExitCode.SESSION_EXISTS,
        `Parallel session ${existing.id} is already open`,
        { fix: `Close it first with 'backlog session close ${existing.id}'` },
      );
    }
    for (const id of ids) {
      const located = locateTask(data, id);
      if (!located) throw new BacklogError(ExitCode.NOT_FOUND, `Task not found: ${id}`);
      if (located.partition === 'archive') {
        throw new BacklogError(ExitCode.INVALID_STATE, `Task ${id} is completed and cannot join a session`);
      }
    }

    const created: ParallelSession = {
      id: formatSessionId(data._meta.nextSessionId),
      label: options.label?.trim() || null,
      status: 'open',
      taskIds: ids.sort(compareTaskIds),
      openedAt: new Date().toISOString(),
      closedAt: null,
      failures: [],
    };
    data._meta.nextSessionId += 1;
    data.sessions.push(created);
    return structuredClone(created);
  });

  getLogger('session').info({ sessionId: session.id, taskIds: session.taskIds }, 'parallel session opened');
  await accessor.appendLog(
    auditEntry('session_opened', null, null, { sessionId: session.id, taskIds: session.taskIds }, options.actor),
  );
  return session;
}

/**
 * Admit a batch of session tasks to in_progress. All-or-nothing: each task
 * is admitted against the draft that already holds the earlier ones, and the
 * first failure aborts the whole batch.
 */
export async function admit(
  accessor: DataAccessor,
  sessionId: string,
  taskIds: string[],
  options: SessionOptions = {},
): Promise<TransitionResult[]> {
  const policy = options.conflictPolicy ?? STRICT_POLICY;
  const results = await accessor.mutateTaskFile((data) => {
    requireOpenSession(data, sessionId);
    const now = new Date().toISOString();
    return [...new Set(taskIds)].map((id) =>
      applyTransition(data, id, 'in_progress', { sessionId, actor: options.actor }, policy, now),
    );
  });

  for (const r of results) {
    getLogger('session').info({ sessionId, taskId: r.task.id }, 'task admitted');
    await accessor.appendLog(
      auditEntry('status_changed', r.task.id, { status: r.from }, { ...auditSnapshot(r.task), sessionId }, options.actor),
    );
  }
  return results;
}

/**
 * Apply a worker's report for one session task. Success completes the task;
 * failure moves that task alone back to blocked and records the failure on
 * the session.
 */
export async function reportOutcome(
  accessor: DataAccessor,
  sessionId: string,
  taskId: string,
  outcome: WorkerOutcome,
  options: SessionOptions = {},
): Promise<TransitionResult> {
  const policy = options.conflictPolicy ?? STRICT_POLICY;
  const result = await accessor.mutateTaskFile((data) => {
    const session = requireOpenSession(data, sessionId);
    if (!session.taskIds.includes(taskId)) {
      throw new BacklogError(
        ExitCode.TASK_NOT_IN_SCOPE,
        `Task ${taskId} is not part of parallel session ${sessionId}`,
      );
    }
    const now = new Date().toISOString();
    if (outcome.ok) {
      return applyTransition(
        data, taskId, 'completed', { note: outcome.note, override: outcome.override }, policy, now,
      );
    }
    const note = outcome.note?.trim() || 'no details reported';
    const blocked = applyTransition(
      data, taskId, 'blocked', { note: `Execution failed: ${note}` }, policy, now,
    );
    session.failures.push({ taskId, note, timestamp: now });
    return blocked;
  });

  if (outcome.ok) {
    getLogger('session').info({ sessionId, taskId }, 'session task completed');
  } else {
    getLogger('session').warn({ sessionId, taskId, note: outcome.note }, 'session task failed');
  }
  await accessor.appendLog(
    auditEntry(
      outcome.ok ? 'session_task_completed' : 'session_task_failed',
      taskId,
      { status: result.from },
      { ...auditSnapshot(result.task), sessionId },
      options.actor,
    ),
  );
  return result;
}

/**
 * Close a session. Refused while more than one task is in progress, since
 * that would leave the backlog outside single-active mode with several
 * running tasks.
 */
export async function closeSession(
  accessor: DataAccessor,
  sessionId: string,
  options: SessionOptions = {},
): Promise<ParallelSession> {
  const session = await accessor.mutateTaskFile((data) => {
    const target = requireOpenSession(data, sessionId);
    const running = data.tasks.filter((t) => t.status === 'in_progress').map((t) => t.id);
    if (running.length > 1) {
      throw new BacklogError(
        ExitCode.SESSION_CLOSE_BLOCKED,
        `Cannot close ${sessionId}: ${running.join(', ')} are still in progress`,
        {
          fix: 'Report outcomes or block tasks until at most one is in progress',
          details: { inProgress: running },
        },
      );
    }
    target.status = 'closed';
    target.closedAt = new Date().toISOString();
    return structuredClone(target);
  });

  getLogger('session').info({ sessionId }, 'parallel session closed');
  await accessor.appendLog(
    auditEntry('session_closed', null, { sessionId }, { sessionId, failures: session.failures.length }, options.actor),
  );
  return session;
}

/** A session together with the current state of its constituents. */
export interface SessionStatus {
  session: ParallelSession;
  tasks: Array<Pick<Task, 'id' | 'title' | 'status' | 'resourceFootprint'>>;
  inProgress: string[];
  failed: string[];
}

/**
 * Current state of a session; the open one when no id is given. Returns
 * null when no id is given and no session is open.
 */
export async function getSessionStatus(accessor: DataAccessor, sessionId?: string): Promise<SessionStatus | null> {
  const data = await accessor.loadTaskFile();
  const session = sessionId === undefined
    ? openSessionOf(data)
    : data.sessions.find((s) => s.id === sessionId) ?? null;

  if (!session) {
    if (sessionId === undefined) return null;
    throw new BacklogError(ExitCode.SESSION_NOT_FOUND, `Parallel session not found: ${sessionId}`);
  }

  const tasks = session.taskIds.map((id) => {
    const task = locateTask(data, id)?.task;
    return task
      ? { id, title: task.title, status: task.status, resourceFootprint: [...task.resourceFootprint] }
      : null;
  }).filter((t): t is NonNullable<typeof t> => t !== null);

  return {
    session,
    tasks,
    inProgress: tasks.filter((t) => t.status === 'in_progress').map((t) => t.id),
    failed: [...new Set(session.failures.map((f) => f.taskId))],
  };
}

/** Every session, most recent first. */
export async function listSessions(accessor: DataAccessor): Promise<ParallelSession[]> {
  const data = await accessor.loadTaskFile();
  return [...data.sessions].reverse();
}
