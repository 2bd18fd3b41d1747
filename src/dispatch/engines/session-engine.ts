/**
 * Session Engine: thin wrapper layer.
 *
 * Delegates all business logic to src/core/orchestration/parallel.ts.
 * Each function catches errors from core and wraps them into EngineResult.
 */

import type { ParallelSession, WorkerOutcome } from '../../types/session.js';
import type { IntegrityWarning } from '../../types/task.js';
import {
  openSession,
  admit,
  reportOutcome,
  closeSession,
  getSessionStatus,
  listSessions,
  type SessionStatus,
} from '../../core/orchestration/parallel.js';
import type { TransitionResult } from '../../core/tasks/state-machine.js';
import { attempt, type EngineResult } from './_error.js';
import { withBacklog } from './_context.js';

export type { EngineResult };

/** Open a parallel session over a fixed set of tasks. */
export async function sessionOpen(
  projectRoot: string,
  taskIds: string[],
  label?: string,
): Promise<EngineResult<ParallelSession>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => openSession(accessor, taskIds, { label })));
}

/** Admit session tasks to in_progress, all or nothing. */
export async function sessionAdmit(
  projectRoot: string,
  sessionId: string,
  taskIds: string[],
): Promise<EngineResult<TransitionResult[]>> {
  return attempt(
    () => withBacklog(projectRoot, ({ accessor, config }) =>
      admit(accessor, sessionId, taskIds, { conflictPolicy: config.conflicts }),
    ),
    (results): IntegrityWarning[] => results.flatMap((r) => r.warnings),
  );
}

/** Record a worker's outcome for one session task. */
export async function sessionReport(
  projectRoot: string,
  sessionId: string,
  taskId: string,
  outcome: WorkerOutcome,
): Promise<EngineResult<TransitionResult>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor, config }) =>
    reportOutcome(accessor, sessionId, taskId, outcome, { conflictPolicy: config.conflicts }),
  ));
}

/** Close a session. */
export async function sessionClose(projectRoot: string, sessionId: string): Promise<EngineResult<ParallelSession>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => closeSession(accessor, sessionId)));
}

/** State of the open session, or of a named one. */
export async function sessionStatus(
  projectRoot: string,
  sessionId?: string,
): Promise<EngineResult<SessionStatus | null>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => getSessionStatus(accessor, sessionId)));
}

/** Every session, most recent first. */
export async function sessionList(projectRoot: string): Promise<EngineResult<ParallelSession[]>> {
  return attempt(() => withBacklog(projectRoot, ({ accessor }) => listSessions(accessor)));
}
