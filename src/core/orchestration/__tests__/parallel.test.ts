/**
 * Tests for parallel sessions: opening, all-or-nothing admission, worker
 * failure isolation and closing.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExitCode } from '../../../types/exit-codes.js';
import type { DataAccessor } from '../../../store/data-accessor.js';
import { createMemoryDataAccessor } from '../../../store/memory-data-accessor.js';
import { TaskStore } from '../../../store/task-store.js';
import { startTask, completeTask } from '../../tasks/state-machine.js';
import { updateTask } from '../../tasks/update.js';
import {
  openSession,
  admit,
  reportOutcome,
  closeSession,
  getSessionStatus,
  listSessions,
  formatSessionId,
} from '../parallel.js';

let accessor: DataAccessor;
let store: TaskStore;

async function statusOf(id: string): Promise<string> {
  return (await store.get(id)).status;
}

describe('parallel sessions', () => {
  beforeEach(async () => {
    accessor = createMemoryDataAccessor();
    store = new TaskStore(accessor);
    await store.create({ title: 'Task D', resourceFootprint: ['f2'] });
    await store.create({ title: 'Task E', resourceFootprint: ['f2'] });
    await store.create({ title: 'Task F', resourceFootprint: ['f3'] });
    await store.create({ title: 'Outsider', resourceFootprint: ['f9'] });
  });

  it('formats session ids', () => {
    expect(formatSessionId(1)).toBe('S001');
    expect(formatSessionId(12)).toBe('S012');
  });

  describe('openSession', () => {
    it('opens a session with sorted task ids', async () => {
      const session = await openSession(accessor, ['T003', 'T001', 'T002', 'T001'], { label: ' sprint ' });
      expect(session).toMatchObject({
        id: 'S001',
        label: 'sprint',
        status: 'open',
        taskIds: ['T001', 'T002', 'T003'],
        closedAt: null,
        failures: [],
      });
    });

    it('allows only one open session', async () => {
      await openSession(accessor, ['T001']);
      await expect(openSession(accessor, ['T002'])).rejects.toMatchObject({
        code: ExitCode.SESSION_EXISTS,
        message: 'Parallel session S001 is already open',
      });
    });

    it('rejects an empty, unknown or completed task list', async () => {
      await expect(openSession(accessor, [])).rejects.toMatchObject({ code: ExitCode.INVALID_INPUT });
      await expect(openSession(accessor, ['T404'])).rejects.toMatchObject({ code: ExitCode.NOT_FOUND });

      await startTask(accessor, 'T004');
      await completeTask(accessor, 'T004');
      await expect(openSession(accessor, ['T004'])).rejects.toMatchObject({ code: ExitCode.INVALID_STATE });
    });
  });

  describe('admit', () => {
    beforeEach(async () => {
      await openSession(accessor, ['T001', 'T002', 'T003']);
    });

    it('rejects a batch whose footprints overlap and admits nothing', async () => {
      await expect(admit(accessor, 'S001', ['T001', 'T002'])).rejects.toMatchObject({
        code: ExitCode.RESOURCE_CONFLICT,
        message: 'Task T002 conflicts with in-progress T001 on f2',
        details: { conflictsWith: ['T001'], resources: ['f2'] },
      });
      expect(await statusOf('T001')).toBe('pending');
      expect(await statusOf('T002')).toBe('pending');
    });

    it('admits a disjoint batch together', async () => {
      const results = await admit(accessor, 'S001', ['T001', 'T003']);
      expect(results.map((r) => [r.task.id, r.task.status])).toEqual([
        ['T001', 'in_progress'],
        ['T003', 'in_progress'],
      ]);
    });

    it('checks a later admission against tasks already running', async () => {
      await admit(accessor, 'S001', ['T001']);
      await expect(startTask(accessor, 'T002', { sessionId: 'S001' })).rejects.toMatchObject({
        code: ExitCode.RESOURCE_CONFLICT,
      });
      expect((await startTask(accessor, 'T003', { sessionId: 'S001' })).task.status).toBe('in_progress');
    });

    it('keeps a running task from widening its footprint onto another', async () => {
      await admit(accessor, 'S001', ['T001', 'T003']);

      await expect(updateTask(accessor, { taskId: 'T003', resourceFootprint: ['f2'] })).rejects.toMatchObject({
        code: ExitCode.RESOURCE_CONFLICT,
        message: 'Task T003 conflicts with in-progress T001 on f2',
        details: { conflictsWith: ['T001'], resources: ['f2'] },
      });
      expect((await store.get('T003')).resourceFootprint).toEqual(['f3']);

      const moved = await updateTask(accessor, { taskId: 'T003', resourceFootprint: ['f3', 'f4'] });
      expect(moved.task.resourceFootprint).toEqual(['f3', 'f4']);
    });

    it('keeps tasks outside the session in single-active mode', async () => {
      await admit(accessor, 'S001', ['T001']);
      await expect(startTask(accessor, 'T004')).rejects.toMatchObject({ code: ExitCode.ACTIVE_LIMIT_EXCEEDED });
      await expect(admit(accessor, 'S001', ['T004'])).rejects.toMatchObject({ code: ExitCode.TASK_NOT_IN_SCOPE });
    });

    it('fails for a session that is not open', async () => {
      await expect(admit(accessor, 'S009', ['T001'])).rejects.toMatchObject({ code: ExitCode.SESSION_NOT_FOUND });
    });
  });

  describe('module policy during admission', () => {
    beforeEach(async () => {
      await store.create({ title: 'Core A', resourceFootprint: ['src/core/a.ts'] });
      await store.create({ title: 'Core B', resourceFootprint: ['src/core/b.ts'] });
      await openSession(accessor, ['T005', 'T006']);
    });

    it('warns on a shared module under warn', async () => {
      const results = await admit(accessor, 'S001', ['T005', 'T006'], {
        conflictPolicy: { moduleOverlap: 'warn', moduleDepth: 2 },
      });
      expect(results[0]?.warnings).toEqual([]);
      expect(results[1]?.warnings.map((w) => w.code)).toEqual(['W_MODULE_OVERLAP']);
    });

    it('blocks a shared module under block', async () => {
      await expect(
        admit(accessor, 'S001', ['T005', 'T006'], { conflictPolicy: { moduleOverlap: 'block', moduleDepth: 2 } }),
      ).rejects.toMatchObject({
        code: ExitCode.RESOURCE_CONFLICT,
        message: 'Task T006 conflicts with in-progress T005 (shared module)',
      });
    });
  });

  describe('worker outcomes', () => {
    beforeEach(async () => {
      await openSession(accessor, ['T001', 'T002', 'T003']);
      await admit(accessor, 'S001', ['T001', 'T003']);
    });

    it('isolates a failed worker', async () => {
      const failed = await reportOutcome(accessor, 'S001', 'T001', { ok: false, note: 'flaky network' });

      expect(failed.task.status).toBe('blocked');
      expect(failed.task.progressLog.at(-1)?.note).toBe('in_progress -> blocked: Execution failed: flaky network');
      expect(await statusOf('T003')).toBe('in_progress');

      const status = await getSessionStatus(accessor);
      expect(status?.failed).toEqual(['T001']);
      expect(status?.inProgress).toEqual(['T003']);
      expect(status?.session.failures).toMatchObject([{ taskId: 'T001', note: 'flaky network' }]);
    });

    it('records a failure without a note', async () => {
      const failed = await reportOutcome(accessor, 'S001', 'T003', { ok: false });
      expect(failed.task.progressLog.at(-1)?.note).toBe('in_progress -> blocked: Execution failed: no details reported');
    });

    it('completes a task on success', async () => {
      const done = await reportOutcome(accessor, 'S001', 'T003', { ok: true, note: 'merged' });
      expect(done.task.status).toBe('completed');
      expect((await accessor.loadTaskFile()).archive.map((t) => t.id)).toEqual(['T003']);
    });

    it('rejects a report for a task outside the session', async () => {
      await expect(reportOutcome(accessor, 'S001', 'T004', { ok: true })).rejects.toMatchObject({
        code: ExitCode.TASK_NOT_IN_SCOPE,
      });
    });

    it('refuses to close while several tasks are in progress', async () => {
      await expect(closeSession(accessor, 'S001')).rejects.toMatchObject({
        code: ExitCode.SESSION_CLOSE_BLOCKED,
        details: { inProgress: ['T001', 'T003'] },
      });

      await reportOutcome(accessor, 'S001', 'T001', { ok: true });
      const closed = await closeSession(accessor, 'S001');
      expect(closed.status).toBe('closed');
      expect(closed.closedAt).not.toBeNull();
      expect(await getSessionStatus(accessor)).toBeNull();

      await expect(reportOutcome(accessor, 'S001', 'T003', { ok: true })).rejects.toMatchObject({
        code: ExitCode.INVALID_STATE,
      });
    });
  });

  describe('queries', () => {
    it('fails for an unknown session id', async () => {
      await expect(getSessionStatus(accessor, 'S404')).rejects.toMatchObject({ code: ExitCode.SESSION_NOT_FOUND });
    });

    it('lists sessions most recent first', async () => {
      await openSession(accessor, ['T001']);
      await closeSession(accessor, 'S001');
      await openSession(accessor, ['T002']);

      const sessions = await listSessions(accessor);
      expect(sessions.map((s) => [s.id, s.status])).toEqual([
        ['S002', 'open'],
        ['S001', 'closed'],
      ]);
    });
  });
});
