/**
 * Tests for the derived index summary.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { DataAccessor } from '../../../store/data-accessor.js';
import { createMemoryDataAccessor } from '../../../store/memory-data-accessor.js';
import { TaskStore, allTasks } from '../../../store/task-store.js';
import { startTask, blockTask, completeTask } from '../../tasks/state-machine.js';
import { openSession } from '../../orchestration/parallel.js';
import { computeIndexSummary, getIndexSummary, staleWarnings } from '../index.js';
import { DEFAULTS } from '../../config.js';

let accessor: DataAccessor;

describe('index summary', () => {
  beforeEach(async () => {
    accessor = createMemoryDataAccessor();
    const store = new TaskStore(accessor);
    for (const title of ['One', 'Two', 'Three', 'Four']) {
      await store.create({ title });
    }
    await startTask(accessor, 'T001');
    await completeTask(accessor, 'T001');
    await startTask(accessor, 'T002');
    await blockTask(accessor, 'T002');
    await startTask(accessor, 'T003');
  });

  it('counts every status across both partitions', async () => {
    const summary = await getIndexSummary(accessor);
    expect(summary.counts).toEqual({ pending: 1, in_progress: 1, blocked: 1, completed: 1 });
    expect(summary.total).toBe(4);
    expect(summary.activeTaskIds).toEqual(['T003']);
    expect(summary.openSessionId).toBeNull();
  });

  it('always matches a live scan of the tasks', async () => {
    const data = await accessor.loadTaskFile();
    const summary = computeIndexSummary(data);
    for (const status of ['pending', 'in_progress', 'blocked', 'completed'] as const) {
      expect(summary.counts[status]).toBe(allTasks(data).filter((t) => t.status === status).length);
    }
    expect(summary.generation).toBe(data._meta.generation);
  });

  it('shows the open session', async () => {
    await openSession(accessor, ['T004']);
    expect((await getIndexSummary(accessor)).openSessionId).toBe('S001');
  });

  it('takes the stale threshold from the configuration defaults', async () => {
    const data = await accessor.loadTaskFile();
    expect(computeIndexSummary(data).staleAfterMinutes).toBe(DEFAULTS.session.staleAfterMinutes);
    expect((await getIndexSummary(accessor)).staleAfterMinutes).toBe(DEFAULTS.session.staleAfterMinutes);
  });

  it('flags tasks in progress past the threshold', async () => {
    const data = await accessor.loadTaskFile();
    const startedAt = data.tasks.find((t) => t.id === 'T003')?.startedAt ?? '';
    const started = Date.parse(startedAt);

    const atLimit = computeIndexSummary(data, new Date(started + 120 * 60_000), 120);
    expect(atLimit.stale).toEqual([]);

    const past = computeIndexSummary(data, new Date(started + 121 * 60_000), 120);
    expect(past.stale).toEqual([{ id: 'T003', title: 'Three', startedAt, ageMinutes: 121 }]);
    expect(staleWarnings(past.stale, 120)).toEqual([
      {
        code: 'W_STALE_TASK',
        taskId: 'T003',
        message: 'Task T003 has been in progress for 121 minutes (threshold 120)',
      },
    ]);
  });
});
