/**
 * Tests for field updates, acceptance criteria edits and P1 promotion.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExitCode } from '../../../types/exit-codes.js';
import type { DataAccessor } from '../../../store/data-accessor.js';
import { createMemoryDataAccessor } from '../../../store/memory-data-accessor.js';
import { TaskStore } from '../../../store/task-store.js';
import { updateTask, addCriterion, setCriterion, addNote, promote } from '../update.js';
import { startTask, completeTask } from '../state-machine.js';

let accessor: DataAccessor;
let store: TaskStore;

describe('task updates', () => {
  beforeEach(async () => {
    accessor = createMemoryDataAccessor();
    store = new TaskStore(accessor);
    await store.create({ title: 'Cache layer', priority: 'P1', acceptanceCriteria: ['hit rate logged'] });
    await store.create({ title: 'Metrics endpoint', priority: 'P2' });
  });

  describe('updateTask', () => {
    it('applies several fields in one write', async () => {
      const result = await updateTask(accessor, {
        taskId: 'T002',
        title: 'Metrics endpoint v2',
        category: ' observability ',
        resourceFootprint: ['src/metrics.ts', 'src/metrics.ts', ' '],
        note: 'scoped down',
      });

      expect(result.changes).toEqual(['title', 'category', 'resourceFootprint', 'progressLog']);
      expect(result.task).toMatchObject({
        title: 'Metrics endpoint v2',
        category: 'observability',
        resourceFootprint: ['src/metrics.ts'],
        version: 2,
      });
      expect(result.task.progressLog.at(-1)?.note).toBe('scoped down');
    });

    it('fails with NO_CHANGE when nothing was requested', async () => {
      await expect(updateTask(accessor, { taskId: 'T002' })).rejects.toMatchObject({
        code: ExitCode.NO_CHANGE,
        message: 'No changes requested for T002',
      });
    });

    it('rejects an empty title', async () => {
      await expect(updateTask(accessor, { taskId: 'T002', title: ' ' })).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
      });
    });

    it('refuses to hand P1 to a second active task', async () => {
      await expect(updateTask(accessor, { taskId: 'T002', priority: 'P1' })).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
      });
      expect((await store.get('T002')).priority).toBe('P2');
    });

    it('clears the category with null', async () => {
      await updateTask(accessor, { taskId: 'T002', category: 'ops' });
      const { task } = await updateTask(accessor, { taskId: 'T002', category: null });
      expect(task.category).toBeNull();
    });
  });

  describe('criteria and notes', () => {
    it('appends a criterion unchecked', async () => {
      const task = await addCriterion(accessor, 'T001', 'eviction tested');
      expect(task.acceptanceCriteria).toEqual([
        { text: 'hit rate logged', checked: false },
        { text: 'eviction tested', checked: false },
      ]);
    });

    it('checks and unchecks by index', async () => {
      const checked = await setCriterion(accessor, 'T001', 0, true);
      expect(checked.acceptanceCriteria[0]?.checked).toBe(true);
      const unchecked = await setCriterion(accessor, 'T001', 0, false);
      expect(unchecked.acceptanceCriteria[0]?.checked).toBe(false);
      expect(unchecked.version).toBe(3);
    });

    it('rejects an index past the end', async () => {
      await expect(setCriterion(accessor, 'T001', 3, true)).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
        message: 'Task T001 has no acceptance criterion #4',
        details: { count: 1 },
      });
    });

    it('edits criteria on a completed task', async () => {
      await setCriterion(accessor, 'T001', 0, true);
      await startTask(accessor, 'T001');
      await completeTask(accessor, 'T001');

      const task = await setCriterion(accessor, 'T001', 0, false);
      expect(task.status).toBe('completed');
      expect(task.acceptanceCriteria[0]?.checked).toBe(false);
    });

    it('appends a progress note', async () => {
      const task = await addNote(accessor, 'T002', 'waiting on dashboard design');
      expect(task.progressLog.map((e) => e.note)).toEqual(['Created', 'waiting on dashboard design']);
    });
  });

  describe('promote', () => {
    it('moves P1 and demotes the previous holder in one commit', async () => {
      const generation = (await accessor.loadTaskFile())._meta.generation;
      const result = await promote(accessor, 'T002');

      expect(result.demoted).toBe('T001');
      expect(result.task.priority).toBe('P1');
      expect(result.task.progressLog.at(-1)?.note).toBe('Promoted to P1');

      const previous = await store.get('T001');
      expect(previous.priority).toBe('P2');
      expect(previous.progressLog.at(-1)?.note).toBe('Demoted to P2 (P1 moved to T002)');
      expect((await accessor.loadTaskFile())._meta.generation).toBe(generation + 1);
    });

    it('demotes nobody once the P1 holder is archived', async () => {
      await setCriterion(accessor, 'T001', 0, true);
      await startTask(accessor, 'T001');
      await completeTask(accessor, 'T001');

      const result = await promote(accessor, 'T002');
      expect(result.demoted).toBeNull();
      expect((await store.get('T001')).priority).toBe('P1');
    });

    it('reports NO_CHANGE for the current holder', async () => {
      await expect(promote(accessor, 'T001')).rejects.toMatchObject({ code: ExitCode.NO_CHANGE });
    });

    it('refuses to promote a completed task', async () => {
      await startTask(accessor, 'T002');
      await completeTask(accessor, 'T002');
      await expect(promote(accessor, 'T002')).rejects.toMatchObject({ code: ExitCode.INVALID_STATE });
    });
  });
});
