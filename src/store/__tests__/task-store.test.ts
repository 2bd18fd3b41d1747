/**
 * Tests for the Task Record Store.
 *
 * Covers id assignment, creation warnings, the single-P1 rule, optimistic
 * concurrency, protected fields, archiving and list filters.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';
import { createEmptyTaskFile } from '../data-accessor.js';
import { createMemoryDataAccessor, type MemoryDataAccessor } from '../memory-data-accessor.js';
import { TaskStore, formatTaskId, compareTaskIds } from '../task-store.js';

let accessor: MemoryDataAccessor;
let store: TaskStore;

describe('TaskStore', () => {
  beforeEach(() => {
    accessor = createMemoryDataAccessor();
    store = new TaskStore(accessor);
  });

  describe('ids', () => {
    it('formats ids with three-digit padding', () => {
      expect(formatTaskId(1)).toBe('T001');
      expect(formatTaskId(42)).toBe('T042');
      expect(formatTaskId(1234)).toBe('T1234');
    });

    it('orders ids numerically, malformed ids last', () => {
      const ids = ['T010', 'bogus', 'T002', 'T1000', 'T001'];
      expect([...ids].sort(compareTaskIds)).toEqual(['T001', 'T002', 'T010', 'T1000', 'bogus']);
    });
  });

  describe('create', () => {
    it('creates a pending task with defaults', async () => {
      const { task, warnings } = await store.create({ title: '  Parse config  ' });

      expect(warnings).toEqual([]);
      expect(task.id).toBe('T001');
      expect(task.title).toBe('Parse config');
      expect(task.status).toBe('pending');
      expect(task.priority).toBe('P3');
      expect(task.category).toBeNull();
      expect(task.version).toBe(1);
      expect(task.startedAt).toBeNull();
      expect(task.progressLog.map((e) => e.note)).toEqual(['Created']);
    });

    it('assigns increasing ids', async () => {
      const a = await store.create({ title: 'First' });
      const b = await store.create({ title: 'Second' });
      expect([a.task.id, b.task.id]).toEqual(['T001', 'T002']);

      const data = await store.snapshot();
      expect(data._meta.nextId).toBe(3);
    });

    it('turns string criteria into unchecked criteria', async () => {
      const { task } = await store.create({ title: 'With criteria', acceptanceCriteria: ['tests pass', 'docs'] });
      expect(task.acceptanceCriteria).toEqual([
        { text: 'tests pass', checked: false },
        { text: 'docs', checked: false },
      ]);
    });

    it('dedupes footprint and blocker lists', async () => {
      await store.create({ title: 'Blocker' });
      const { task } = await store.create({
        title: 'Dependent',
        blockedBy: ['T001', ' T001 ', ''],
        resourceFootprint: ['src/a.ts', 'src/a.ts', 'src/b.ts'],
      });
      expect(task.blockedBy).toEqual(['T001']);
      expect(task.resourceFootprint).toEqual(['src/a.ts', 'src/b.ts']);
    });

    it('rejects an empty title', async () => {
      await expect(store.create({ title: '   ' })).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
        message: 'Task title is required',
      });
    });

    it('warns on a duplicate title without failing', async () => {
      await store.create({ title: 'Write docs' });
      const { task, warnings } = await store.create({ title: 'write DOCS' });

      expect(task.id).toBe('T002');
      expect(warnings).toEqual([
        {
          code: 'W_DUPLICATE_TITLE',
          taskId: 'T002',
          message: 'Title duplicates T001: "Write docs"',
          relatedIds: ['T001'],
        },
      ]);
    });

    it('warns on an issued blocker that no longer exists', async () => {
      const empty = createEmptyTaskFile();
      const seeded = new TaskStore(createMemoryDataAccessor({ ...empty, _meta: { ...empty._meta, nextId: 100 } }));
      const { task, warnings } = await seeded.create({ title: 'Orphan', blockedBy: ['T099'] });

      expect(task.id).toBe('T100');
      expect(task.blockedBy).toEqual(['T099']);
      expect(warnings).toEqual([
        {
          code: 'W_DANGLING_BLOCKER',
          taskId: 'T100',
          message: 'Blocker T099 does not exist; T100 will never become eligible until it is removed',
          relatedIds: ['T099'],
        },
      ]);
    });

    it('rejects a blocker id that has not been issued yet', async () => {
      await store.create({ title: 'First' });
      await expect(store.create({ title: 'Early', blockedBy: ['T003'] })).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
        message: 'Blocker T003 has not been created yet',
        details: { blockerId: 'T003', nextId: 2 },
      });

      const data = await store.snapshot();
      expect(data.tasks.map((t) => t.id)).toEqual(['T001']);
      expect(data._meta.nextId).toBe(2);
    });

    it('rejects the new task as its own blocker', async () => {
      await expect(store.create({ title: 'Loop', blockedBy: ['T001'] })).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
        message: 'Task T001 cannot block itself',
      });
      expect((await store.snapshot()).tasks).toEqual([]);
    });

    it('rejects a blocker that is not a task id', async () => {
      await expect(store.create({ title: 'Odd', blockedBy: ['later'] })).rejects.toMatchObject({
        code: ExitCode.INVALID_INPUT,
        message: 'Blocker later is not a task id',
      });
    });

    it('rejects a blocker that would close a cycle through stored edges', async () => {
      const empty = createEmptyTaskFile();
      const legacy: Task = {
        id: 'T001',
        title: 'Legacy',
        status: 'pending',
        priority: 'P3',
        category: null,
        blockedBy: ['T002'],
        resourceFootprint: [],
        acceptanceCriteria: [],
        createdAt: '2026-01-01T00:00:00.000Z',
        startedAt: null,
        completedAt: null,
        progressLog: [],
        learnings: [],
        version: 1,
        updatedAt: '2026-01-01T00:00:00.000Z',
      };
      const seeded = new TaskStore(
        createMemoryDataAccessor({ ...empty, tasks: [legacy], _meta: { ...empty._meta, nextId: 2 } }),
      );

      await expect(seeded.create({ title: 'Next', blockedBy: ['T001'] })).rejects.toMatchObject({
        code: ExitCode.CIRCULAR_REFERENCE,
        message: 'Adding T001 as a blocker of T002 would create a cycle: T002 -> T001 -> T002',
        details: { cycle: ['T002', 'T001', 'T002'] },
      });
      expect((await seeded.snapshot())._meta.nextId).toBe(2);
    });

    it('reports schema violations as validation errors', async () => {
      await expect(store.create({ title: 'x'.repeat(201) })).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: 'Invalid task: title: String must contain at most 200 character(s)',
      });
      await expect(store.create({ title: 'Criteria', acceptanceCriteria: ['ok', ''] })).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: 'Invalid task: acceptanceCriteria.1.text: String must contain at least 1 character(s)',
      });

      const data = await store.snapshot();
      expect(data.tasks).toEqual([]);
      expect(data._meta.nextId).toBe(1);
    });

    it('allows only one active P1', async () => {
      await store.create({ title: 'Urgent', priority: 'P1' });
      await expect(store.create({ title: 'Also urgent', priority: 'P1' })).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: 'P1 is already held by T001; at most one active task may be P1',
      });

      const data = await store.snapshot();
      expect(data.tasks).toHaveLength(1);
      expect(data._meta.nextId).toBe(2);
    });

    it('records a task_created audit entry', async () => {
      await store.create({ title: 'Audited', actor: 'tester' });
      expect(accessor.auditLog).toHaveLength(1);
      expect(accessor.auditLog[0]).toMatchObject({
        action: 'task_created',
        taskId: 'T001',
        actor: 'tester',
        before: null,
        after: { title: 'Audited', status: 'pending', priority: 'P3', version: 1 },
      });
    });
  });

  describe('get', () => {
    it('fails with NOT_FOUND for an unknown id', async () => {
      await expect(store.get('T404')).rejects.toMatchObject({
        code: ExitCode.NOT_FOUND,
        message: 'Task not found: T404',
      });
    });
  });

  describe('update', () => {
    it('bumps the version on every write', async () => {
      await store.create({ title: 'Original' });
      const updated = await store.update('T001', 1, (t) => {
        t.title = 'Renamed';
      });
      expect(updated.title).toBe('Renamed');
      expect(updated.version).toBe(2);
    });

    it('rejects a stale expected version and writes nothing', async () => {
      await store.create({ title: 'Contended' });
      await store.update('T001', 1, (t) => {
        t.title = 'First writer';
      });

      await expect(
        store.update('T001', 1, (t) => {
          t.title = 'Second writer';
        }),
      ).rejects.toMatchObject({
        code: ExitCode.CONCURRENT_MODIFICATION,
        details: { taskId: 'T001', expectedVersion: 1, actualVersion: 2 },
      });

      const task = await store.get('T001');
      expect(task.title).toBe('First writer');
      expect(task.version).toBe(2);
    });

    it('refuses to change fields owned by the state machine', async () => {
      await store.create({ title: 'Protected' });
      await expect(
        store.update('T001', undefined, (t) => {
          t.status = 'completed';
        }),
      ).rejects.toMatchObject({
        code: ExitCode.VALIDATION_ERROR,
        message: "Field 'status' of T001 cannot be changed by update",
      });
      expect((await store.get('T001')).status).toBe('pending');
    });

    it('keeps the progress log append-only', async () => {
      await store.create({ title: 'History' });
      await expect(
        store.update('T001', undefined, (t) => {
          t.progressLog = [];
        }),
      ).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
    });

    it('leaves the generation untouched when a mutation fails', async () => {
      await store.create({ title: 'Stable' });
      const before = (await store.snapshot())._meta.generation;
      await expect(store.update('T001', 7, () => undefined)).rejects.toMatchObject({
        code: ExitCode.CONCURRENT_MODIFICATION,
      });
      expect((await store.snapshot())._meta.generation).toBe(before);
    });
  });

  describe('archive', () => {
    it('refuses to archive a task that is not completed', async () => {
      await store.create({ title: 'Pending' });
      await expect(store.archive('T001')).rejects.toMatchObject({
        code: ExitCode.INVALID_STATE,
        message: 'Task T001 is pending; only completed tasks can be archived',
      });
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await store.create({ title: 'API handler', category: 'api', priority: 'P2' });
      await store.create({ title: 'UI widget', category: 'ui' });
      await store.create({ title: 'API tests', category: 'api' });
    });

    it('returns every task in id order', async () => {
      const tasks = await store.list();
      expect(tasks.map((t) => t.id)).toEqual(['T001', 'T002', 'T003']);
    });

    it('filters by category', async () => {
      const tasks = await store.list({ category: 'api' });
      expect(tasks.map((t) => t.id)).toEqual(['T001', 'T003']);
    });

    it('filters by priority', async () => {
      const tasks = await store.list({ priority: 'P2' });
      expect(tasks.map((t) => t.id)).toEqual(['T001']);
    });

    it('filters by status list', async () => {
      const tasks = await store.list({ status: ['blocked', 'completed'] });
      expect(tasks).toEqual([]);
    });

    it('reads one partition', async () => {
      expect(await store.list({ partition: 'archive' })).toEqual([]);
      expect(await store.list({ partition: 'active' })).toHaveLength(3);
    });
  });
});
