/**
 * Tests for the JSON file-backed DataAccessor: persistence, backups,
 * audit log and cross-accessor locking.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExitCode } from '../../types/exit-codes.js';
import { createJsonDataAccessor } from '../json-data-accessor.js';
import { listBackups } from '../backup.js';
import { computeChecksum } from '../json.js';
import { auditEntry } from '../task-store.js';

let tempDir: string;

async function readStored(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'));
}

describe('JsonDataAccessor', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'backlog-json-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads a missing tasks.json as an empty document', async () => {
    const accessor = await createJsonDataAccessor(tempDir);
    const data = await accessor.loadTaskFile();
    expect(accessor.engine).toBe('json');
    expect(data.tasks).toEqual([]);
    expect(data._meta.generation).toBe(0);
  });

  it('persists committed mutations with a fresh checksum', async () => {
    const accessor = await createJsonDataAccessor(tempDir);
    await accessor.mutateTaskFile((data) => {
      data.project.name = 'persisted';
    });

    const stored = await readStored(join(tempDir, '.backlog', 'tasks.json'));
    expect(stored).toMatchObject({
      project: { name: 'persisted' },
      _meta: { generation: 1, checksum: computeChecksum({ tasks: [], archive: [] }) },
    });

    const reopened = await createJsonDataAccessor(tempDir);
    expect((await reopened.loadTaskFile()).project.name).toBe('persisted');
  });

  it('writes nothing when the mutation throws', async () => {
    const accessor = await createJsonDataAccessor(tempDir);
    await accessor.mutateTaskFile((data) => {
      data.project.name = 'kept';
    });
    await expect(
      accessor.mutateTaskFile((data) => {
        data.project.name = 'dropped';
        throw new Error('abort');
      }),
    ).rejects.toThrow('abort');

    const data = await accessor.loadTaskFile();
    expect(data.project.name).toBe('kept');
    expect(data._meta.generation).toBe(1);
  });

  it('rotates operational backups, newest first', async () => {
    const accessor = await createJsonDataAccessor(tempDir, { maxBackups: 2 });
    for (let i = 0; i < 4; i++) {
      await accessor.mutateTaskFile(() => undefined);
    }

    const backupDir = join(tempDir, '.backlog', 'backups', 'operational');
    const backups = await listBackups('tasks.json', backupDir);
    expect(backups).toEqual([join(backupDir, 'tasks.json.1'), join(backupDir, 'tasks.json.2')]);

    // Commit 4 backed up the generation-3 file; commit 3 backed up generation 2
    expect(await readStored(join(backupDir, 'tasks.json.1'))).toMatchObject({ _meta: { generation: 3 } });
    expect(await readStored(join(backupDir, 'tasks.json.2'))).toMatchObject({ _meta: { generation: 2 } });
  });

  it('rejects a tasks.json that fails schema validation', async () => {
    await mkdir(join(tempDir, '.backlog'), { recursive: true });
    await writeFile(join(tempDir, '.backlog', 'tasks.json'), JSON.stringify({ tasks: 'nope' }));

    const accessor = await createJsonDataAccessor(tempDir);
    await expect(accessor.loadTaskFile()).rejects.toMatchObject({ code: ExitCode.VALIDATION_ERROR });
  });

  it('appends audit entries as JSON lines', async () => {
    const accessor = await createJsonDataAccessor(tempDir);
    await accessor.appendLog(auditEntry('task_created', 'T001', null, { title: 'a' }));
    await accessor.appendLog(auditEntry('task_archived', 'T001', null, null, 'tester'));

    const lines = (await readFile(join(tempDir, '.backlog', 'audit.jsonl'), 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1] ?? '{}')).toMatchObject({ action: 'task_archived', taskId: 'T001', actor: 'tester' });
  });

  it('serializes writers from separate accessors on the same directory', async () => {
    const first = await createJsonDataAccessor(tempDir);
    const second = await createJsonDataAccessor(tempDir);
    const bump = (accessor: typeof first) =>
      accessor.mutateTaskFile(async (data) => {
        const seen = data._meta.nextId;
        await new Promise((resolve) => setTimeout(resolve, 10));
        data._meta.nextId = seen + 1;
      });

    await Promise.all([bump(first), bump(second), bump(first), bump(second)]);
    const data = await first.loadTaskFile();
    expect(data._meta.nextId).toBe(5);
    expect(data._meta.generation).toBe(4);
  });
});
