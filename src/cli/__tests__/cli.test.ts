/**
 * End-to-end tests for the CLI: commands run in process against a temp
 * project and print one JSON envelope per call.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram } from '../program.js';
import { resolveFormat } from '../middleware/output-format.js';

let dir: string;
let logged: string[];

async function run(...args: string[]): Promise<void> {
  await createProgram({ logging: false }).exitOverride().parseAsync(['node', 'backlog', ...args]);
}

/** The envelope printed by the most recent command. */
function lastEnvelope(): Record<string, unknown> {
  return JSON.parse(logged.at(-1) ?? 'null');
}

describe('backlog CLI', () => {
  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'backlog-cli-'));
    logged = [];
    vi.spyOn(process, 'cwd').mockReturnValue(dir);
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      logged.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    await run('init', '--name', 'demo');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('initializes the project', () => {
    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'admin.init' },
      success: true,
      result: { initialized: true, directory: join(dir, '.backlog') },
    });
  });

  it('adds a task with every creation option', async () => {
    await run('add', 'Wire the parser', '-p', 'p2', '-c', 'parser', '-f', 'src/a.ts, src/b.ts', '-a', 'parses', '-a', 'tested');

    const envelope = lastEnvelope();
    expect(envelope).toMatchObject({
      _meta: { operation: 'tasks.add' },
      success: true,
      result: {
        task: {
          id: 'T001',
          title: 'Wire the parser',
          priority: 'P2',
          category: 'parser',
          status: 'pending',
          resourceFootprint: ['src/a.ts', 'src/b.ts'],
          acceptanceCriteria: [
            { text: 'parses', checked: false },
            { text: 'tested', checked: false },
          ],
        },
      },
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('prints an error envelope and sets the exit code when admission fails', async () => {
    await run('add', 'First');
    await run('add', 'Second');
    await run('start', 'T001');
    await run('start', 'T002');

    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'tasks.start' },
      success: false,
      error: { code: 'E_ACTIVE_LIMIT_EXCEEDED', kind: 'ActiveLimitExceeded', exitCode: 35 },
    });
    expect(process.exitCode).toBe(35);
  });

  it('checks criteria by 0-based index, then completes', async () => {
    await run('add', 'Ship it', '-a', 'built', '-a', 'released');
    await run('start', 'T001');
    await run('check', 'T001', '0');
    await run('check', 'T001', '1');
    expect(lastEnvelope()).toMatchObject({
      result: { acceptanceCriteria: [{ checked: true }, { checked: true }] },
    });

    await run('complete', 'T001', '-n', 'shipped');
    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'tasks.complete' },
      success: true,
      result: { from: 'in_progress', task: { id: 'T001', status: 'completed' } },
    });
  });

  it('suggests the next task', async () => {
    await run('add', 'Low', '-p', 'P4');
    await run('add', 'High', '-p', 'P2');
    await run('next');
    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'tasks.next' },
      result: { task: { id: 'T002' }, position: 1 },
    });
  });

  it('refuses a dependency cycle', async () => {
    await run('add', 'A');
    await run('add', 'B', '-b', 'T001');
    await run('deps', 'add', 'T001', 'T002');

    expect(lastEnvelope()).toMatchObject({
      success: false,
      error: {
        code: 'E_CIRCULAR_REFERENCE',
        kind: 'CycleDetected',
        message: 'Adding T002 as a blocker of T001 would create a cycle: T001 -> T002 -> T001',
      },
    });
    expect(process.exitCode).toBe(14);
  });

  it('reconciles against inline evidence', async () => {
    await run('add', 'Docs', '-a', 'readme', '-a', 'changelog');
    await run('reconcile', 'T001', '--evidence-json', '{"readme":true,"changelog":true}');

    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'tasks.reconcile' },
      result: { taskId: 'T001', status: 'pending', classification: 'ShouldComplete', unknown: [] },
    });
  });

  it('rejects evidence that is not a map of booleans', async () => {
    await run('add', 'Docs', '-a', 'readme');
    await run('reconcile', 'T001', '--evidence-json', '{"readme":"yes"}');

    expect(lastEnvelope()).toMatchObject({
      success: false,
      error: { code: 'E_INVALID_INPUT', exitCode: 2 },
    });
    expect(process.exitCode).toBe(2);
  });

  it('records a learning', async () => {
    await run('learn', 'add', 'retry on 503', '--context', 'deploy');
    expect(lastEnvelope()).toMatchObject({
      _meta: { operation: 'memory.add' },
      result: { id: 'L001', taskId: null, context: 'deploy', insight: 'retry on 503' },
    });
  });

  it('prints one line of counts with --human --quiet', async () => {
    await run('add', 'One');
    await run('add', 'Two');
    await run('start', 'T002');
    await run('--human', '--quiet', 'status');
    expect(logged.at(-1)).toBe('pending=1 in_progress=1 blocked=0 completed=0');
  });
});

describe('resolveFormat', () => {
  it('prefers flags over the configured default', () => {
    expect(resolveFormat({ human: true }, 'json')).toEqual({ format: 'human', source: 'flag', quiet: false });
    expect(resolveFormat({ quiet: true }, 'human')).toEqual({ format: 'human', source: 'config', quiet: true });
    expect(resolveFormat({})).toEqual({ format: 'json', source: 'default', quiet: false });
  });

  it('rejects --json with --human', () => {
    expect(() => resolveFormat({ json: true, human: true })).toThrow('--json and --human are mutually exclusive');
  });
});
