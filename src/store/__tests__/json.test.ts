/**
 * Tests for JSON and JSONL helpers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { ExitCode } from '../../types/exit-codes.js';
import {
  readJson,
  readJsonRequired,
  readJsonl,
  appendJsonl,
  saveJson,
  computeChecksum,
} from '../json.js';

const PointSchema = z.object({ x: z.number(), y: z.number() });

let tempDir: string;

describe('json helpers', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'backlog-jsonio-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns null for a missing file', async () => {
    expect(await readJson(join(tempDir, 'missing.json'), PointSchema)).toBeNull();
  });

  it('fails with NOT_FOUND when a required file is missing', async () => {
    await expect(readJsonRequired(join(tempDir, 'missing.json'), PointSchema)).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
    });
  });

  it('saves and reads back a validated value', async () => {
    const path = join(tempDir, 'nested', 'point.json');
    await saveJson(path, { x: 1, y: 2 });

    expect(await readJson(path, PointSchema)).toEqual({ x: 1, y: 2 });
    expect(await readFile(path, 'utf8')).toBe('{\n  "x": 1,\n  "y": 2\n}\n');
  });

  it('rejects malformed JSON', async () => {
    const path = join(tempDir, 'broken.json');
    await writeFile(path, '{ "x": 1,');
    await expect(readJson(path, PointSchema)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      message: `Invalid JSON in: ${path}`,
    });
  });

  it('reports schema issues with their paths', async () => {
    const path = join(tempDir, 'wrong.json');
    await writeFile(path, JSON.stringify({ x: 1, y: 'two' }));
    await expect(readJson(path, PointSchema)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      details: { issues: ['y: Expected number, received string'] },
    });
  });

  it('appends JSONL entries in order', async () => {
    const path = join(tempDir, 'points.jsonl');
    await appendJsonl(path, { x: 1, y: 1 });
    await appendJsonl(path, { x: 2, y: 2 });

    expect(await readFile(path, 'utf8')).toBe('{"x":1,"y":1}\n{"x":2,"y":2}\n');
    expect(await readJsonl(path, PointSchema)).toEqual([{ x: 1, y: 1 }, { x: 2, y: 2 }]);
  });

  it('reads a missing JSONL file as empty', async () => {
    expect(await readJsonl(join(tempDir, 'none.jsonl'), PointSchema)).toEqual([]);
  });

  it('computes a stable 16-character checksum', () => {
    const a = computeChecksum({ tasks: [], archive: [] });
    expect(a).toMatch(/^[0-9a-f]{16}$/);
    expect(computeChecksum({ tasks: [], archive: [] })).toBe(a);
    expect(computeChecksum({ tasks: [1], archive: [] })).not.toBe(a);
  });
});
