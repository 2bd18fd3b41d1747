/**
 * Tests for the configuration cascade: defaults < global < project < env.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ExitCode } from '../../types/exit-codes.js';
import { loadConfig, getConfigValue, setConfigValue, DEFAULTS } from '../config.js';

let tempDir: string;
let projectDir: string;
let homeDir: string;
const savedEnv = { ...process.env };

async function writeConfig(dir: string, value: unknown): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'config.json'), JSON.stringify(value));
}

describe('config', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'backlog-config-'));
    projectDir = join(tempDir, 'project');
    homeDir = join(tempDir, 'home');
    await mkdir(projectDir, { recursive: true });
    process.env['BACKLOG_HOME'] = homeDir;
    delete process.env['BACKLOG_DIR'];
    delete process.env['BACKLOG_MODULE_OVERLAP'];
  });

  afterEach(async () => {
    process.env = { ...savedEnv };
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('falls back to defaults', async () => {
      const config = await loadConfig(projectDir);
      // The test environment sets BACKLOG_LOG_LEVEL=silent
      expect(config).toEqual({ ...DEFAULTS, logging: { ...DEFAULTS.logging, level: 'silent' } });
    });

    it('layers project config over global config', async () => {
      await writeConfig(homeDir, { conflicts: { moduleOverlap: 'warn' }, backup: { maxOperationalBackups: 3 } });
      await writeConfig(join(projectDir, '.backlog'), { conflicts: { moduleDepth: 3 }, backup: { maxOperationalBackups: 4 } });

      const config = await loadConfig(projectDir);
      expect(config.conflicts).toEqual({ moduleOverlap: 'warn', moduleDepth: 3 });
      expect(config.backup.maxOperationalBackups).toBe(4);
    });

    it('lets environment variables win', async () => {
      await writeConfig(join(projectDir, '.backlog'), { conflicts: { moduleOverlap: 'warn' } });
      process.env['BACKLOG_MODULE_OVERLAP'] = 'block';
      process.env['BACKLOG_STALE_AFTER_MINUTES'] = '45';

      const config = await loadConfig(projectDir);
      expect(config.conflicts.moduleOverlap).toBe('block');
      expect(config.session.staleAfterMinutes).toBe(45);
    });

    it('rejects an invalid merged config', async () => {
      await writeConfig(join(projectDir, '.backlog'), { conflicts: { moduleOverlap: 'sometimes' } });
      await expect(loadConfig(projectDir)).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
    });
  });

  describe('getConfigValue', () => {
    it('reports which layer a value came from', async () => {
      await writeConfig(homeDir, { conflicts: { moduleDepth: 2 }, session: { staleAfterMinutes: 30 } });
      await writeConfig(join(projectDir, '.backlog'), { conflicts: { moduleDepth: 3 } });

      expect(await getConfigValue('conflicts.moduleDepth', projectDir)).toEqual({ value: 3, source: 'project' });
      expect(await getConfigValue('session.staleAfterMinutes', projectDir)).toEqual({ value: 30, source: 'global' });
      expect(await getConfigValue('lock.retries', projectDir)).toEqual({ value: 12, source: 'default' });
      expect(await getConfigValue('logging.level', projectDir)).toEqual({ value: 'silent', source: 'env' });
    });

    it('fails with NOT_FOUND for an unknown key', async () => {
      await expect(getConfigValue('nope.missing', projectDir)).rejects.toMatchObject({
        code: ExitCode.NOT_FOUND,
        message: 'Unknown config key: nope.missing',
      });
    });
  });

  describe('setConfigValue', () => {
    it('writes a project value and coerces strings', async () => {
      const result = await setConfigValue('backup.maxOperationalBackups', '7', { cwd: projectDir });
      expect(result).toEqual({ path: 'backup.maxOperationalBackups', value: 7, scope: 'project' });

      const stored = JSON.parse(await readFile(join(projectDir, '.backlog', 'config.json'), 'utf8'));
      expect(stored).toEqual({ backup: { maxOperationalBackups: 7 } });
      expect((await loadConfig(projectDir)).backup.maxOperationalBackups).toBe(7);
    });

    it('writes to the global file when asked', async () => {
      const result = await setConfigValue('conflicts.moduleOverlap', 'warn', { cwd: projectDir, global: true });
      expect(result.scope).toBe('global');
      expect(JSON.parse(await readFile(join(homeDir, 'config.json'), 'utf8'))).toEqual({
        conflicts: { moduleOverlap: 'warn' },
      });
    });

    it('refuses a value that would not validate', async () => {
      await expect(setConfigValue('conflicts.moduleOverlap', 'sometimes', { cwd: projectDir })).rejects.toMatchObject({
        code: ExitCode.CONFIG_ERROR,
      });
      await expect(readFile(join(projectDir, '.backlog', 'config.json'), 'utf8')).rejects.toThrow();
    });

    it('refuses an unknown key', async () => {
      await expect(setConfigValue('colour', 'blue', { cwd: projectDir })).rejects.toMatchObject({
        code: ExitCode.NOT_FOUND,
      });
    });
  });
});
