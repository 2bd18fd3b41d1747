/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { BacklogConfig, ConfigSource, ResolvedValue } from '../types/config.js';
import { readJson, saveJson } from '../store/json.js';
import { BacklogError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';

/** Default configuration values. */
export const DEFAULTS: BacklogConfig = {
  version: '1.0.0',
  output: {
    defaultFormat: 'json',
  },
  backup: {
    maxOperationalBackups: 10,
  },
  logging: {
    level: 'info',
    filePath: 'logs/backlog.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  lock: {
    retries: 12,
    staleMs: 10_000,
  },
  session: {
    staleAfterMinutes: 120,
  },
  conflicts: {
    moduleOverlap: 'off',
    moduleDepth: 1,
  },
};

const ConfigSchema = z.object({
  version: z.string(),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
  }),
  backup: z.object({
    maxOperationalBackups: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  lock: z.object({
    retries: z.number().int().min(0),
    staleMs: z.number().int().positive(),
  }),
  session: z.object({
    staleAfterMinutes: z.number().positive(),
  }),
  conflicts: z.object({
    moduleOverlap: z.enum(['off', 'warn', 'block']),
    moduleDepth: z.number().int().positive(),
  }),
}) satisfies z.ZodType<BacklogConfig>;

/** Config files are free-form objects until merged and validated. */
const RawConfigSchema = z.record(z.string(), z.unknown());
type RawConfig = z.infer<typeof RawConfigSchema>;

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'BACKLOG_FORMAT': 'output.defaultFormat',
  'BACKLOG_LOG_LEVEL': 'logging.level',
  'BACKLOG_LOG_FILE': 'logging.filePath',
  'BACKLOG_STALE_AFTER_MINUTES': 'session.staleAfterMinutes',
  'BACKLOG_MODULE_OVERLAP': 'conflicts.moduleOverlap',
  'BACKLOG_MODULE_DEPTH': 'conflicts.moduleDepth',
  'BACKLOG_MAX_BACKUPS': 'backup.maxOperationalBackups',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }
  return result;
}

/** Coerce a string to boolean, number or string (env vars, CLI input). */
function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/** Defaults as a plain object, for merging and path lookups. */
function defaultsRecord(): RawConfig {
  return RawConfigSchema.parse(structuredClone(DEFAULTS));
}

function readRawConfig(path: string): Promise<RawConfig | null> {
  return readJson(path, RawConfigSchema);
}

function validateConfig(merged: Record<string, unknown>): BacklogConfig {
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new BacklogError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { fix: "Check .backlog/config.json, ~/.backlog/config.json and BACKLOG_* variables" },
    );
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<BacklogConfig> {
  let merged: Record<string, unknown> = defaultsRecord();

  const globalConfig = await readRawConfig(getGlobalConfigPath());
  if (globalConfig) merged = deepMerge(merged, globalConfig);

  const projectConfig = await readRawConfig(getConfigPath(cwd));
  if (projectConfig) merged = deepMerge(merged, projectConfig);

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseConfigValue(envValue));
    }
  }

  return validateConfig(merged);
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  cwd?: string,
): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseConfigValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, file] of layers) {
    const config = await readRawConfig(file);
    const val = config ? getNestedValue(config, path) : undefined;
    if (val !== undefined) return { value: val, source };
  }

  const defaultVal = getNestedValue(defaultsRecord(), path);
  if (defaultVal === undefined) {
    throw new BacklogError(ExitCode.NOT_FOUND, `Unknown config key: ${path}`);
  }
  return { value: defaultVal, source: 'default' };
}

/**
 * Set a config value in the project (or global) config file. The merged
 * result must still validate, otherwise nothing is written.
 */
export async function setConfigValue(
  path: string,
  value: unknown,
  options: { cwd?: string; global?: boolean } = {},
): Promise<{ path: string; value: unknown; scope: 'project' | 'global' }> {
  if (getNestedValue(defaultsRecord(), path) === undefined) {
    throw new BacklogError(ExitCode.NOT_FOUND, `Unknown config key: ${path}`);
  }
  const file = options.global ? getGlobalConfigPath() : getConfigPath(options.cwd);
  const config: Record<string, unknown> = (await readRawConfig(file)) ?? {};
  const parsed = typeof value === 'string' ? parseConfigValue(value) : value;
  setNestedValue(config, path, parsed);

  validateConfig(deepMerge(defaultsRecord(), config));
  await saveJson(file, config);
  return { path, value: parsed, scope: options.global ? 'global' : 'project' };
}
