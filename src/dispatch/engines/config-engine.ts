/**
 * Config Engine
 *
 * Thin wrapper around core config operations.
 * Business logic lives in src/core/config.ts.
 */

import { loadConfig, getConfigValue, setConfigValue } from '../../core/config.js';
import type { BacklogConfig, ResolvedValue } from '../../types/config.js';
import { attempt, type EngineResult } from './_error.js';

/**
 * Get one config value (dot-notation) with its source, or the fully
 * resolved config when no key is given.
 */
export async function configGet(
  projectRoot: string,
  key?: string,
): Promise<EngineResult<ResolvedValue<unknown> | BacklogConfig>> {
  return attempt<ResolvedValue<unknown> | BacklogConfig>(() => (key ? getConfigValue(key, projectRoot) : loadConfig(projectRoot)));
}

/**
 * Set a config value by key (dot-notation supported)
 */
export async function configSet(
  projectRoot: string,
  key: string,
  value: unknown,
  global = false,
): Promise<EngineResult<{ path: string; value: unknown; scope: 'project' | 'global' }>> {
  return attempt(() => setConfigValue(key, value, { cwd: projectRoot, global }));
}
