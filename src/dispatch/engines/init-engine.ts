/**
 * Init Engine
 *
 * Thin wrapper around src/core/init.ts.
 */

import { initProject, type InitOptions, type InitResult } from '../../core/init.js';
import { attempt, type EngineResult } from './_error.js';

export async function initBacklog(projectRoot: string, options: InitOptions = {}): Promise<EngineResult<InitResult>> {
  return attempt(() => initProject(projectRoot, options));
}
