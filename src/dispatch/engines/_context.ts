/**
 * Shared engine plumbing: resolve configuration once per call and open the
 * accessor with the configured lock and backup settings.
 */

import { loadConfig } from '../../core/config.js';
import { getAccessor, type DataAccessor } from '../../store/data-accessor.js';
import type { BacklogConfig } from '../../types/config.js';

/** What every engine call works against. */
export interface BacklogContext {
  accessor: DataAccessor;
  config: BacklogConfig;
}

/** Load config for `projectRoot` and open its data accessor. */
export async function openBacklog(projectRoot: string): Promise<BacklogContext> {
  const config = await loadConfig(projectRoot);
  const accessor = await getAccessor(projectRoot, {
    lock: { stale: config.lock.staleMs, retries: config.lock.retries },
    maxBackups: config.backup.maxOperationalBackups,
  });
  return { accessor, config };
}

/** Open the backlog, run `fn`, and always close the accessor. */
export async function withBacklog<T>(
  projectRoot: string,
  fn: (ctx: BacklogContext) => Promise<T>,
): Promise<T> {
  const ctx = await openBacklog(projectRoot);
  try {
    return await fn(ctx);
  } finally {
    await ctx.accessor.close();
  }
}
