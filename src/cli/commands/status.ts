/**
 * CLI status command: the derived index summary.
 */

import { Command } from 'commander';
import { taskStatus } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderStatus } from '../renderers/system.js';
import { projectRoot } from '../options.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Counts per status, active tasks, open session and stale work')
    .action(async () => {
      emitResult(await taskStatus(projectRoot()), 'admin.status', renderStatus);
    });
}
