/**
 * CLI check command: tick or untick one acceptance criterion.
 */

import { Command } from 'commander';
import { taskCheck } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTask } from '../renderers/tasks.js';
import { parseCount, projectRoot } from '../options.js';

interface CheckOptions {
  uncheck?: boolean;
  expectVersion?: number;
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check <taskId> <index>')
    .description('Mark acceptance criterion <index> (0-based) as checked')
    .option('-u, --uncheck', 'Clear the criterion instead')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .action(async (taskId: string, index: string, opts: CheckOptions) => {
      const response = await taskCheck(
        projectRoot(), taskId, parseCount(index), !opts.uncheck, opts.expectVersion,
      );
      emitResult(response, 'tasks.check', renderTask);
    });
}
