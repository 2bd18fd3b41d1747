/**
 * CLI complete and reopen commands.
 */

import { Command } from 'commander';
import { taskComplete, taskReopen } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTask, renderTransition } from '../renderers/tasks.js';
import { parseCount, projectRoot } from '../options.js';

interface CompleteOptions {
  note?: string;
  force?: boolean;
  expectVersion?: number;
  actor?: string;
}

export function registerCompleteCommand(program: Command): void {
  program
    .command('complete <taskId>')
    .alias('done')
    .description('Complete an in-progress task and move it to the archive partition')
    .option('-n, --note <note>', 'Completion note')
    .option('--force', 'Complete despite unchecked acceptance criteria (recorded in the log)')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .option('--actor <name>', 'Who is making the change')
    .action(async (taskId: string, opts: CompleteOptions) => {
      const response = await taskComplete(projectRoot(), taskId, {
        note: opts.note,
        override: opts.force,
        expectedVersion: opts.expectVersion,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.complete', renderTransition);
    });

  program
    .command('reopen <taskId> <reason>')
    .description('Return a completed task to pending, recording why')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .action(async (taskId: string, reason: string, opts: Pick<CompleteOptions, 'expectVersion'>) => {
      const response = await taskReopen(projectRoot(), taskId, reason, opts.expectVersion);
      emitResult(response, 'tasks.reopen', renderTask);
    });
}
