/**
 * CLI block and unblock commands.
 */

import { Command } from 'commander';
import { taskBlock, taskUnblock } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTransition } from '../renderers/tasks.js';
import { parseCount, projectRoot } from '../options.js';

interface BlockOptions {
  note?: string;
  expectVersion?: number;
  actor?: string;
}

export function registerBlockCommand(program: Command): void {
  program
    .command('block <taskId>')
    .description('Mark a task blocked')
    .option('-n, --note <note>', 'Why the task is blocked')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .option('--actor <name>', 'Who is making the change')
    .action(async (taskId: string, opts: BlockOptions) => {
      const response = await taskBlock(projectRoot(), taskId, {
        note: opts.note,
        expectedVersion: opts.expectVersion,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.block', renderTransition);
    });

  program
    .command('unblock <taskId>')
    .description('Return a blocked task to pending')
    .option('-n, --note <note>', 'Progress note')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .option('--actor <name>', 'Who is making the change')
    .action(async (taskId: string, opts: BlockOptions) => {
      const response = await taskUnblock(projectRoot(), taskId, {
        note: opts.note,
        expectedVersion: opts.expectVersion,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.unblock', renderTransition);
    });
}
