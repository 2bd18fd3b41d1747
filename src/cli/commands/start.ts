/**
 * CLI start command.
 */

import { Command } from 'commander';
import { taskStart } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTransition } from '../renderers/tasks.js';
import { parseCount, projectRoot } from '../options.js';

interface StartOptions {
  note?: string;
  session?: string;
  expectVersion?: number;
  actor?: string;
}

export function registerStartCommand(program: Command): void {
  program
    .command('start <taskId>')
    .description('Move a pending task to in_progress (dependencies and admission are checked)')
    .option('-n, --note <note>', 'Progress note')
    .option('--session <sessionId>', 'Require the task to belong to this parallel session')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .option('--actor <name>', 'Who is making the change')
    .action(async (taskId: string, opts: StartOptions) => {
      const response = await taskStart(projectRoot(), taskId, {
        note: opts.note,
        sessionId: opts.session,
        expectedVersion: opts.expectVersion,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.start', renderTransition);
    });
}
