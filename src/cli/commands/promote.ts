/**
 * CLI promote command.
 */

import { Command } from 'commander';
import { taskPromote } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderPromote } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

export function registerPromoteCommand(program: Command): void {
  program
    .command('promote <taskId>')
    .description('Make a task the single P1; the previous holder drops to P2')
    .action(async (taskId: string) => {
      emitResult(await taskPromote(projectRoot(), taskId), 'tasks.promote', renderPromote);
    });
}
