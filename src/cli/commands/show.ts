/**
 * CLI show command.
 */

import { Command } from 'commander';
import { taskShow } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderShow } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

export function registerShowCommand(program: Command): void {
  program
    .command('show <taskId>')
    .description('Show a task from either partition')
    .action(async (taskId: string) => {
      emitResult(await taskShow(projectRoot(), taskId), 'tasks.show', renderShow);
    });
}
