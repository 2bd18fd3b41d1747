/**
 * CLI archive command.
 */

import { Command } from 'commander';
import { taskArchive } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTask } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

export function registerArchiveCommand(program: Command): void {
  program
    .command('archive <taskId>')
    .description('Ensure a completed task sits in the archive partition')
    .action(async (taskId: string) => {
      emitResult(await taskArchive(projectRoot(), taskId), 'tasks.archive', renderTask);
    });
}
