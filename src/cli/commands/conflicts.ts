/**
 * CLI conflicts command.
 */

import { Command } from 'commander';
import { taskConflicts } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderConflicts } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

export function registerConflictsCommand(program: Command): void {
  program
    .command('conflicts [taskIds...]')
    .description('Footprint conflicts and admissible groups (default: every eligible pending task)')
    .action(async (taskIds: string[]) => {
      emitResult(await taskConflicts(projectRoot(), taskIds), 'orchestrate.conflicts', renderConflicts);
    });
}
