/**
 * CLI next and rank commands.
 */

import { Command } from 'commander';
import { taskNext, taskRank } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderNext, renderRank } from '../renderers/tasks.js';
import { parseCount, projectRoot } from '../options.js';

export function registerNextCommand(program: Command): void {
  program
    .command('next')
    .description('The best eligible pending task to start')
    .action(async () => {
      emitResult(await taskNext(projectRoot()), 'tasks.next', renderNext);
    });

  program
    .command('rank')
    .description('Every eligible pending task in scheduling order')
    .option('-l, --limit <n>', 'Show at most n tasks', parseCount)
    .action(async (opts: { limit?: number }) => {
      emitResult(await taskRank(projectRoot(), opts.limit), 'tasks.rank', renderRank);
    });
}
