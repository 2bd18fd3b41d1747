/**
 * CLI list command.
 */

import { Command, Option } from 'commander';
import type { TaskPriority, TaskStatus } from '../../store/status-registry.js';
import type { Partition } from '../../types/task.js';
import { taskList } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderList } from '../renderers/tasks.js';
import { parsePriority, parseStatus, projectRoot } from '../options.js';

interface ListOptions {
  status?: TaskStatus;
  priority?: TaskPriority;
  category?: string;
  partition: Partition | 'all';
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List tasks in id order')
    .option('-s, --status <status>', 'Filter by status', parseStatus)
    .option('-p, --priority <priority>', 'Filter by priority', parsePriority)
    .option('-c, --category <category>', 'Filter by category')
    .addOption(
      new Option('--partition <partition>', 'Which partition to read')
        .choices(['active', 'archive', 'all'])
        .default('all'),
    )
    .action(async (opts: ListOptions) => {
      const response = await taskList(projectRoot(), {
        status: opts.status,
        priority: opts.priority,
        category: opts.category,
        partition: opts.partition,
      });
      emitResult(response, 'tasks.list', renderList);
    });
}
