/**
 * CLI add command.
 */

import { Command } from 'commander';
import type { TaskPriority } from '../../store/status-registry.js';
import { taskAdd } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderAdd } from '../renderers/tasks.js';
import { collect, parseList, parsePriority, projectRoot } from '../options.js';

interface AddOptions {
  priority?: TaskPriority;
  category?: string;
  blockedBy?: string[];
  files?: string[];
  acceptance?: string[];
  actor?: string;
}

export function registerAddCommand(program: Command): void {
  program
    .command('add <title>')
    .description('Create a new pending task')
    .option('-p, --priority <priority>', 'Priority tier: P1, P2, P3, P4 (default P3)', parsePriority)
    .option('-c, --category <category>', 'Category (slice) used for tie-breaks and reporting')
    .option('-b, --blocked-by <ids>', 'Comma-separated ids of blocking tasks', parseList)
    .option('-f, --files <resources>', 'Comma-separated resource footprint (usually file paths)', parseList)
    .option('-a, --acceptance <criterion>', 'Acceptance criterion (repeatable)', collect)
    .option('--actor <name>', 'Who is making the change (recorded in the audit log)')
    .action(async (title: string, opts: AddOptions) => {
      const response = await taskAdd(projectRoot(), {
        title,
        priority: opts.priority,
        category: opts.category,
        blockedBy: opts.blockedBy,
        resourceFootprint: opts.files,
        acceptanceCriteria: opts.acceptance,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.add', renderAdd);
    });
}
