/**
 * CLI learn command group: the learning ledger.
 */

import { Command } from 'commander';
import { learnAdd, learnList, learnStats } from '../../dispatch/engines/memory-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderLearning, renderLearningList, renderLearningStats } from '../renderers/system.js';
import { parseCount, projectRoot } from '../options.js';

interface LearnAddOptions {
  task?: string;
  context: string;
  applied?: string;
}

interface LearnListOptions {
  task?: string;
  query?: string;
  limit?: number;
  general?: boolean;
}

export function registerLearnCommand(program: Command): void {
  const learn = program
    .command('learn')
    .description('Append-only learning ledger');

  learn
    .command('add <insight>')
    .description('Record a learning, optionally linked to a task')
    .requiredOption('--context <context>', 'Where the insight came from')
    .option('-t, --task <taskId>', 'Link to a task')
    .option('--applied <action>', 'What was done about it')
    .action(async (insight: string, opts: LearnAddOptions) => {
      const response = await learnAdd(projectRoot(), {
        insight,
        context: opts.context,
        taskId: opts.task,
        appliedAction: opts.applied,
      });
      emitResult(response, 'memory.add', renderLearning);
    });

  learn
    .command('list')
    .description('List learnings (append order)')
    .option('-t, --task <taskId>', 'Only entries linked to this task')
    .option('--general', 'Only entries linked to no task')
    .option('-q, --query <text>', 'Case-insensitive substring search')
    .option('-l, --limit <n>', 'Keep the last n matches', parseCount)
    .action(async (opts: LearnListOptions) => {
      const response = await learnList(projectRoot(), {
        taskId: opts.task,
        query: opts.query,
        limit: opts.limit,
        general: opts.general,
      });
      emitResult(response, 'memory.list', renderLearningList);
    });

  learn
    .command('stats')
    .description('Ledger totals')
    .action(async () => {
      emitResult(await learnStats(projectRoot()), 'memory.stats', renderLearningStats);
    });
}
