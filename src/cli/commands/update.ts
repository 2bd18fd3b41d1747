/**
 * CLI update command.
 */

import { Command } from 'commander';
import type { TaskPriority } from '../../store/status-registry.js';
import { taskUpdate } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderUpdate } from '../renderers/tasks.js';
import { collect, parseCount, parseList, parsePriority, projectRoot } from '../options.js';

interface UpdateOptions {
  title?: string;
  priority?: TaskPriority;
  category?: string;
  clearCategory?: boolean;
  files?: string[];
  acceptance?: string[];
  note?: string;
  expectVersion?: number;
  actor?: string;
}

export function registerUpdateCommand(program: Command): void {
  program
    .command('update <taskId>')
    .description('Edit title, priority, category or footprint, add criteria or a note')
    .option('-t, --title <title>', 'New title')
    .option('-p, --priority <priority>', 'New priority (P1 is exclusive; see promote)', parsePriority)
    .option('-c, --category <category>', 'New category')
    .option('--clear-category', 'Remove the category')
    .option('-f, --files <resources>', 'Replace the resource footprint (comma-separated)', parseList)
    .option('-a, --acceptance <criterion>', 'Append an acceptance criterion (repeatable)', collect)
    .option('-n, --note <note>', 'Append a progress note')
    .option('--expect-version <n>', 'Fail if the task changed since this version', parseCount)
    .option('--actor <name>', 'Who is making the change')
    .action(async (taskId: string, opts: UpdateOptions) => {
      const response = await taskUpdate(projectRoot(), {
        taskId,
        expectedVersion: opts.expectVersion,
        title: opts.title,
        priority: opts.priority,
        category: opts.clearCategory ? null : opts.category,
        resourceFootprint: opts.files,
        addCriteria: opts.acceptance,
        note: opts.note,
        actor: opts.actor,
      });
      emitResult(response, 'tasks.update', renderUpdate);
    });
}
