/**
 * CLI deps command group: blocking edges between tasks.
 */

import { Command } from 'commander';
import { depsAdd, depsRemove, depsShow, depsValidate } from '../../dispatch/engines/task-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderBlocker, renderDeps, renderGraphValidation } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

export function registerDepsCommand(program: Command): void {
  const deps = program
    .command('deps')
    .description('Dependency graph operations');

  deps
    .command('add <taskId> <blockerId>')
    .description('Make <taskId> wait for <blockerId> (rejected if it would form a cycle)')
    .action(async (taskId: string, blockerId: string) => {
      emitResult(await depsAdd(projectRoot(), taskId, blockerId), 'tasks.deps.add', renderBlocker);
    });

  deps
    .command('remove <taskId> <blockerId>')
    .description('Remove a blocking edge')
    .action(async (taskId: string, blockerId: string) => {
      emitResult(await depsRemove(projectRoot(), taskId, blockerId), 'tasks.deps.remove', renderBlocker);
    });

  deps
    .command('show <taskId>')
    .description('Blockers, upstream chain and the tasks this one unblocks')
    .action(async (taskId: string) => {
      emitResult(await depsShow(projectRoot(), taskId), 'tasks.deps.show', renderDeps);
    });

  deps
    .command('validate')
    .description('Report dangling references and cycles in stored data')
    .action(async () => {
      emitResult(await depsValidate(projectRoot()), 'tasks.deps.validate', renderGraphValidation);
    });
}
