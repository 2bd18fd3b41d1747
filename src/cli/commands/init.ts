/**
 * CLI init command - project initialization.
 *
 * Thin handler: parse args -> call engine -> format output.
 * All business logic lives in src/core/init.ts.
 */

import { Command } from 'commander';
import { initBacklog } from '../../dispatch/engines/init-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderInit } from '../renderers/system.js';
import { projectRoot } from '../options.js';

interface InitCommandOptions {
  name?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create the .backlog data directory for this project')
    .option('--name <name>', 'Project name (defaults to the directory name)')
    .option('--force', 'Overwrite config.json with defaults (tasks.json is never overwritten)')
    .action(async (opts: InitCommandOptions) => {
      const response = await initBacklog(projectRoot(), { name: opts.name, force: opts.force });
      emitResult(response, 'admin.init', renderInit);
    });
}
