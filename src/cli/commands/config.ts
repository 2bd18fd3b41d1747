/**
 * CLI config command - configuration management.
 */

import { Command } from 'commander';
import { configGet, configSet } from '../../dispatch/engines/config-engine.js';
import { emitResult } from '../renderers/index.js';
import { projectRoot } from '../options.js';

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Configuration management');

  config
    .command('get [key]')
    .description('Get a value (dot-notation) with its source, or the whole resolved config')
    .action(async (key: string | undefined) => {
      emitResult(await configGet(projectRoot(), key), 'admin.config.get');
    });

  config
    .command('set <key> <value>')
    .description('Set a value in the project (or --global) config file')
    .option('-g, --global', 'Write ~/.backlog/config.json instead')
    .action(async (key: string, value: string, opts: { global?: boolean }) => {
      const response = await configSet(projectRoot(), key, value, opts.global === true);
      emitResult(response, 'admin.config.set');
    });
}
