/**
 * Builds the `backlog` commander program. Kept apart from the entry point so
 * tests can drive the full command tree in process.
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';
import { registerInitCommand } from './commands/init.js';
import { registerAddCommand } from './commands/add.js';
import { registerShowCommand } from './commands/show.js';
import { registerListCommand } from './commands/list.js';
import { registerUpdateCommand } from './commands/update.js';
import { registerCheckCommand } from './commands/check.js';
import { registerStartCommand } from './commands/start.js';
import { registerBlockCommand } from './commands/block.js';
import { registerCompleteCommand } from './commands/complete.js';
import { registerArchiveCommand } from './commands/archive.js';
import { registerPromoteCommand } from './commands/promote.js';
import { registerDepsCommand } from './commands/deps.js';
import { registerNextCommand } from './commands/next.js';
import { registerConflictsCommand } from './commands/conflicts.js';
import { registerSessionCommand } from './commands/session.js';
import { registerReconcileCommand } from './commands/reconcile.js';
import { registerLearnCommand } from './commands/learn.js';
import { registerStatusCommand } from './commands/status.js';
import { registerConfigCommand } from './commands/config.js';
import { resolveFormat } from './middleware/output-format.js';
import { setFormatContext } from './format-context.js';
import { projectRoot } from './options.js';
import { initLogger } from '../core/logger.js';
import { loadConfig } from '../core/config.js';
import { getDataDir } from '../core/paths.js';
import type { OutputFormat } from '../types/config.js';

const PackageJsonSchema = z.object({ version: z.string() });

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
    const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
    const pkg = PackageJsonSchema.parse(JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8')));
    return pkg.version;
  } catch {
    return '0.0.0';
  }
}

export interface ProgramOptions {
  /** Start the file logger in the preAction hook (default true). */
  logging?: boolean;
}

/** Create the CLI program with every command registered. */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('backlog')
    .description('Task backlog orchestration: lifecycle, dependencies, admission control and prioritisation')
    .version(getPackageVersion())
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting');

  registerInitCommand(program);

  // Task records
  registerAddCommand(program);
  registerShowCommand(program);
  registerListCommand(program);
  registerUpdateCommand(program);
  registerCheckCommand(program);
  registerPromoteCommand(program);

  // Lifecycle
  registerStartCommand(program);
  registerBlockCommand(program);
  registerCompleteCommand(program);
  registerArchiveCommand(program);

  // Graph, scheduling, conflicts
  registerDepsCommand(program);
  registerNextCommand(program);
  registerConflictsCommand(program);
  registerReconcileCommand(program);

  registerSessionCommand(program);
  registerLearnCommand(program);
  registerStatusCommand(program);
  registerConfigCommand(program);

  // Resolve config once, start the file logger, then fix the output format.
  // A broken config file must not stop the command from reporting it: the
  // engines surface the validation error themselves.
  let loggerInitialized = false;
  program.hook('preAction', async (thisCommand, actionCommand) => {
    let configured: OutputFormat | undefined;
    try {
      const config = await loadConfig(projectRoot());
      configured = config.output.defaultFormat;
      if (options.logging !== false && !loggerInitialized) {
        loggerInitialized = true;
        initLogger(getDataDir(projectRoot()), config.logging);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Warning: configuration not loaded: ${message}\n`);
    }

    try {
      setFormatContext(resolveFormat(actionCommand.optsWithGlobals(), configured));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      thisCommand.error(`error: ${message}`, { exitCode: 2, code: 'backlog.format' });
    }
  });

  return program;
}
