/**
 * Central output dispatch for CLI commands.
 *
 * Commands hand their engine result to emitResult(). It checks the resolved
 * format and prints either the JSON envelope or the command's human
 * renderer, and on failure sets the process exit code from the error.
 */

import { getFormatContext } from '../format-context.js';
import { formatSuccess, formatError, type EnvelopeError } from '../../core/output.js';
import type { IntegrityWarning } from '../../types/task.js';
import type { EngineResult } from '../../dispatch/engines/_error.js';
import { YELLOW, NC } from './colors.js';
import { renderGeneric } from './system.js';

/** Turns a command's result data into terminal text. */
export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

export interface CliOutputOptions<T> {
  /** Operation name for the envelope _meta (e.g. 'tasks.add'). */
  operation: string;
  render?: HumanRenderer<T>;
  message?: string;
  warnings?: IntegrityWarning[];
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 * In human mode, soft warnings go to stderr so stdout stays parseable.
 */
export function cliOutput<T>(data: T, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = opts.render ? opts.render(data, ctx.quiet) : renderGeneric(data, ctx.quiet);
    if (text) console.log(text);
    if (!ctx.quiet) {
      for (const w of opts.warnings ?? []) {
        console.error(`${YELLOW}warning${NC} ${w.code}: ${w.message}`);
      }
    }
    return;
  }

  console.log(formatSuccess(data, opts.operation, { message: opts.message, warnings: opts.warnings }));
}

/**
 * Output an error in the resolved format.
 * For JSON: the error envelope on stdout. For human: a plain message on stderr.
 */
export function cliError(error: EnvelopeError, operation: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message} (${error.code})`);
    if (error.fix) console.error(`Fix: ${error.fix}`);
    return;
  }

  console.log(formatError(error, operation));
}

/**
 * Print an engine result and set the exit code on failure. Returns whether
 * the result was a success.
 */
export function emitResult<T>(
  response: EngineResult<T>,
  operation: string,
  render?: HumanRenderer<T>,
): boolean {
  if (!response.success || response.data === undefined) {
    const error = response.error ?? {
      code: 'E_GENERAL',
      kind: 'InternalError',
      message: 'Unknown error',
      exitCode: 1,
    };
    cliError(error, operation);
    process.exitCode = error.exitCode;
    return false;
  }
  cliOutput(response.data, { operation, render, warnings: response.warnings });
  return true;
}
