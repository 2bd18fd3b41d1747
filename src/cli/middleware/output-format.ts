/**
 * Resolve the output format from --human/--json/--quiet flags.
 *
 * Precedence: explicit flag > configured default (output.defaultFormat,
 * which already folds in BACKLOG_FORMAT) > json.
 */

import type { OutputFormat } from '../../types/config.js';
import { BacklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Resolved format with where it came from. */
export interface FormatResolution {
  format: OutputFormat;
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

/**
 * Resolve output format from Commander.js option values.
 *
 * @param opts - parsed options (global flags included)
 * @param configured - output.defaultFormat from the resolved config
 */
export function resolveFormat(opts: Record<string, unknown>, configured?: OutputFormat): FormatResolution {
  const json = opts['json'] === true;
  const human = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (json && human) {
    throw new BacklogError(ExitCode.INVALID_INPUT, '--json and --human are mutually exclusive');
  }
  if (json) return { format: 'json', source: 'flag', quiet };
  if (human) return { format: 'human', source: 'flag', quiet };
  if (configured) return { format: configured, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
