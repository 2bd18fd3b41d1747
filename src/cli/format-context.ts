/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { FormatResolution } from './middleware/output-format.js';

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FormatResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

/** Set the resolved format for this CLI invocation. */
export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FormatResolution {
  return currentResolution;
}
