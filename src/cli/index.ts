#!/usr/bin/env node
/**
 * `backlog` CLI entry point.
 */

import { createProgram } from './program.js';

const [major] = process.versions.node.split('.').map(Number);
if (major === undefined || major < 20) {
  process.stderr.write(`Error: backlog requires Node.js v20+ but found v${process.versions.node}\n`);
  process.exit(1);
}

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
