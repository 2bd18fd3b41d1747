/**
 * CLI reconcile command.
 *
 * Evidence is a JSON object mapping criterion text to an observed boolean,
 * read from a file or given inline.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import { z } from 'zod';
import { taskReconcile } from '../../dispatch/engines/task-engine.js';
import { engineError, type EngineResult } from '../../dispatch/engines/_error.js';
import type { Evidence, ReconcileReport } from '../../core/tasks/reconcile.js';
import { emitResult } from '../renderers/index.js';
import { renderReconcile } from '../renderers/tasks.js';
import { projectRoot } from '../options.js';

const EvidenceSchema = z.record(z.boolean());

interface ReconcileOptions {
  evidence?: string;
  json?: string;
}

async function loadEvidence(opts: ReconcileOptions): Promise<Evidence> {
  const raw = opts.json ?? (opts.evidence ? await readFile(opts.evidence, 'utf-8') : '{}');
  return EvidenceSchema.parse(JSON.parse(raw));
}

export function registerReconcileCommand(program: Command): void {
  program
    .command('reconcile <taskId>')
    .description('Classify drift between recorded criteria and observed evidence')
    .option('-e, --evidence <file>', 'JSON file: { "<criterion text>": true|false }')
    .option('--evidence-json <json>', 'The same object inline')
    .action(async (taskId: string, opts: { evidence?: string; evidenceJson?: string }) => {
      let evidence: Evidence;
      try {
        evidence = await loadEvidence({ evidence: opts.evidence, json: opts.evidenceJson });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        const failed: EngineResult<ReconcileReport> = engineError('E_INVALID_INPUT', `Invalid evidence: ${message}`);
        emitResult(failed, 'tasks.reconcile', renderReconcile);
        return;
      }
      emitResult(await taskReconcile(projectRoot(), taskId, evidence), 'tasks.reconcile', renderReconcile);
    });
}
