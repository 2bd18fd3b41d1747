/**
 * CLI session command group: parallel sessions.
 */

import { Command } from 'commander';
import {
  sessionOpen,
  sessionAdmit,
  sessionReport,
  sessionClose,
  sessionStatus,
  sessionList,
} from '../../dispatch/engines/session-engine.js';
import { emitResult } from '../renderers/index.js';
import { renderTransition } from '../renderers/tasks.js';
import {
  renderAdmit,
  renderSession,
  renderSessionList,
  renderSessionStatus,
} from '../renderers/system.js';
import { projectRoot } from '../options.js';

interface ReportOptions {
  failed?: boolean;
  note?: string;
  force?: boolean;
}

export function registerSessionCommand(program: Command): void {
  const session = program
    .command('session')
    .description('Parallel sessions: several in-progress tasks with disjoint footprints');

  session
    .command('open <taskIds...>')
    .description('Open a parallel session over a fixed set of tasks')
    .option('-l, --label <label>', 'Free-text label')
    .action(async (taskIds: string[], opts: { label?: string }) => {
      emitResult(await sessionOpen(projectRoot(), taskIds, opts.label), 'session.open', renderSession);
    });

  session
    .command('admit <sessionId> <taskIds...>')
    .description('Start session tasks together; all are admitted or none')
    .action(async (sessionId: string, taskIds: string[]) => {
      emitResult(await sessionAdmit(projectRoot(), sessionId, taskIds), 'session.admit', renderAdmit);
    });

  session
    .command('report <sessionId> <taskId>')
    .description('Record a worker outcome: success completes the task, --failed blocks it')
    .option('--failed', 'The worker failed')
    .option('-n, --note <note>', 'Outcome details')
    .option('--force', 'Complete despite unchecked acceptance criteria')
    .action(async (sessionId: string, taskId: string, opts: ReportOptions) => {
      const response = await sessionReport(projectRoot(), sessionId, taskId, {
        ok: !opts.failed,
        note: opts.note,
        override: opts.force,
      });
      emitResult(response, 'session.report', renderTransition);
    });

  session
    .command('close <sessionId>')
    .description('Close a session (refused while more than one task is in progress)')
    .action(async (sessionId: string) => {
      emitResult(await sessionClose(projectRoot(), sessionId), 'session.close', renderSession);
    });

  session
    .command('status [sessionId]')
    .description('State of the open session, or of a named one')
    .action(async (sessionId: string | undefined) => {
      emitResult(await sessionStatus(projectRoot(), sessionId), 'session.status', renderSessionStatus);
    });

  session
    .command('list')
    .description('Every session, most recent first')
    .action(async () => {
      emitResult(await sessionList(projectRoot()), 'session.list', renderSessionList);
    });
}
