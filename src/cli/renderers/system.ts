/**
 * Human-readable renderers for sessions, status, learnings, config and init.
 */

import type { ParallelSession } from '../../types/session.js';
import type { LearningEntry } from '../../types/learning.js';
import type { IndexSummary } from '../../core/stats/index.js';
import type { SessionStatus } from '../../core/orchestration/parallel.js';
import type { TransitionResult } from '../../core/tasks/state-machine.js';
import type { LearningStats } from '../../core/memory/learnings.js';
import type { InitResult } from '../../core/init.js';
import { TASK_STATUSES } from '../../store/status-registry.js';
import {
  BOLD, DIM, NC, RED, GREEN, YELLOW,
  statusSymbol, statusColor, shortDate,
} from './colors.js';

// ---------------------------------------------------------------------------
// status: index summary
// ---------------------------------------------------------------------------

export function renderStatus(data: IndexSummary, quiet: boolean): string {
  if (quiet) return TASK_STATUSES.map((s) => `${s}=${data.counts[s]}`).join(' ');

  const lines: string[] = [];
  lines.push(`${BOLD}Backlog${NC}  ${DIM}(${data.total} tasks, generation ${data.generation})${NC}`);
  for (const s of TASK_STATUSES) {
    lines.push(`  ${statusColor(s)}${statusSymbol(s)} ${s.padEnd(12)}${NC} ${data.counts[s]}`);
  }
  lines.push(`  ${DIM}Active:${NC}  ${data.activeTaskIds.join(', ') || '(none)'}`);
  lines.push(`  ${DIM}Session:${NC} ${data.openSessionId ?? '(none)'}`);
  if (data.stale.length > 0) {
    lines.push(`${YELLOW}Stale${NC} (in progress > ${data.staleAfterMinutes} min)`);
    for (const s of data.stale) lines.push(`  ${s.id} ${s.title}  ${DIM}${s.ageMinutes} min${NC}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// sessions
// ---------------------------------------------------------------------------

function sessionHeader(s: ParallelSession): string {
  const icon = s.status === 'open' ? `${GREEN}●${NC}` : `${DIM}○${NC}`;
  const label = s.label ? ` ${s.label}` : '';
  return `${icon} ${BOLD}${s.id}${NC}${label}  ${DIM}${s.status}, opened ${shortDate(s.openedAt)}${NC}`;
}

export function renderSession(data: ParallelSession, quiet: boolean): string {
  if (quiet) return data.id;
  return `${sessionHeader(data)}\n  ${DIM}Tasks:${NC} ${data.taskIds.join(', ')}`;
}

export function renderSessionList(data: ParallelSession[], quiet: boolean): string {
  if (data.length === 0) return quiet ? '' : 'No sessions.';
  if (quiet) return data.map((s) => s.id).join('\n');
  return data.map(sessionHeader).join('\n');
}

export function renderSessionStatus(data: SessionStatus | null, quiet: boolean): string {
  if (data === null) return quiet ? '' : 'No open session.';
  if (quiet) return data.session.id;

  const lines = [sessionHeader(data.session)];
  for (const t of data.tasks) {
    const failed = data.failed.includes(t.id) ? `  ${RED}failed${NC}` : '';
    lines.push(`  ${statusColor(t.status)}${statusSymbol(t.status)}${NC} ${BOLD}${t.id}${NC} ${t.title}${failed}`);
  }
  for (const f of data.session.failures) {
    lines.push(`  ${DIM}${f.taskId}: ${f.note}${NC}`);
  }
  return lines.join('\n');
}

export function renderAdmit(data: TransitionResult[], quiet: boolean): string {
  if (quiet) return data.map((r) => r.task.id).join('\n');
  return data.map((r) => `${GREEN}Admitted${NC} ${BOLD}${r.task.id}${NC} ${r.task.title}`).join('\n');
}

// ---------------------------------------------------------------------------
// learnings
// ---------------------------------------------------------------------------

function learningLine(e: LearningEntry): string {
  const task = e.taskId ? ` ${DIM}[${e.taskId}]${NC}` : '';
  return `${BOLD}${e.id}${NC}${task} ${e.insight}`;
}

export function renderLearning(data: LearningEntry, quiet: boolean): string {
  if (quiet) return data.id;
  const lines = [learningLine(data), `  ${DIM}Context:${NC} ${data.context}`];
  if (data.appliedAction) lines.push(`  ${DIM}Applied:${NC} ${data.appliedAction}`);
  return lines.join('\n');
}

export function renderLearningList(data: LearningEntry[], quiet: boolean): string {
  if (data.length === 0) return quiet ? '' : 'No learnings recorded.';
  if (quiet) return data.map((e) => e.id).join('\n');
  return data.map(learningLine).join('\n');
}

export function renderLearningStats(data: LearningStats, quiet: boolean): string {
  if (quiet) return String(data.total);
  const lines = [
    `${BOLD}Learnings:${NC} ${data.total}  ${DIM}(general ${data.general}, latest ${data.latest ?? 'none'})${NC}`,
  ];
  for (const [taskId, count] of Object.entries(data.byTask)) {
    lines.push(`  ${taskId}: ${count}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// init and generic
// ---------------------------------------------------------------------------

export function renderInit(data: InitResult, quiet: boolean): string {
  if (quiet) return data.directory;
  const lines = [`${GREEN}Initialized${NC} ${data.directory}`];
  if (data.created.length > 0) lines.push(`  ${DIM}Created:${NC} ${data.created.join(', ')}`);
  if (data.skipped.length > 0) lines.push(`  ${DIM}Kept:${NC}    ${data.skipped.join(', ')}`);
  return lines.join('\n');
}

function formatLabel(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .replace(/^./, (s) => s.toUpperCase())
    .trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatScalar(value: unknown): string {
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/** Fallback renderer: one line per key, one level of nesting. */
export function renderGeneric(data: unknown, quiet: boolean): string {
  if (quiet) return '';
  if (!isRecord(data)) return formatScalar(data);

  const lines: string[] = [];
  for (const [key, val] of Object.entries(data)) {
    if (val === null || val === undefined) continue;
    if (isRecord(val)) {
      lines.push(`${BOLD}${formatLabel(key)}:${NC}`);
      for (const [subKey, subVal] of Object.entries(val)) {
        lines.push(`  ${DIM}${formatLabel(subKey)}:${NC} ${formatScalar(subVal)}`);
      }
    } else {
      lines.push(`${DIM}${formatLabel(key)}:${NC} ${formatScalar(val)}`);
    }
  }
  return lines.join('\n') || 'OK';
}
