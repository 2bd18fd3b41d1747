/**
 * Human-readable renderers for task-related CLI commands.
 *
 * Each renderer takes the engine result data for its command and returns a
 * string suitable for terminal display.
 */

import type { Task } from '../../types/task.js';
import type { CreateTaskResult } from '../../store/task-store.js';
import type { TransitionResult } from '../../core/tasks/state-machine.js';
import type { UpdateTaskResult, PromoteResult } from '../../core/tasks/update.js';
import type { BlockerResult, DependencyView } from '../../core/tasks/deps.js';
import type { GraphValidation } from '../../core/tasks/dependency-graph.js';
import type { RankedTask } from '../../core/tasks/scheduler.js';
import type { ReconcileReport } from '../../core/tasks/reconcile.js';
import type { TaskDetail, ConflictReport } from '../../dispatch/engines/task-engine.js';
import {
  BOLD, DIM, NC, RED, GREEN, YELLOW,
  BOX, hRule,
  statusSymbol, statusColor, priorityColor, shortDate,
} from './colors.js';

function taskLine(t: Task): string {
  const sCol = statusColor(t.status);
  const pCol = priorityColor(t.priority);
  return `${BOLD}${t.id}${NC} ${sCol}${statusSymbol(t.status)}${NC} ${pCol}[${t.priority}]${NC} ${t.title}`;
}

// ---------------------------------------------------------------------------
// show: single task detail
// ---------------------------------------------------------------------------

export function renderShow(data: TaskDetail, quiet: boolean): string {
  const { task } = data;
  if (quiet) return `${task.id} ${statusSymbol(task.status)} ${task.title} [${task.priority}]`;

  const lines: string[] = [];
  const hr = hRule(65);

  lines.push('');
  lines.push(`${BOX.tl}${hr}${BOX.tr}`);
  lines.push(`${BOX.v}  ${taskLine(task)}`);
  lines.push(`${BOX.ml}${hr}${BOX.mr}`);

  lines.push(`${BOX.v}  ${DIM}Status:${NC}      ${task.status} (${data.partition})`);
  if (task.category) lines.push(`${BOX.v}  ${DIM}Category:${NC}    ${task.category}`);
  lines.push(`${BOX.v}  ${DIM}Version:${NC}     ${task.version}`);
  lines.push(`${BOX.v}  ${DIM}Created:${NC}     ${shortDate(task.createdAt)}`);
  if (task.startedAt) lines.push(`${BOX.v}  ${DIM}Started:${NC}     ${shortDate(task.startedAt)}`);
  if (task.completedAt) lines.push(`${BOX.v}  ${DIM}Completed:${NC}   ${shortDate(task.completedAt)}`);

  if (task.blockedBy.length > 0) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Blocked By${NC}`);
    const unresolved = new Set(data.dependencies.unresolved);
    for (const id of task.blockedBy) {
      lines.push(`${BOX.v}    ${unresolved.has(id) ? `${RED}${id}${NC}` : `${GREEN}${id}${NC}`}`);
    }
  }

  if (task.resourceFootprint.length > 0) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Footprint${NC}`);
    for (const r of task.resourceFootprint) lines.push(`${BOX.v}    ${r}`);
  }

  if (task.acceptanceCriteria.length > 0) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Acceptance Criteria${NC}`);
    task.acceptanceCriteria.forEach((c, i) => {
      lines.push(`${BOX.v}    ${i}. [${c.checked ? 'x' : ' '}] ${c.text}`);
    });
  }

  if (task.progressLog.length > 0) {
    lines.push(`${BOX.ml}${hr}${BOX.mr}`);
    lines.push(`${BOX.v}  ${BOLD}Progress${NC} (${task.progressLog.length})`);
    for (const entry of task.progressLog.slice(-5)) {
      const short = entry.note.length > 52 ? entry.note.slice(0, 49) + '...' : entry.note;
      lines.push(`${BOX.v}    ${DIM}${shortDate(entry.timestamp)}${NC} ${short}`);
    }
    if (task.progressLog.length > 5) {
      lines.push(`${BOX.v}    ${DIM}... and ${task.progressLog.length - 5} earlier${NC}`);
    }
  }

  lines.push(`${BOX.bl}${hr}${BOX.br}`);
  lines.push('');
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export function renderList(tasks: Task[], quiet: boolean): string {
  if (tasks.length === 0) return quiet ? '' : 'No tasks found.';
  if (quiet) return tasks.map((t) => `${t.id} ${statusSymbol(t.status)} ${t.title}`).join('\n');

  const lines = tasks.map((t) => {
    const category = t.category ? `  ${DIM}# ${t.category}${NC}` : '';
    return `  ${taskLine(t)}${category}`;
  });
  lines.push(`${DIM}${hRule(40)}${NC}`);
  lines.push(`Total: ${tasks.length} task${tasks.length === 1 ? '' : 's'}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// mutations
// ---------------------------------------------------------------------------

export function renderAdd(data: CreateTaskResult, quiet: boolean): string {
  if (quiet) return data.task.id;
  return `${GREEN}Created${NC} ${taskLine(data.task)}`;
}

export function renderUpdate(data: UpdateTaskResult, quiet: boolean): string {
  if (quiet) return data.task.id;
  return `${GREEN}Updated${NC} ${taskLine(data.task)}  ${DIM}(${data.changes.join(', ')})${NC}`;
}

export function renderTask(task: Task, quiet: boolean): string {
  return quiet ? task.id : taskLine(task);
}

export function renderTransition(data: TransitionResult, quiet: boolean): string {
  if (quiet) return `${data.task.id} ${data.task.status}`;
  return `${taskLine(data.task)}  ${DIM}${data.from} -> ${data.task.status}${NC}`;
}

export function renderPromote(data: PromoteResult, quiet: boolean): string {
  if (quiet) return data.task.id;
  const lines = [`${GREEN}Promoted${NC} ${taskLine(data.task)}`];
  if (data.demoted) lines.push(`${YELLOW}Demoted${NC}  ${data.demoted} to P2`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// dependencies
// ---------------------------------------------------------------------------

export function renderBlocker(data: BlockerResult, quiet: boolean): string {
  if (quiet) return data.task.blockedBy.join(',');
  const state = data.changed ? 'updated' : 'unchanged';
  return `${BOLD}${data.task.id}${NC} blocked by: ${data.task.blockedBy.join(', ') || '(none)'}  ${DIM}${state}${NC}`;
}

export function renderDeps(data: DependencyView, quiet: boolean): string {
  if (quiet) return data.unresolved.join('\n');
  const lines = [
    `${BOLD}${data.taskId}${NC} ${data.eligible ? `${GREEN}eligible${NC}` : `${RED}not eligible${NC}`}`,
    `  ${DIM}Blocked by:${NC}  ${data.blockedBy.join(', ') || '(none)'}`,
    `  ${DIM}Unresolved:${NC}  ${data.unresolved.join(', ') || '(none)'}`,
    `  ${DIM}Upstream:${NC}    ${data.transitive.join(', ') || '(none)'}`,
    `  ${DIM}Unblocks:${NC}    ${data.unblocks.join(', ') || '(none)'}`,
  ];
  return lines.join('\n');
}

export function renderGraphValidation(data: GraphValidation, quiet: boolean): string {
  if (quiet) return data.valid ? 'valid' : 'invalid';
  if (data.valid && data.warnings.length === 0) return `${GREEN}Dependency graph is valid${NC}`;
  const lines: string[] = [];
  if (data.cycle.length > 0) lines.push(`${RED}Cycle:${NC} ${data.cycle.join(' -> ')}`);
  for (const w of data.warnings) lines.push(`${YELLOW}${w.code}${NC} ${w.message}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// scheduling
// ---------------------------------------------------------------------------

export function renderNext(data: RankedTask | null, quiet: boolean): string {
  if (data === null) return quiet ? '' : 'No pending tasks with satisfied dependencies.';
  if (quiet) return data.task.id;
  const lines = [`${BOLD}Next:${NC} ${taskLine(data.task)}`];
  for (const r of data.reasons) lines.push(`  ${DIM}${r}${NC}`);
  return lines.join('\n');
}

export function renderRank(data: RankedTask[], quiet: boolean): string {
  if (data.length === 0) return quiet ? '' : 'No pending tasks with satisfied dependencies.';
  if (quiet) return data.map((r) => r.task.id).join('\n');
  return data
    .map((r) => `${String(r.position).padStart(3)}. ${taskLine(r.task)}  ${DIM}unblocks ${r.leverage}${NC}`)
    .join('\n');
}

export function renderConflicts(data: ConflictReport, quiet: boolean): string {
  if (quiet) return data.groups.map((g) => g.join(',')).join('\n');
  const lines: string[] = [];
  if (data.pairs.length === 0) {
    lines.push(`${GREEN}No conflicts${NC} among ${data.taskIds.length} task(s)`);
  } else {
    lines.push(`${BOLD}Conflicts${NC} (${data.pairs.length})`);
    for (const p of data.pairs) {
      const shared = [...p.resources, ...p.modules.map((m) => `${m}/*`)].join(', ');
      lines.push(`  ${RED}${p.a} x ${p.b}${NC}  ${DIM}${shared}${NC}`);
    }
  }
  lines.push(`${BOLD}Admissible groups${NC}`);
  data.groups.forEach((g, i) => lines.push(`  ${i + 1}. ${g.join(', ')}`));
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// reconcile
// ---------------------------------------------------------------------------

export function renderReconcile(data: ReconcileReport, quiet: boolean): string {
  if (quiet) return data.classification;
  const colour = data.classification === 'Consistent' ? GREEN : YELLOW;
  const lines = [`${BOLD}${data.taskId}${NC} ${colour}${data.classification}${NC}  ${DIM}(${data.status})${NC}`];
  for (const m of data.mismatches) {
    lines.push(`  ${m.index}. ${m.text}  ${DIM}recorded ${m.recorded}, observed ${m.observed}${NC}`);
  }
  for (const text of data.unknown) lines.push(`  ${DIM}no evidence: ${text}${NC}`);
  return lines.join('\n');
}
