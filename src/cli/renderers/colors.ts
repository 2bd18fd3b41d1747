/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when Unicode is not supported.
 */
import type { TaskStatus, TaskPriority } from '../../store/status-registry.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode box-drawing characters are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const BLUE = ansi('\x1b[0;34m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status and priority
// ---------------------------------------------------------------------------

const STATUS_SYMBOLS_UNICODE: Record<TaskStatus, string> = {
  pending: '○',      // ○
  in_progress: '◉',  // ◉
  blocked: '⊗',      // ⊗
  completed: '✓',    // ✓
};

const STATUS_SYMBOLS_ASCII: Record<TaskStatus, string> = {
  pending: '-',
  in_progress: '*',
  blocked: 'x',
  completed: '+',
};

export function statusSymbol(status: TaskStatus): string {
  return (unicodeEnabled ? STATUS_SYMBOLS_UNICODE : STATUS_SYMBOLS_ASCII)[status];
}

export function statusColor(status: TaskStatus): string {
  switch (status) {
    case 'pending':     return CYAN;
    case 'in_progress': return GREEN;
    case 'blocked':     return RED;
    case 'completed':   return DIM;
  }
}

export function priorityColor(priority: TaskPriority): string {
  switch (priority) {
    case 'P1': return RED;
    case 'P2': return YELLOW;
    case 'P3': return BLUE;
    case 'P4': return DIM;
  }
}

// ---------------------------------------------------------------------------
// Box drawing
// ---------------------------------------------------------------------------

export const BOX = unicodeEnabled
  ? { tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│', ml: '├', mr: '┤' }
  : { tl: '+', tr: '+', bl: '+', br: '+', h: '-', v: '|', ml: '+', mr: '+' };

/** Horizontal rule with box-drawing characters. */
export function hRule(width: number = 65): string {
  return BOX.h.repeat(width);
}

/** Format a date string as YYYY-MM-DD. */
export function shortDate(isoDate: string | null | undefined): string {
  if (!isoDate) return '';
  return isoDate.split('T')[0] ?? isoDate;
}
